import { syntaxError } from "./conversion-error"

const TRUE_LITERALS = new Set(["1", "t", "T", "TRUE", "true", "True"])
const FALSE_LITERALS = new Set(["0", "f", "F", "FALSE", "false", "False"])

/**
 * @throws ConversionError for anything but the accepted literals
 */
export function parseBool(input: string): boolean {
  if (TRUE_LITERALS.has(input)) return true
  if (FALSE_LITERALS.has(input)) return false

  throw syntaxError("parseBool", input)
}
