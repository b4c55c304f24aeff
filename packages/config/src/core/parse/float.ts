import { rangeError, syntaxError } from "./conversion-error"
import { underscoresSeparateDigits } from "./integer"

export type FloatBits = 32 | 64

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/
const SPECIAL = /^([+-]?)(inf|infinity|nan)$/i

/**
 * Parses a decimal or scientific-notation float, or one of the special
 * spellings `Inf`, `Infinity` and `NaN` (any case, `Inf` signed). As in
 * integers, `_` may separate digits.
 *
 * A finite input whose value does not fit the width fails; 32-bit results
 * are rounded to single precision.
 *
 * @throws ConversionError
 */
export function parseFloatBits(input: string, bits: FloatBits): number {
  const special = SPECIAL.exec(input)

  if (special) {
    const [, sign, word] = special
    if (word?.toLowerCase() === "nan") {
      if (sign) throw syntaxError("parseFloat", input)
      return Number.NaN
    }
    return sign === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
  }

  const literal = input.includes("_") ? withoutSeparators(input) : input

  if (literal === undefined || !DECIMAL.test(literal)) throw syntaxError("parseFloat", input)

  const value = bits === 32 ? Math.fround(Number(literal)) : Number(literal)

  if (!Number.isFinite(value)) throw rangeError("parseFloat", input)

  return value
}

function withoutSeparators(input: string): string | undefined {
  const unsigned = input.startsWith("+") || input.startsWith("-") ? input.slice(1) : input

  return underscoresSeparateDigits(unsigned) ? input.replaceAll("_", "") : undefined
}
