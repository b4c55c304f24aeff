export type ConversionReason = "invalid syntax" | "value out of range"

/**
 * Thrown by the parsers in this directory. The binder wraps it as the `cause`
 * of a ParseError.
 */
export class ConversionError extends Error {
  constructor(
    readonly func: string,
    readonly input: string,
    readonly reason: ConversionReason | (string & {}),
  ) {
    super(`${func}: parsing ${JSON.stringify(input)}: ${reason}`)
    this.name = "ConversionError"
  }
}

export function syntaxError(func: string, input: string): ConversionError {
  return new ConversionError(func, input, "invalid syntax")
}

export function rangeError(func: string, input: string): ConversionError {
  return new ConversionError(func, input, "value out of range")
}
