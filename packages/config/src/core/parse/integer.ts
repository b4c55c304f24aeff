import { rangeError, syntaxError } from "./conversion-error"

export type IntegerBits = 8 | 16 | 32 | 64

/**
 * Parses an unsigned integer, detecting the base from its prefix:
 * `0x`/`0X` hex, `0o`/`0O` or a bare leading `0` octal, `0b`/`0B` binary,
 * otherwise decimal. `_` may separate digits.
 *
 * @throws ConversionError when the input is malformed or exceeds `bits`
 */
export function parseUnsigned(input: string, bits: IntegerBits): bigint {
  return parseMagnitude("parseUnsigned", input, input, (1n << BigInt(bits)) - 1n)
}

/**
 * Signed counterpart of {@link parseUnsigned}; accepts a leading `+` or `-`.
 *
 * @throws ConversionError when the input is malformed or exceeds `bits`
 */
export function parseSigned(input: string, bits: IntegerBits): bigint {
  if (input === "") throw syntaxError("parseSigned", input)

  let digits = input
  let negative = false

  if (digits[0] === "+" || digits[0] === "-") {
    negative = digits[0] === "-"
    digits = digits.slice(1)
  }

  const cutoff = 1n << BigInt(bits - 1)
  const magnitude = parseMagnitude("parseSigned", input, digits, cutoff)

  if (!negative && magnitude >= cutoff) throw rangeError("parseSigned", input)

  return negative ? -magnitude : magnitude
}

function parseMagnitude(func: string, input: string, digits: string, max: bigint): bigint {
  if (digits === "") throw syntaxError(func, input)

  let base = 10n
  let body = digits

  if (digits[0] === "0") {
    const marker = digits.length >= 3 ? digits[1]?.toLowerCase() : undefined

    if (marker === "b") {
      base = 2n
      body = digits.slice(2)
    } else if (marker === "o") {
      base = 8n
      body = digits.slice(2)
    } else if (marker === "x") {
      base = 16n
      body = digits.slice(2)
    } else {
      base = 8n
      body = digits.slice(1)
    }
  }

  let value = 0n
  let sawUnderscore = false
  let overflow = false

  for (const ch of body) {
    if (ch === "_") {
      sawUnderscore = true
      continue
    }

    const digit = digitValue(ch)
    if (digit === undefined || digit >= base) throw syntaxError(func, input)

    if (!overflow) {
      value = value * base + digit
      if (value > max) overflow = true
    }
  }

  if (sawUnderscore && !underscoresSeparateDigits(digits)) throw syntaxError(func, input)
  if (overflow) throw rangeError(func, input)

  return value
}

function digitValue(ch: string): bigint | undefined {
  const code = ch.charCodeAt(0)

  if (code >= 48 && code <= 57) return BigInt(code - 48)

  const lower = code | 0x20
  if (lower >= 97 && lower <= 122) return BigInt(lower - 97 + 10)

  return undefined
}

/**
 * `_` is only valid between digits, where a base prefix counts as a digit.
 */
export function underscoresSeparateDigits(digits: string): boolean {
  let previous: "start" | "digit" | "underscore" | "other" = "start"
  let i = 0
  let hex = false

  if (digits.length >= 2 && digits[0] === "0") {
    const marker = digits[1]?.toLowerCase()
    if (marker === "b" || marker === "o" || marker === "x") {
      i = 2
      previous = "digit"
      hex = marker === "x"
    }
  }

  for (; i < digits.length; i++) {
    const ch = digits[i] ?? ""

    if ((ch >= "0" && ch <= "9") || (hex && /^[a-f]$/i.test(ch))) {
      previous = "digit"
      continue
    }

    if (ch === "_") {
      if (previous !== "digit") return false
      previous = "underscore"
      continue
    }

    if (previous === "underscore") return false
    previous = "other"
  }

  return previous !== "underscore"
}
