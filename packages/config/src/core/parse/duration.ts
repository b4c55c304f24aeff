import type { Duration } from "../../ports/field"
import { ConversionError } from "./conversion-error"

export const Nanosecond: Duration = 1n
export const Microsecond: Duration = 1000n * Nanosecond
export const Millisecond: Duration = 1000n * Microsecond
export const Second: Duration = 1000n * Millisecond
export const Minute: Duration = 60n * Second
export const Hour: Duration = 60n * Minute

const UNITS: ReadonlyMap<string, bigint> = new Map([
  ["ns", Nanosecond],
  ["us", Microsecond],
  ["µs", Microsecond], // micro sign
  ["μs", Microsecond], // greek mu
  ["ms", Millisecond],
  ["s", Second],
  ["m", Minute],
  ["h", Hour],
])

const MAX_MAGNITUDE = 1n << 63n
const MAX_DURATION = MAX_MAGNITUDE - 1n

/**
 * Parses a duration expression such as `"300ms"`, `"-1.5h"` or `"2h45m"`
 * into nanoseconds.
 *
 * Each component is a decimal number (fraction allowed) followed by one of
 * `ns`, `us` (or `µs`), `ms`, `s`, `m`, `h`. A bare `"0"` is accepted.
 *
 * @throws ConversionError when the expression is malformed or the total
 * falls outside the signed 64-bit nanosecond range
 */
export function parseDuration(input: string): Duration {
  const fail = (reason: string): ConversionError =>
    new ConversionError("parseDuration", input, reason)

  let rest = input
  let negative = false

  if (rest !== "" && (rest[0] === "-" || rest[0] === "+")) {
    negative = rest[0] === "-"
    rest = rest.slice(1)
  }

  if (rest === "0") return 0n
  if (rest === "") throw fail("invalid duration")

  let total = 0n

  while (rest !== "") {
    if (!(rest[0] === "." || isDigit(rest[0]))) throw fail("invalid duration")

    const whole = leadingInt(rest)
    if (whole === undefined) throw fail("invalid duration")
    rest = rest.slice(whole.consumed)

    let fraction = 0n
    let scale = 1
    let fractionDigits = 0

    if (rest[0] === ".") {
      rest = rest.slice(1)
      const parsed = leadingFraction(rest)
      fraction = parsed.value
      scale = parsed.scale
      fractionDigits = parsed.consumed
      rest = rest.slice(parsed.consumed)
    }

    if (whole.consumed === 0 && fractionDigits === 0) throw fail("invalid duration")

    let unitLength = 0
    while (unitLength < rest.length && rest[unitLength] !== "." && !isDigit(rest[unitLength])) {
      unitLength++
    }

    if (unitLength === 0) throw fail("missing unit in duration")

    const unitName = rest.slice(0, unitLength)
    const unit = UNITS.get(unitName)
    if (unit === undefined) throw fail(`unknown unit ${JSON.stringify(unitName)} in duration`)
    rest = rest.slice(unitLength)

    if (whole.value > MAX_MAGNITUDE / unit) throw fail("invalid duration")

    let component = whole.value * unit
    if (fraction > 0n) {
      component += BigInt(Math.trunc(Number(fraction) * (Number(unit) / scale)))
    }

    total += component
    if (component > MAX_MAGNITUDE || total > MAX_MAGNITUDE) throw fail("invalid duration")
  }

  if (negative) return -total
  if (total > MAX_DURATION) throw fail("invalid duration")

  return total
}

/**
 * Whole milliseconds in `d`, truncated toward zero.
 */
export function toMilliseconds(d: Duration): number {
  return Number(d / Millisecond)
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9"
}

function leadingInt(s: string): { value: bigint; consumed: number } | undefined {
  let consumed = 0
  let value = 0n

  while (consumed < s.length && isDigit(s[consumed])) {
    value = value * 10n + BigInt(s.charCodeAt(consumed) - 48)
    if (value > MAX_MAGNITUDE) return undefined
    consumed++
  }

  return { value, consumed }
}

/**
 * Digits after the decimal point. Digits that would overflow the
 * accumulator are consumed but no longer add precision.
 */
function leadingFraction(s: string): { value: bigint; scale: number; consumed: number } {
  let consumed = 0
  let value = 0n
  let scale = 1
  let saturated = false

  while (consumed < s.length && isDigit(s[consumed])) {
    if (!saturated) {
      const next = value * 10n + BigInt(s.charCodeAt(consumed) - 48)
      if (next > MAX_DURATION) {
        saturated = true
      } else {
        value = next
        scale *= 10
      }
    }
    consumed++
  }

  return { value, scale, consumed }
}
