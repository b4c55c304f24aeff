import type { FieldKind } from "../../ports/field"
import { rangeError } from "../parse/conversion-error"
import { parseBool } from "../parse/boolean"
import { parseDuration } from "../parse/duration"
import { parseFloatBits } from "../parse/float"
import { type IntegerBits, parseSigned, parseUnsigned } from "../parse/integer"

export type Conversion =
  | { readonly kind: "assign"; readonly value: unknown }
  | { readonly kind: "ignore" }

type SignedKind = "int" | "int8" | "int16" | "int32" | "int64" | "duration"
type UnsignedKind = "uint" | "uint8" | "uint16" | "uint32" | "uint64"

const BITS: Record<Exclude<SignedKind | UnsignedKind, "duration">, IntegerBits> = {
  int: 64,
  int8: 8,
  int16: 16,
  int32: 32,
  int64: 64,
  uint: 64,
  uint8: 8,
  uint16: 16,
  uint32: 32,
  uint64: 64,
}

/**
 * Converts a raw string to the value a field of `kind` holds.
 *
 * @throws ConversionError when `raw` does not parse as `kind`
 */
export function convert(kind: FieldKind, raw: string): Conversion {
  switch (kind) {
    case "string":
      return assign(raw)
    case "int":
    case "int8":
    case "int16":
    case "int32":
    case "int64":
    case "duration":
      return assign(signed(kind, raw))
    case "uint":
    case "uint8":
    case "uint16":
    case "uint32":
    case "uint64":
      return assign(unsigned(kind, raw))
    case "bool":
      return assign(parseBool(raw))
    case "float32":
      return assign(parseFloatBits(raw, 32))
    case "float64":
      return assign(parseFloatBits(raw, 64))
    case "other":
      return { kind: "ignore" }
  }
}

function assign(value: unknown): Conversion {
  return { kind: "assign", value }
}

function signed(kind: SignedKind, raw: string): number | bigint {
  // Durations are 64-bit integers spelled as "1h30m", not as digits
  if (kind === "duration") return parseDuration(raw)

  const value = parseSigned(raw, BITS[kind])

  return kind === "int64" ? value : toNumber(value, raw)
}

function unsigned(kind: UnsignedKind, raw: string): number | bigint {
  const value = parseUnsigned(raw, BITS[kind])

  return kind === "uint64" ? value : toNumber(value, raw)
}

/**
 * `int` and `uint` parse at 64 bits but are held as numbers, so they are
 * further limited to the safe-integer range.
 */
function toNumber(value: bigint, raw: string): number {
  const n = Number(value)
  if (!Number.isSafeInteger(n)) throw rangeError("parseInteger", raw)

  return n
}
