import {
  Hour,
  Microsecond,
  Millisecond,
  Minute,
  parseDuration,
  Second,
  toMilliseconds,
} from "../duration"
import { catchConversion } from "./catch-conversion"

describe("parseDuration", () => {
  it("parses single components", () => {
    expect(parseDuration("10ns")).toBe(10n)
    expect(parseDuration("1us")).toBe(Microsecond)
    expect(parseDuration("300ms")).toBe(300n * Millisecond)
    expect(parseDuration("45s")).toBe(45n * Second)
    expect(parseDuration("5m")).toBe(5n * Minute)
    expect(parseDuration("2h")).toBe(2n * Hour)
  })

  it("accepts both micro spellings", () => {
    expect(parseDuration("1µs")).toBe(1000n)
    expect(parseDuration("1μs")).toBe(1000n)
  })

  it("sums multiple components", () => {
    expect(parseDuration("1h30m")).toBe(5_400_000_000_000n)
    expect(parseDuration("2h45m")).toBe(9_900_000_000_000n)
    expect(parseDuration("1m1s")).toBe(61_000_000_000n)
  })

  it("handles fractions", () => {
    expect(parseDuration("1.5s")).toBe(1_500_000_000n)
    expect(parseDuration(".5s")).toBe(500_000_000n)
    expect(parseDuration("1.s")).toBe(1_000_000_000n)
    expect(parseDuration("-1.5h")).toBe(-5_400_000_000_000n)
  })

  it("accepts a bare zero with or without sign", () => {
    expect(parseDuration("0")).toBe(0n)
    expect(parseDuration("-0")).toBe(0n)
    expect(parseDuration("+0")).toBe(0n)
  })

  it("covers the signed 64-bit range", () => {
    expect(parseDuration("9223372036854775807ns")).toBe(2n ** 63n - 1n)
    expect(parseDuration("-9223372036854775808ns")).toBe(-(2n ** 63n))
    expect(catchConversion(() => parseDuration("9223372036854775808ns")).reason).toBe(
      "invalid duration",
    )
    expect(catchConversion(() => parseDuration("3000000h")).reason).toBe("invalid duration")
  })

  it("requires a unit", () => {
    expect(catchConversion(() => parseDuration("100")).reason).toBe("missing unit in duration")
  })

  it("rejects unknown units", () => {
    const err = catchConversion(() => parseDuration("1d"))

    expect(err.reason).toBe('unknown unit "d" in duration')
    expect(err.message).toBe('parseDuration: parsing "1d": unknown unit "d" in duration')
  })

  it.each(["", "-", "s", ".s", "1h-2m", "not-a-duration"])("rejects %j", (input) => {
    expect(catchConversion(() => parseDuration(input)).reason).toBe("invalid duration")
  })
})

describe("toMilliseconds", () => {
  it("truncates toward zero", () => {
    expect(toMilliseconds(1_500_000_000n)).toBe(1500)
    expect(toMilliseconds(1_999_999n)).toBe(1)
    expect(toMilliseconds(-1_999_999n)).toBe(-1)
  })
})
