import type { FieldDescriptor } from "../../../ports/field"
import { defaultValue, fallbackKey, isRequired, lookupName, primaryKey } from "../key"

function field(name: string, tags: FieldDescriptor["tags"] = {}): FieldDescriptor {
  return { name, kind: "string", typeName: "string", tags }
}

describe("key derivation", () => {
  it("joins prefix and declared name, uppercased", () => {
    expect(primaryKey("app", field("Port"))).toBe("APP_PORT")
    expect(primaryKey("My_App", field("maxConns"))).toBe("MY_APP_MAXCONNS")
  })

  it("keeps the separator when the prefix is empty", () => {
    expect(primaryKey("", field("Port"))).toBe("_PORT")
  })

  it("uses the alternate name in place of the declared name", () => {
    const token = field("Token", { envconfig: "shared_token" })

    expect(lookupName(token)).toBe("shared_token")
    expect(primaryKey("app", token)).toBe("APP_SHARED_TOKEN")
    expect(fallbackKey(token)).toBe("SHARED_TOKEN")
  })

  it("ignores an empty alternate name", () => {
    const port = field("Port", { envconfig: "" })

    expect(lookupName(port)).toBe("Port")
    expect(fallbackKey(port)).toBeUndefined()
  })

  it("has no fallback key without an alternate name", () => {
    expect(fallbackKey(field("Port"))).toBeUndefined()
  })
})

describe("tag helpers", () => {
  it("treats an empty default as absent", () => {
    expect(defaultValue({ default: "" })).toBeUndefined()
    expect(defaultValue({ default: "8080" })).toBe("8080")
    expect(defaultValue({})).toBeUndefined()
  })

  it("requires exactly true or the string 'true'", () => {
    expect(isRequired({ required: true })).toBe(true)
    expect(isRequired({ required: "true" })).toBe(true)
    expect(isRequired({ required: "TRUE" })).toBe(false)
    expect(isRequired({ required: "1" })).toBe(false)
    expect(isRequired({ required: false })).toBe(false)
    expect(isRequired({})).toBe(false)
  })
})
