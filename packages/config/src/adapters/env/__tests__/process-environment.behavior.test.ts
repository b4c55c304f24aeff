import { ProcessEnvironment } from "../process-environment"

describe("ProcessEnvironment behavior", () => {
  it("treats an undefined entry as unset", () => {
    const env = new ProcessEnvironment({ env: { APP_PORT: undefined } })

    expect(env.lookup("APP_PORT")).toEqual({ kind: "not_found" })
  })

  it("uses injected env over process.env", () => {
    const env = new ProcessEnvironment({ env: { CUSTOM: "injected_value" } })

    expect(env.lookup("CUSTOM")).toEqual({ kind: "found", value: "injected_value" })
    expect(env.lookup("PATH")).toEqual({ kind: "not_found" })
  })

  it("sees changes to the injected record", () => {
    const vars: Record<string, string | undefined> = {}
    const env = new ProcessEnvironment({ env: vars })

    vars.APP_HOST = "localhost"

    expect(env.lookup("APP_HOST")).toEqual({ kind: "found", value: "localhost" })
  })

  it("reads process.env by default", () => {
    const original = process.env.ENVBIND_TEST_PORT
    process.env.ENVBIND_TEST_PORT = "9999"

    try {
      const env = new ProcessEnvironment()

      expect(env.name).toBe("env")
      expect(env.lookup("ENVBIND_TEST_PORT")).toEqual({ kind: "found", value: "9999" })
    } finally {
      if (original === undefined) {
        delete process.env.ENVBIND_TEST_PORT
      } else {
        process.env.ENVBIND_TEST_PORT = original
      }
    }
  })
})
