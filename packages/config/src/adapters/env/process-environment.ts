import type { EnvLookupResult, Environment } from "../../ports/environment"

export type ProcessEnvironmentOptions = {
  /** Variables to read instead of `process.env` */
  env?: Record<string, string | undefined>
}

/**
 * Reads the live process environment, or an injected record.
 *
 * Reads go to the record on every lookup, so changes to `process.env` are
 * visible to the next binding run.
 */
export class ProcessEnvironment implements Environment {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>

  constructor(options: ProcessEnvironmentOptions = {}) {
    this.env = options.env ?? process.env
  }

  lookup(key: string): EnvLookupResult {
    if (!Object.hasOwn(this.env, key)) return { kind: "not_found" }

    const value = this.env[key]

    return typeof value === "string" ? { kind: "found", value } : { kind: "not_found" }
  }
}
