export type EnvFound = {
  readonly kind: "found"
  readonly value: string
}

export type EnvNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a single environment lookup.
 *
 * @remarks
 * A variable set to the empty string is found with `value: ""`; only an unset
 * variable is not found.
 */
export type EnvLookupResult = EnvFound | EnvNotFound

/**
 * A read-only key/value view of environment variables.
 *
 * Lookups are synchronous and never mutate the underlying store.
 */
export interface Environment {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env", "chain(dotenv:.env,env)"
   */
  readonly name: string

  lookup(key: string): EnvLookupResult
}
