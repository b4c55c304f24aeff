import type { Environment } from "../../ports/environment"
import type { FieldDescriptor } from "../../ports/field"
import { defaultValue, fallbackKey, isRequired, primaryKey } from "./key"

export type ValueSource = "env" | "fallback" | "default"

export type Resolved = {
  readonly kind: "resolved"
  /** Primary key of the field, whichever key supplied the value */
  readonly key: string
  /** Key the value was read from; the primary key for defaults */
  readonly sourceKey: string
  readonly value: string
  readonly source: ValueSource
}

export type Unresolved = {
  readonly kind: "unresolved"
  readonly key: string
  readonly required: boolean
}

export type Resolution = Resolved | Unresolved

/**
 * Finds the raw value for one field: primary key, then the unprefixed
 * fallback key, then the default. The default is consulted before the
 * required flag, so a required field with a default never fails here.
 */
export function resolveField(
  prefix: string,
  field: FieldDescriptor,
  env: Environment,
): Resolution {
  const key = primaryKey(prefix, field)

  const primary = env.lookup(key)
  if (primary.kind === "found") {
    return { kind: "resolved", key, sourceKey: key, value: primary.value, source: "env" }
  }

  const alt = fallbackKey(field)
  if (alt !== undefined) {
    const fallback = env.lookup(alt)
    if (fallback.kind === "found") {
      return {
        kind: "resolved",
        key,
        sourceKey: alt,
        value: fallback.value,
        source: "fallback",
      }
    }
  }

  const def = defaultValue(field.tags)
  if (def !== undefined) {
    return { kind: "resolved", key, sourceKey: key, value: def, source: "default" }
  }

  return { kind: "unresolved", key, required: isRequired(field.tags) }
}
