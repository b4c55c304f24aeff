import { InvalidSpecificationError } from "../errors/bind-error"
import { describeReceived, describeRecord, isSettable, isStructured } from "../spec/registry"
import { defaultValue, fallbackKey, isRequired, primaryKey } from "./key"

export type KeyInfo = Readonly<{
  field: string
  key: string
  fallbackKey?: string
  typeName: string
  default?: string
  required: boolean
}>

/**
 * Lists the keys `processEnv(prefix, spec)` would read, without reading them.
 *
 * @example
 * ```ts
 * for (const k of listKeys("app", AppSpec.create())) {
 *   console.log(k.key, k.typeName, k.required ? "(required)" : "")
 * }
 * ```
 *
 * @throws InvalidSpecificationError
 */
export function listKeys(prefix: string, spec: unknown): KeyInfo[] {
  const fields = isStructured(spec) ? describeRecord(spec) : undefined

  if (!isStructured(spec) || fields === undefined) {
    throw new InvalidSpecificationError("must be a bindable record", {
      received: describeReceived(spec),
    })
  }

  return fields
    .filter((field) => isSettable(spec, field.name))
    .map((field) => {
      const alt = fallbackKey(field)
      const def = defaultValue(field.tags)

      return {
        field: field.name,
        key: primaryKey(prefix, field),
        ...(alt !== undefined && { fallbackKey: alt }),
        typeName: field.typeName,
        ...(def !== undefined && { default: def }),
        required: isRequired(field.tags),
      }
    })
}
