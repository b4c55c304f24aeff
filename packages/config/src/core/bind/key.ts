import type { FieldDescriptor, FieldTags } from "../../ports/field"

/**
 * The alternate name when one is set, otherwise the declared name.
 */
export function lookupName(field: FieldDescriptor): string {
  return field.tags.envconfig || field.name
}

/**
 * `PREFIX_NAME`, uppercased. An empty prefix still contributes the `_`.
 */
export function primaryKey(prefix: string, field: FieldDescriptor): string {
  return `${prefix}_${lookupName(field)}`.toUpperCase()
}

/**
 * The unprefixed key tried when the primary key is unset. Only fields with an
 * alternate name have one.
 */
export function fallbackKey(field: FieldDescriptor): string | undefined {
  return field.tags.envconfig ? field.tags.envconfig.toUpperCase() : undefined
}

export function defaultValue(tags: Readonly<FieldTags>): string | undefined {
  return tags.default || undefined
}

export function isRequired(tags: Readonly<FieldTags>): boolean {
  return tags.required === true || tags.required === "true"
}
