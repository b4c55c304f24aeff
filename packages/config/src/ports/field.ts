export const fieldKinds = [
  "string",
  "bool",
  "int",
  "int8",
  "int16",
  "int32",
  "int64",
  "uint",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "float32",
  "float64",
  "duration",
  "other",
] as const

export type FieldKind = (typeof fieldKinds)[number]

/**
 * Nanoseconds, as a signed 64-bit count.
 */
export type Duration = bigint

/**
 * Runtime value type for each field kind.
 */
export type FieldValue = {
  string: string
  bool: boolean
  int: number
  int8: number
  int16: number
  int32: number
  int64: bigint
  uint: number
  uint8: number
  uint16: number
  uint32: number
  uint64: bigint
  float32: number
  float64: number
  duration: Duration
  other: unknown
}

/**
 * Per-field annotations read by the binder.
 */
export type FieldTags = {
  /**
   * Alternate name. Replaces the declared name when deriving the key, and is
   * also tried on its own (uppercased, unprefixed) when the prefixed key is
   * unset.
   */
  envconfig?: string

  /** Literal value used when no key is set */
  default?: string

  /** `true` or `"true"` fails the run when no key is set and there is no default */
  required?: boolean | string
}

/**
 * Read-only metadata for one field of a specification.
 */
export type FieldDescriptor = Readonly<{
  name: string
  kind: FieldKind
  typeName: string
  tags: Readonly<FieldTags>
}>

/**
 * A field declaration inside `defineSpec({...})`.
 *
 * @typeParam V - value type the record holds for this field
 */
export type FieldType<K extends FieldKind = FieldKind, V = unknown> = Readonly<{
  kind: K
  typeName: string
  tags: Readonly<FieldTags>

  /** Called once per created record, so records never share a value */
  zero: () => V
}>
