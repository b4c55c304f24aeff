import type { FieldDescriptor, FieldType } from "./field"

export type SpecShape = Record<string, FieldType>

/**
 * The record type a shape describes.
 *
 * @example
 * ```ts
 * const AppSpec = defineSpec({ Port: t.int32({ default: "8080" }) })
 * type AppSpec = InferSpec<typeof AppSpec> // { Port: number }
 * ```
 */
export type InferShape<S extends SpecShape> = {
  [K in keyof S]: ReturnType<S[K]["zero"]>
}

export type InferSpec<T> = T extends Specification<infer S> ? InferShape<S> : never

/**
 * A definition of bindable records.
 *
 * Records obtained from `create()` or registered with `attach()` carry the
 * definition's descriptors and can be passed to `process()`.
 */
export interface Specification<S extends SpecShape = SpecShape> {
  /** Descriptors in declaration order */
  readonly fields: readonly FieldDescriptor[]

  /** Returns a new record holding each field's zero value */
  create(): InferShape<S>

  /** Registers an existing object as a record of this definition */
  attach<T extends InferShape<S>>(target: T): T
}
