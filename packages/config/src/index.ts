export { ChainEnvironment } from "./adapters/chain/chain-environment"
export {
  DotenvEnvironment,
  type DotenvEnvironmentOptions,
} from "./adapters/dotenv/dotenv-environment"
export {
  ProcessEnvironment,
  type ProcessEnvironmentOptions,
} from "./adapters/env/process-environment"
export { type KeyInfo, listKeys } from "./core/bind/list-keys"
export {
  mustProcessEnv,
  type ProcessOptions,
  type ProcessResult,
  processEnv,
} from "./core/bind/process"
export type { ValueSource } from "./core/bind/resolve"
export {
  BindError,
  type BindErrorCode,
  type BindErrorContext,
  InvalidSpecificationError,
  isBindError,
  MissingRequiredKeyError,
  ParseError,
  type SerializedBindError,
} from "./core/errors/bind-error"
export { parseBool } from "./core/parse/boolean"
export { ConversionError, type ConversionReason } from "./core/parse/conversion-error"
export {
  Hour,
  Microsecond,
  Millisecond,
  Minute,
  Nanosecond,
  parseDuration,
  Second,
  toMilliseconds,
} from "./core/parse/duration"
export { type FloatBits, parseFloatBits } from "./core/parse/float"
export { type IntegerBits, parseSigned, parseUnsigned } from "./core/parse/integer"
export { defineSpec } from "./core/spec/define-spec"
export { t } from "./core/spec/fields"
export type { EnvFound, EnvLookupResult, EnvNotFound, Environment } from "./ports/environment"
export {
  type Duration,
  type FieldDescriptor,
  type FieldKind,
  type FieldTags,
  type FieldType,
  type FieldValue,
  fieldKinds,
} from "./ports/field"
export type {
  InferShape,
  InferSpec,
  SpecShape,
  Specification,
} from "./ports/specification"
