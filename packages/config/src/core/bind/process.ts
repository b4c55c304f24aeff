import { createNullLogger, type Logger } from "@envbind/logger"
import { ProcessEnvironment } from "../../adapters/env/process-environment"
import type { Environment } from "../../ports/environment"
import {
  type BindError,
  InvalidSpecificationError,
  MissingRequiredKeyError,
  ParseError,
} from "../errors/bind-error"
import { ConversionError } from "../parse/conversion-error"
import { describeReceived, describeRecord, isSettable, isStructured } from "../spec/registry"
import { convert } from "./convert"
import { resolveField } from "./resolve"

export type ProcessOptions = {
  /** Where values are looked up. Default: the process environment */
  env?: Environment

  /** Default: a logger that discards everything */
  logger?: Logger
}

export type ProcessResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: BindError }

/**
 * Populates `spec` from the environment, field by field in declaration order.
 *
 * For a field `Port` and prefix `"app"` the key is `APP_PORT`. A field with
 * an `envconfig` alternate name uses it instead of its declared name and
 * falls back to the bare, uppercased alternate name when the prefixed key is
 * unset. Unset fields take their default; unset required fields without a
 * default fail; other unset fields keep their current value.
 *
 * Stops at the first failure. Fields before it have already been assigned.
 *
 * @param spec - a record from `Specification.create()` or `.attach()`
 *
 * @example
 * ```ts
 * const config = AppSpec.create()
 * const result = processEnv("app", config)
 *
 * if (!result.ok) {
 *   logger.error("bad configuration", { err: result.error })
 * }
 * ```
 */
export function processEnv(
  prefix: string,
  spec: unknown,
  options: ProcessOptions = {},
): ProcessResult {
  const env = options.env ?? new ProcessEnvironment()
  const logger = (options.logger ?? createNullLogger()).child({ module: "binder", prefix })

  const fields = isStructured(spec) ? describeRecord(spec) : undefined

  if (!isStructured(spec) || fields === undefined) {
    return fail(
      logger,
      new InvalidSpecificationError("must be a bindable record", {
        received: describeReceived(spec),
      }),
    )
  }

  for (const field of fields) {
    if (!isSettable(spec, field.name)) continue

    const resolution = resolveField(prefix, field, env)

    if (resolution.kind === "unresolved") {
      if (resolution.required) {
        return fail(logger, new MissingRequiredKeyError(resolution.key, field.name))
      }

      logger.trace("unset, keeping current value", { field: field.name, key: resolution.key })
      continue
    }

    try {
      const conversion = convert(field.kind, resolution.value)
      if (conversion.kind === "assign" && !Reflect.set(spec, field.name, conversion.value)) {
        logger.trace("not assignable, skipped", { field: field.name, key: resolution.key })
        continue
      }
    } catch (err) {
      if (!(err instanceof ConversionError)) throw err

      return fail(
        logger,
        new ParseError(
          {
            keyName: resolution.key,
            fieldName: field.name,
            typeName: field.typeName,
            value: resolution.value,
          },
          err,
        ),
      )
    }

    logger.debug("resolved", {
      field: field.name,
      key: resolution.sourceKey,
      source: resolution.source,
    })
  }

  return { ok: true }
}

/**
 * Same as {@link processEnv}, but throws the error instead of returning it.
 * Meant for startup code where bad configuration should stop the process.
 *
 * @throws BindError
 */
export function mustProcessEnv(
  prefix: string,
  spec: unknown,
  options: ProcessOptions = {},
): void {
  const result = processEnv(prefix, spec, options)

  if (!result.ok) {
    const logger = options.logger ?? createNullLogger()
    logger.fatal("configuration could not be bound", { prefix, err: result.error })

    throw result.error
  }
}

function fail(logger: Logger, error: BindError): ProcessResult {
  logger.warn(error.message, { err: error })

  return { ok: false, error }
}
