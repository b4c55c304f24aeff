export type BindErrorCode = "invalid_specification" | "missing_required_key" | "parse_error"

/**
 * Structured data attached to a binding error.
 */
export type BindErrorContext = Readonly<Record<string, unknown>>

export type BindErrorOptions<C extends BindErrorCode> = Readonly<{
  code: C
  context?: BindErrorContext
  cause?: unknown
}>

/**
 * JSON-safe shape of a binding error, for logs and transport.
 */
export type SerializedBindError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedBindError
}>

export class BindError<C extends BindErrorCode = BindErrorCode> extends Error {
  readonly code: C
  readonly context: BindErrorContext
  readonly timestamp: Date

  /**
   * Binding errors describe bad input (a misconfigured environment) except
   * when the caller passed something that is not a specification.
   */
  readonly isOperational: boolean

  constructor(message: string, options: BindErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.code !== "invalid_specification"
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedBindError {
    return serializeBindError(this)
  }
}

export class InvalidSpecificationError extends BindError<"invalid_specification"> {
  constructor(reason: string, context?: BindErrorContext) {
    super(`invalid specification: ${reason}`, { code: "invalid_specification", context })
  }
}

export class MissingRequiredKeyError extends BindError<"missing_required_key"> {
  readonly keyName: string
  readonly fieldName: string

  constructor(keyName: string, fieldName: string) {
    super(`required key ${keyName} missing value`, {
      code: "missing_required_key",
      context: { key: keyName, field: fieldName },
    })

    this.keyName = keyName
    this.fieldName = fieldName
  }
}

/**
 * A value was found for a field but could not be converted to its type.
 */
export class ParseError extends BindError<"parse_error"> {
  readonly keyName: string
  readonly fieldName: string
  readonly typeName: string
  readonly value: string

  constructor(
    fields: Readonly<{ keyName: string; fieldName: string; typeName: string; value: string }>,
    cause?: unknown,
  ) {
    super(
      `assigning ${fields.keyName} to ${fields.fieldName}: converting '${fields.value}' to type ${fields.typeName}`,
      {
        code: "parse_error",
        context: {
          key: fields.keyName,
          field: fields.fieldName,
          type: fields.typeName,
          value: fields.value,
        },
        cause,
      },
    )

    this.keyName = fields.keyName
    this.fieldName = fields.fieldName
    this.typeName = fields.typeName
    this.value = fields.value
  }
}

export function isBindError(err: unknown): err is BindError {
  return err instanceof BindError
}

function serializeBindError(err: unknown): SerializedBindError {
  if (err instanceof BindError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeBindError(err.cause) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeBindError(err.cause) }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
