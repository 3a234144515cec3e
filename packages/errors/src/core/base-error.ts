import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a consistent shape.
 *
 * - BaseError keeps its code, context and operational flag
 * - a plain Error gets code "unknown" and `isOperational: false`
 * - anything else is wrapped as "NonErrorThrown" with the value in `context`
 *
 * Causes are serialized recursively; a cause already seen in the chain is left out.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  return serialize(err, options?.includeStack ?? false, new WeakSet())
}

function serialize(err: unknown, includeStack: boolean, seen: WeakSet<Error>): SerializedError {
  if (err instanceof BaseError) {
    seen.add(err)
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...serializeCause(err, includeStack, seen),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    seen.add(err)
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...serializeCause(err, includeStack, seen),
      ...(includeStack && err.stack && { stack: err.stack }),
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

function serializeCause(
  err: Error,
  includeStack: boolean,
  seen: WeakSet<Error>,
): { cause?: SerializedError } {
  if (err.cause === undefined) return {}
  if (err.cause instanceof Error && seen.has(err.cause)) return {}

  return { cause: serialize(err.cause, includeStack, seen) }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard for values carrying the AppError fields, including errors raised
 * by another copy of this package.
 */
export function isAppError(e: unknown): e is AppError {
  if (e instanceof BaseError) return true
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    e.timestamp instanceof Date &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
