/**
 * Lower-case, snake-cased error code, e.g. `coercion_failed`.
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: configuration keys, target type
 * names, source names. Never raw secrets.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for diagnostics */
  readonly context: ErrorContext

  /** `true` if repeating the operation might succeed (e.g. a file that was still being written) */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime failure (bad configuration, missing
   * registration) rather than a programmer error.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by loggers.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
