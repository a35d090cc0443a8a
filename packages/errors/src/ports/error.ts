export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (offending values, source names, paths).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /**
   * `true` when the failure is transient: the next tick or watch event may
   * succeed with no change on our side (read failure, dropped watch).
   */
  readonly isRetryable: boolean

  /**
   * `false` for invariant violations and bugs; `true` for expected runtime
   * failures such as a malformed ConfigMap.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used as the `err` payload of structured logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
