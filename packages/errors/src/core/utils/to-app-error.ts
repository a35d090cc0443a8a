import type { AppError, ErrorCode, ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"
import { isAppError } from "./is-app-error"

export type ToAppErrorOptions = Readonly<{
  /** @default "unknown" */
  code?: ErrorCode
  context?: ErrorContext
  /** Applied only when `err` is not already an AppError. @default false */
  isRetryable?: boolean
}>

/**
 * Convert a caught value to an AppError.
 *
 * AppErrors pass through unchanged; anything else is wrapped (as `cause`)
 * with the given code.
 */
export function toAppError(err: unknown, options: ToAppErrorOptions = {}): AppError {
  if (isAppError(err)) return err

  const code = options.code ?? "unknown"
  const isRetryable = options.isRetryable ?? false

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code,
      cause: err,
      isRetryable,
      ...(options.context && { context: options.context }),
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code,
    isRetryable,
    isOperational: false,
    context: { ...options.context, ...(typeof err !== "string" && { value: err }) },
  })
}
