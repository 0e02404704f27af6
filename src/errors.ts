import type { OutputFormat } from "@/types"

export type ErrorCode =
  | "CONFIG_ERROR"
  | "NOT_INITIALIZED"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "STORAGE_ERROR"
  | "MALFORMED_INPUT"
  | "LIMIT_EXCEEDED"
  | "LOCK_ERROR"
  | "GIT_ERROR"

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly exitCode: number
  readonly hint?: string

  constructor(message: string, hint?: string) {
    super(message)
    this.name = this.constructor.name
    this.hint = hint
  }
}

export class ConfigError extends AppError {
  readonly code = "CONFIG_ERROR" as const
  readonly exitCode = 3

  constructor(message: string) {
    super(message)
  }
}

export class NotInitializedError extends AppError {
  readonly code = "NOT_INITIALIZED" as const
  readonly exitCode = 3

  constructor() {
    super("basediff is not initialized. Run `basediff init` first.")
  }
}

export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR" as const
  readonly exitCode = 2

  constructor(message: string, hint?: string) {
    super(message, hint)
  }
}

export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND" as const
  readonly exitCode = 4

  constructor(message: string) {
    super(message)
  }
}

/** Engine-level failure. Every core operation is safe to rerun after one. */
export class StorageError extends AppError {
  readonly code = "STORAGE_ERROR" as const
  readonly exitCode = 5

  constructor(message: string, cause?: unknown) {
    super(message, "the operation can be retried")
    this.cause = cause
  }
}

/** A single input record was rejected; the surrounding batch continues. */
export class MalformedInputError extends AppError {
  readonly code = "MALFORMED_INPUT" as const
  readonly exitCode = 2
  readonly index: number

  constructor(index: number, message: string) {
    super(`record ${index}: ${message}`)
    this.index = index
  }
}

export class LimitExceededError extends AppError {
  readonly code = "LIMIT_EXCEEDED" as const
  readonly exitCode = 2

  constructor(message: string, hint?: string) {
    super(message, hint)
  }
}

export class LockError extends AppError {
  readonly code = "LOCK_ERROR" as const
  readonly exitCode = 6

  constructor(
    message: string = "another basediff process is running (lock file exists: .basediff/index.lock)",
  ) {
    super(message)
  }
}

export class GitError extends AppError {
  readonly code = "GIT_ERROR" as const
  readonly exitCode = 5

  constructor(message: string = "not a git repository") {
    super(message)
  }
}

/**
 * Runs a storage operation and rethrows engine failures as StorageError.
 * Application errors raised inside `fn` pass through untouched.
 */
export function wrapStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn()
  } catch (err) {
    if (err instanceof AppError) throw err
    const detail = err instanceof Error ? err.message : String(err)
    throw new StorageError(`${operation} failed: ${detail}`, err)
  }
}

/** Structured error object sent across the CLI boundary. */
export interface ErrorPayload {
  success: false
  error: string
  code?: ErrorCode
  hint?: string
}

export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof AppError) {
    const payload: ErrorPayload = {
      success: false,
      error: err.message,
      code: err.code,
    }
    if (err.hint) payload.hint = err.hint
    return payload
  }
  if (err instanceof Error) return { success: false, error: err.message }
  return { success: false, error: String(err) }
}

export function handleError(err: unknown, format: OutputFormat): never {
  const payload = toErrorPayload(err)
  const exitCode = err instanceof AppError ? err.exitCode : 1

  if (format === "json") {
    console.log(JSON.stringify(payload, null, 2))
  } else {
    console.error(`Error: ${payload.error}`)
    if (payload.hint) console.error(`Hint: ${payload.hint}`)
  }

  process.exit(exitCode)
}
