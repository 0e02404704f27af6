import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"

import {
  AppError,
  ConfigError,
  GitError,
  LimitExceededError,
  LockError,
  MalformedInputError,
  NotFoundError,
  NotInitializedError,
  StorageError,
  ValidationError,
  handleError,
  toErrorPayload,
  wrapStorage,
} from "@/errors"

describe("error subclasses", () => {
  test("ConfigError", () => {
    const err = new ConfigError("bad config")
    expect(err).toBeInstanceOf(AppError)
    expect(err.code).toBe("CONFIG_ERROR")
    expect(err.exitCode).toBe(3)
    expect(err.name).toBe("ConfigError")
    expect(err.hint).toBeUndefined()
  })

  test("NotInitializedError", () => {
    const err = new NotInitializedError()
    expect(err.code).toBe("NOT_INITIALIZED")
    expect(err.exitCode).toBe(3)
    expect(err.message).toBe(
      "basediff is not initialized. Run `basediff init` first.",
    )
  })

  test("ValidationError carries a hint", () => {
    const err = new ValidationError("invalid input", "try again")
    expect(err.code).toBe("VALIDATION_ERROR")
    expect(err.exitCode).toBe(2)
    expect(err.hint).toBe("try again")
  })

  test("NotFoundError", () => {
    const err = new NotFoundError("no data")
    expect(err.code).toBe("NOT_FOUND")
    expect(err.exitCode).toBe(4)
  })

  test("StorageError is retryable and keeps its cause", () => {
    const cause = new Error("disk I/O error")
    const err = new StorageError("insert commits failed", cause)
    expect(err.code).toBe("STORAGE_ERROR")
    expect(err.exitCode).toBe(5)
    expect(err.hint).toBe("the operation can be retried")
    expect(err.cause).toBe(cause)
  })

  test("MalformedInputError names the record", () => {
    const err = new MalformedInputError(3, "bad hash")
    expect(err.code).toBe("MALFORMED_INPUT")
    expect(err.index).toBe(3)
    expect(err.message).toBe("record 3: bad hash")
  })

  test("LimitExceededError", () => {
    const err = new LimitExceededError("too many")
    expect(err.code).toBe("LIMIT_EXCEEDED")
    expect(err.exitCode).toBe(2)
  })

  test("LockError has a default message", () => {
    const err = new LockError()
    expect(err.code).toBe("LOCK_ERROR")
    expect(err.exitCode).toBe(6)
    expect(err.message).toBe(
      "another basediff process is running (lock file exists: .basediff/index.lock)",
    )
  })

  test("GitError", () => {
    const err = new GitError()
    expect(err.code).toBe("GIT_ERROR")
    expect(err.message).toBe("not a git repository")
  })
})

describe("wrapStorage", () => {
  test("returns the result", () => {
    expect(wrapStorage("read", () => 42)).toBe(42)
  })

  test("converts engine errors to StorageError", () => {
    const fn = () => {
      throw new Error("database is locked")
    }
    expect(() => wrapStorage("write shared partition", fn)).toThrow(
      "write shared partition failed: database is locked",
    )
    expect(() => wrapStorage("write shared partition", fn)).toThrow(StorageError)
  })

  test("lets application errors through", () => {
    const fn = () => {
      throw new NotFoundError("label 9 not found")
    }
    expect(() => wrapStorage("remove label", fn)).toThrow(NotFoundError)
  })
})

describe("toErrorPayload", () => {
  test("includes code and hint for app errors", () => {
    expect(toErrorPayload(new ValidationError("bad", "fix it"))).toEqual({
      success: false,
      error: "bad",
      code: "VALIDATION_ERROR",
      hint: "fix it",
    })
  })

  test("omits code for plain errors", () => {
    expect(toErrorPayload(new Error("boom"))).toEqual({
      success: false,
      error: "boom",
    })
  })

  test("stringifies non-errors", () => {
    expect(toErrorPayload("oops")).toEqual({ success: false, error: "oops" })
  })
})

describe("handleError", () => {
  beforeEach(() => {
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${code})`)
    })
    vi.spyOn(console, "error").mockImplementation(() => {})
    vi.spyOn(console, "log").mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  test("prints message and hint in text mode", () => {
    expect(() =>
      handleError(new LimitExceededError("limit 5000 too large", "use --offset"), "text"),
    ).toThrow("process.exit(2)")
    expect(console.error).toHaveBeenCalledWith("Error: limit 5000 too large")
    expect(console.error).toHaveBeenCalledWith("Hint: use --offset")
  })

  test("prints a JSON payload in json mode", () => {
    expect(() => handleError(new NotFoundError("gone"), "json")).toThrow(
      "process.exit(4)",
    )
    expect(console.log).toHaveBeenCalledWith(
      JSON.stringify(
        { success: false, error: "gone", code: "NOT_FOUND" },
        null,
        2,
      ),
    )
  })

  test("exits with 1 for unknown errors", () => {
    expect(() => handleError(new Error("boom"), "text")).toThrow(
      "process.exit(1)",
    )
  })
})
