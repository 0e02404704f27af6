import { ValidationError } from "@/errors"

/** SQLite's default SQLITE_MAX_VARIABLE_NUMBER. */
export const SQLITE_PARAMETER_LIMIT = 999

/** Default chunk ceiling, comfortably under the engine limit. */
export const DEFAULT_CHUNK_SIZE = 500

/**
 * Splits values into consecutive chunks of at most `size` items.
 * Empty input yields no chunks.
 */
export function chunk<T>(values: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new ValidationError(
      `chunk size must be a positive integer, got ${size}`,
    )
  }
  const chunks: T[][] = []
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size))
  }
  return chunks
}

/** Comma-separated `?` placeholders for an IN-list of `count` values. */
export function placeholders(count: number): string {
  return Array.from({ length: count }, () => "?").join(", ")
}

/**
 * Plans and runs chunked statements against the engine's bound-parameter
 * ceiling. Chunks run sequentially in index order.
 */
export class BatchPlanner {
  readonly size: number

  /** @param size - Maximum parameters per chunk. */
  constructor(size: number = DEFAULT_CHUNK_SIZE) {
    if (!Number.isInteger(size) || size < 1 || size > SQLITE_PARAMETER_LIMIT) {
      throw new ValidationError(
        `batch size must be an integer between 1 and ${SQLITE_PARAMETER_LIMIT}, got ${size}`,
      )
    }
    this.size = size
  }

  /**
   * Chunk ceiling left after `reserved` fixed parameters are bound alongside
   * each chunk (e.g. a label value or a LIMIT).
   */
  capacity(reserved: number = 0): number {
    return Math.max(1, this.size - reserved)
  }

  /**
   * Runs `op` once per chunk and folds the results with `combine`.
   * `op` is not invoked for empty input.
   */
  run<T, R, A>(
    values: readonly T[],
    op: (chunk: T[]) => R,
    combine: (acc: A, result: R) => A,
    initial: A,
    reserved: number = 0,
  ): A {
    let acc = initial
    for (const part of chunk(values, this.capacity(reserved))) {
      acc = combine(acc, op(part))
    }
    return acc
  }

  /** Read form: the union of every chunk's result rows. */
  collect<T, V>(
    values: readonly T[],
    op: (chunk: T[]) => Iterable<V>,
    reserved: number = 0,
  ): Set<V> {
    return this.run(
      values,
      op,
      (acc: Set<V>, rows) => {
        for (const row of rows) acc.add(row)
        return acc
      },
      new Set<V>(),
      reserved,
    )
  }

  /** Write form: the sum of every chunk's affected row count. */
  sum<T>(
    values: readonly T[],
    op: (chunk: T[]) => number,
    reserved: number = 0,
  ): number {
    return this.run(values, op, (acc: number, n) => acc + n, 0, reserved)
  }
}
