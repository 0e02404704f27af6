import { describe, expect, test, vi } from "vitest"

import { ValidationError } from "@/errors"
import { BatchPlanner, chunk, placeholders } from "@db/batch"

describe("chunk", () => {
  test("splits into consecutive chunks", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]])
  })

  test("empty input yields no chunks", () => {
    expect(chunk([], 3)).toEqual([])
  })

  test("rejects non-positive sizes", () => {
    expect(() => chunk([1], 0)).toThrow(ValidationError)
    expect(() => chunk([1], -1)).toThrow(ValidationError)
    expect(() => chunk([1], 1.5)).toThrow(ValidationError)
  })
})

describe("placeholders", () => {
  test("joins question marks", () => {
    expect(placeholders(3)).toBe("?, ?, ?")
    expect(placeholders(1)).toBe("?")
  })
})

describe("BatchPlanner", () => {
  const values = (n: number) => Array.from({ length: n }, (_, i) => `id-${i}`)

  test("rejects sizes outside 1..999", () => {
    expect(() => new BatchPlanner(0)).toThrow(ValidationError)
    expect(() => new BatchPlanner(1000)).toThrow(ValidationError)
    expect(new BatchPlanner(999).size).toBe(999)
  })

  test.each([
    [0, 0],
    [1, 1],
    [500, 1],
    [1500, 3],
  ])("collect over %i values runs %i chunks and unions every value", (n, calls) => {
    const planner = new BatchPlanner(500)
    const op = vi.fn((part: string[]) => part)
    const result = planner.collect(values(n), op)

    expect(op).toHaveBeenCalledTimes(calls)
    expect(result).toEqual(new Set(values(n)))
  })

  test("chunks run in index order", () => {
    const planner = new BatchPlanner(2)
    const seen: string[][] = []
    planner.sum(["a", "b", "c", "d", "e"], (part) => {
      seen.push(part)
      return part.length
    })
    expect(seen).toEqual([["a", "b"], ["c", "d"], ["e"]])
  })

  test("sum adds per-chunk counts", () => {
    const planner = new BatchPlanner(500)
    expect(planner.sum(values(1500), (part) => part.length)).toBe(1500)
    expect(planner.sum([], () => 1)).toBe(0)
  })

  test("reserved slots shrink the chunk", () => {
    const planner = new BatchPlanner(500)
    expect(planner.capacity(1)).toBe(499)
    const op = vi.fn((part: string[]) => part.length)
    planner.sum(values(500), op, 1)
    expect(op).toHaveBeenCalledTimes(2)
    expect(op.mock.calls[0][0]).toHaveLength(499)
    expect(op.mock.calls[1][0]).toHaveLength(1)
  })
})
