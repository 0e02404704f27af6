import { InvalidArgumentError } from "commander"
import { z } from "zod"

import { CLASSIFICATIONS, type Classification, isClassification } from "@/types"

export function parsePositiveInt(value: string): number {
  const n = parseInt(value, 10)
  if (isNaN(n) || n < 1) {
    throw new InvalidArgumentError("must be a positive integer")
  }
  return n
}

export function parseNonNegativeInt(value: string): number {
  const n = parseInt(value, 10)
  if (isNaN(n) || n < 0) {
    throw new InvalidArgumentError("must be a non-negative integer")
  }
  return n
}

const isoDate = z.iso.date()

/** Accepts `YYYY-MM-DD`. */
export function parseDate(value: string): string {
  if (!isoDate.safeParse(value).success) {
    throw new InvalidArgumentError("must be a date in YYYY-MM-DD format")
  }
  return value
}

export function parseClassification(value: string): Classification {
  if (!isClassification(value)) {
    throw new InvalidArgumentError(
      `must be one of: ${CLASSIFICATIONS.join(", ")}`,
    )
  }
  return value
}
