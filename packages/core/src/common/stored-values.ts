/**
 * Boundary checks for values read back from SQLite.
 *
 * Rows are trusted for shape but not for closed sets or ranges: a tag the schema
 * does not know is reported, never coerced.
 */

import type { z } from 'zod'
import { BearingError } from './errors.js'

export function parseStoredEnum<T extends [string, ...string[]]>(
  schema: z.ZodEnum<T>,
  value: string,
  context: string,
): T[number] {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw BearingError.integrity(
      `${context}: unexpected value '${value}' (expected one of ${schema.options.join(', ')})`,
    )
  }
  return parsed.data
}

/** Integer column with a lower bound, e.g. priority_rank >= 1 or estimated_blocks >= 1. */
export function parseStoredInt(value: number, min: number, context: string): number {
  if (!Number.isInteger(value) || value < min) {
    throw BearingError.integrity(`${context}: expected an integer >= ${min}, got ${value}`)
  }
  return value
}
