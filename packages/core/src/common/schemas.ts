/**
 * Zod schemas shared by the record modules.
 */

import { z } from 'zod'

export const UUIDSchema = z.string().uuid()

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

/** A real calendar date as YYYY-MM-DD; 2026-02-30 is rejected. */
export const DateStringSchema = z.string().superRefine((value, ctx) => {
  if (!DATE_PATTERN.test(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Date must be YYYY-MM-DD' })
    return
  }
  const parsed = new Date(`${value}T00:00:00.000Z`)
  if (Number.isNaN(parsed.getTime()) || !parsed.toISOString().startsWith(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Date must be a real calendar date' })
  }
})

export const ColourSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Colour must be a #rrggbb hex string')
