/**
 * Small helpers shared by the SQLite repositories.
 */

import { BearingError, messageOf } from './errors.js'

/** DB failures become DB_ERROR; errors already typed keep their code. */
export function toBearingError(e: unknown): BearingError {
  return e instanceof BearingError ? e : BearingError.db(messageOf(e))
}

export function joinIssues(error: { issues: Array<{ message: string }> }): string {
  return error.issues.map((i) => i.message).join('; ')
}

/** Drop keys explicitly set to undefined so a partial update never blanks a column. */
export function stripUndefined<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {}
  for (const key of Object.keys(obj) as Array<keyof T>) {
    if (obj[key] !== undefined) out[key] = obj[key]
  }
  return out
}
