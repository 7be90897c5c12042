/**
 * Day and window arithmetic shared by the allocation algorithms.
 * Every function takes its reference time explicitly.
 */

export const MS_PER_DAY = 86_400_000
export const MS_PER_WEEK = 7 * MS_PER_DAY

/** UTC YYYY-MM-DD for a moment. */
export function isoDate(moment: Date): string {
  return moment.toISOString().slice(0, 10)
}

/** Shift a YYYY-MM-DD date by whole days. */
export function addDays(date: string, days: number): string {
  return new Date(new Date(date + 'T00:00:00Z').getTime() + days * MS_PER_DAY).toISOString().slice(0, 10)
}

/** Whole days elapsed from `fromMs` to `toMs`, never negative. */
export function wholeDaysBetween(fromMs: number, toMs: number): number {
  return Math.max(0, Math.floor((toMs - fromMs) / MS_PER_DAY))
}

/**
 * Trailing window ending at `endMs`: (endMs − lengthMs, endMs].
 * Consecutive windows built this way never overlap.
 */
export interface TimeWindow {
  startMs: number
  endMs: number
}

export function trailingWindow(endMs: number, lengthMs: number): TimeWindow {
  return { startMs: endMs - lengthMs, endMs }
}

export function inWindow(timestamp: string, window: TimeWindow): boolean {
  const ms = new Date(timestamp).getTime()
  return ms > window.startMs && ms <= window.endMs
}
