/**
 * 5-field cron expressions evaluated in an IANA time zone.
 * Fields: minute (0-59), hour (0-23), day of month (1-31), month (1-12),
 * day of week (0-7, 0 and 7 = Sunday, or sun-sat).
 * Supports: *, numbers, commas, ranges (1-5), steps (*\/2, 10-30/5).
 * Day-of-month and day-of-week must both match.
 */

interface CronFields {
  minute: Set<number>
  hour: Set<number>
  dayOfMonth: Set<number>
  month: Set<number>
  dayOfWeek: Set<number>
}

const FIELD_DEFS = [
  { key: 'minute', name: 'minute', min: 0, max: 59 },
  { key: 'hour', name: 'hour', min: 0, max: 23 },
  { key: 'dayOfMonth', name: 'day of month', min: 1, max: 31 },
  { key: 'month', name: 'month', min: 1, max: 12 },
  { key: 'dayOfWeek', name: 'day of week', min: 0, max: 7 },
] as const

const WEEKDAY_ALIASES: Record<string, number> = {
  sun: 0, mon: 1, tue: 2, wed: 3, thu: 4, fri: 5, sat: 6,
}

const MAX_LOOKBACK_MINUTES = 8 * 24 * 60

function parseNumber(token: string, allowWeekdays: boolean): number {
  const alias = allowWeekdays ? WEEKDAY_ALIASES[token.toLowerCase()] : undefined
  if (alias !== undefined) return alias
  return /^\d+$/.test(token) ? parseInt(token, 10) : NaN
}

function parseField(token: string, min: number, max: number, allowWeekdays: boolean): Set<number> | string {
  const values = new Set<number>()

  for (const part of token.split(',')) {
    const [rangeToken, stepToken, extra] = part.split('/')
    if (extra !== undefined || rangeToken === '') return `invalid value: ${part}`
    const step = stepToken === undefined ? 1 : parseNumber(stepToken, false)
    if (isNaN(step) || step < 1) return `invalid step value: ${stepToken}`

    let low: number
    let high: number
    if (rangeToken === '*') {
      low = min
      high = max
    } else {
      const bounds = rangeToken.split('-')
      if (bounds.length > 2) return `invalid range: ${rangeToken}`
      low = parseNumber(bounds[0], allowWeekdays)
      high = bounds.length === 2 ? parseNumber(bounds[1], allowWeekdays) : low
      if (isNaN(low) || isNaN(high)) return `invalid value: ${rangeToken}`
      if (low > high) return `invalid range: ${rangeToken}`
      // "5/15" means 5, 20, 35, 50
      if (bounds.length === 1 && stepToken !== undefined) high = max
    }

    if (low < min || high > max) {
      return `value out of range (${min}-${max}): ${part}`
    }
    for (let i = low; i <= high; i += step) {
      values.add(allowWeekdays && i === 7 ? 0 : i)
    }
  }

  return values
}

function parseExpression(expression: string): CronFields | string {
  const tokens = expression.trim().split(/\s+/)
  if (tokens.length !== 5) return `expected 5 fields, got ${tokens.length}`

  const sets: Set<number>[] = []
  for (let i = 0; i < FIELD_DEFS.length; i++) {
    const def = FIELD_DEFS[i]
    const result = parseField(tokens[i], def.min, def.max, def.key === 'dayOfWeek')
    if (typeof result === 'string') return `${def.name}: ${result}`
    sets.push(result)
  }
  const [minute, hour, dayOfMonth, month, dayOfWeek] = sets
  return { minute, hour, dayOfMonth, month, dayOfWeek }
}

// ── Zoned calendar fields ──

export interface ZonedParts {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  /** 0 = Sunday */
  weekday: number
}

const formatters = new Map<string, Intl.DateTimeFormat>()
const WEEKDAY_INDEX: Record<string, number> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 }

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      weekday: 'short',
    })
    formatters.set(timeZone, formatter)
  }
  return formatter
}

/** Returns an error message for an unknown time zone, or null. */
export function validateTimeZone(timeZone: string): string | null {
  try {
    formatterFor(timeZone)
    return null
  } catch {
    return `unknown time zone: ${timeZone}`
  }
}

export function zonedParts(date: Date, timeZone: string): ZonedParts {
  const parts: Record<string, string> = {}
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    parts[part.type] = part.value
  }
  return {
    year: parseInt(parts.year, 10),
    month: parseInt(parts.month, 10),
    day: parseInt(parts.day, 10),
    hour: parseInt(parts.hour, 10),
    minute: parseInt(parts.minute, 10),
    weekday: WEEKDAY_INDEX[parts.weekday] ?? 0,
  }
}

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

/** Calendar date (YYYY-MM-DD) of `date` in the zone. */
export function zonedDate(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone)
  return `${p.year}-${pad(p.month)}-${pad(p.day)}`
}

/** Wall-clock minute in the zone, e.g. "2026-03-02T07:00". */
export function minuteKey(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone)
  return `${p.year}-${pad(p.month)}-${pad(p.day)}T${pad(p.hour)}:${pad(p.minute)}`
}

function fieldsMatch(fields: CronFields, p: ZonedParts): boolean {
  return (
    fields.minute.has(p.minute) &&
    fields.hour.has(p.hour) &&
    fields.dayOfMonth.has(p.day) &&
    fields.month.has(p.month) &&
    fields.dayOfWeek.has(p.weekday)
  )
}

// ── Public API ──

/**
 * Returns an error message if the cron expression is invalid, or null if valid.
 */
export function validateCron(expression: string): string | null {
  const result = parseExpression(expression)
  return typeof result === 'string' ? result : null
}

export function matchesCron(expression: string, date: Date, timeZone = 'UTC'): boolean {
  const fields = parseExpression(expression)
  if (typeof fields === 'string') return false
  return fieldsMatch(fields, zonedParts(date, timeZone))
}

/**
 * Most recent matching minute at or before `at`, searching back up to eight
 * days. Null when nothing matches in that range.
 */
export function lastCronMatch(expression: string, at: Date, timeZone = 'UTC'): Date | null {
  const fields = parseExpression(expression)
  if (typeof fields === 'string') return null

  let cursor = Math.floor(at.getTime() / 60_000) * 60_000
  for (let i = 0; i <= MAX_LOOKBACK_MINUTES; i++) {
    const candidate = new Date(cursor)
    if (fieldsMatch(fields, zonedParts(candidate, timeZone))) return candidate
    cursor -= 60_000
  }
  return null
}

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday']

function formatTime(hour: number, minute: number): string {
  return `${pad(hour)}:${pad(minute)}`
}

/**
 * Short description for logs. Expressions outside the common daily and
 * weekly shapes are echoed back.
 */
export function describeHumanReadable(expression: string): string {
  const fields = parseExpression(expression)
  if (typeof fields === 'string') return `Invalid: ${fields}`

  const everyDom = fields.dayOfMonth.size === 31
  const everyMonth = fields.month.size === 12
  const everyDow = fields.dayOfWeek.size === 7
  const minutes = [...fields.minute]
  const hours = [...fields.hour]
  const days = [...fields.dayOfWeek].sort((a, b) => a - b)

  if (minutes.length !== 1 || hours.length !== 1 || !everyDom || !everyMonth) {
    return `Cron: ${expression.trim()}`
  }

  const time = formatTime(hours[0], minutes[0])
  if (everyDow) return `Every day at ${time}`
  const isWeekdays = days.length === 5 && days.every((d) => d >= 1 && d <= 5)
  const dayStr = isWeekdays ? 'weekday' : days.map((d) => DAY_NAMES[d]).join(', ')
  return `Every ${dayStr} at ${time}`
}
