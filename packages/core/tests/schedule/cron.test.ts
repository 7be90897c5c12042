import { describe, it, expect } from 'vitest'
import {
  validateCron,
  matchesCron,
  lastCronMatch,
  describeHumanReadable,
  validateTimeZone,
  zonedDate,
  minuteKey,
} from '../../src/schedule/cron.js'

describe('validateCron', () => {
  it('accepts standard expressions', () => {
    expect(validateCron('0 7 * * *')).toBeNull()
    expect(validateCron('*/15 9-17 * * 1-5')).toBeNull()
    expect(validateCron('0 18 * * sun')).toBeNull()
    expect(validateCron('0,30 8 1 1-12/2 7')).toBeNull()
  })

  it('requires five fields', () => {
    expect(validateCron('0 7 * *')).toBe('expected 5 fields, got 4')
  })

  it('rejects out-of-range values', () => {
    expect(validateCron('60 * * * *')).toBe('minute: value out of range (0-59): 60')
    expect(validateCron('0 24 * * *')).toBe('hour: value out of range (0-23): 24')
  })

  it('rejects a zero step', () => {
    expect(validateCron('*/0 * * * *')).toBe('minute: invalid step value: 0')
  })

  it('rejects reversed ranges and junk', () => {
    expect(validateCron('0 9-5 * * *')).toBe('hour: invalid range: 9-5')
    expect(validateCron('0 x * * *')).toBe('hour: invalid value: x')
  })
})

describe('matchesCron', () => {
  it('matches the scheduled minute in UTC by default', () => {
    expect(matchesCron('0 7 * * *', new Date('2026-03-02T07:00:00Z'))).toBe(true)
    expect(matchesCron('0 7 * * *', new Date('2026-03-02T07:00:59Z'))).toBe(true)
    expect(matchesCron('0 7 * * *', new Date('2026-03-02T07:01:00Z'))).toBe(false)
  })

  it('evaluates in the given time zone', () => {
    // 07:00 in Auckland (UTC+13 in March) is 18:00 UTC the day before
    const at = new Date('2026-03-01T18:00:00Z')
    expect(matchesCron('0 7 * * *', at, 'Pacific/Auckland')).toBe(true)
    expect(matchesCron('0 7 * * *', at, 'UTC')).toBe(false)
  })

  it('treats 0, 7 and sun as Sunday', () => {
    const sunday = new Date('2026-03-01T18:00:00Z')
    expect(matchesCron('0 18 * * 0', sunday)).toBe(true)
    expect(matchesCron('0 18 * * 7', sunday)).toBe(true)
    expect(matchesCron('0 18 * * sun', sunday)).toBe(true)
    expect(matchesCron('0 18 * * 1', sunday)).toBe(false)
  })

  it('expands steps from a starting value', () => {
    expect(matchesCron('5/20 * * * *', new Date('2026-03-02T10:45:00Z'))).toBe(true)
    expect(matchesCron('5/20 * * * *', new Date('2026-03-02T10:40:00Z'))).toBe(false)
  })

  it('never matches an invalid expression', () => {
    expect(matchesCron('bad', new Date('2026-03-02T07:00:00Z'))).toBe(false)
  })
})

describe('lastCronMatch', () => {
  it('finds the most recent matching minute', () => {
    const match = lastCronMatch('0 7 * * *', new Date('2026-03-02T12:34:56Z'))
    expect(match?.toISOString()).toBe('2026-03-02T07:00:00.000Z')
  })

  it('includes the current minute', () => {
    const match = lastCronMatch('0 7 * * *', new Date('2026-03-02T07:00:30Z'))
    expect(match?.toISOString()).toBe('2026-03-02T07:00:00.000Z')
  })

  it('reaches back to last week', () => {
    const match = lastCronMatch('0 18 * * 0', new Date('2026-03-07T09:00:00Z'))
    expect(match?.toISOString()).toBe('2026-03-01T18:00:00.000Z')
  })

  it('respects the time zone', () => {
    const match = lastCronMatch('0 7 * * *', new Date('2026-03-02T12:00:00Z'), 'Pacific/Auckland')
    expect(match?.toISOString()).toBe('2026-03-01T18:00:00.000Z')
  })

  it('returns null when nothing matched recently', () => {
    expect(lastCronMatch('0 7 1 1 *', new Date('2026-03-02T12:00:00Z'))).toBeNull()
    expect(lastCronMatch('bad', new Date('2026-03-02T12:00:00Z'))).toBeNull()
  })
})

describe('describeHumanReadable', () => {
  it('describes daily and weekly schedules', () => {
    expect(describeHumanReadable('0 7 * * *')).toBe('Every day at 07:00')
    expect(describeHumanReadable('0 18 * * 0')).toBe('Every Sunday at 18:00')
    expect(describeHumanReadable('30 8 * * 1-5')).toBe('Every weekday at 08:30')
    expect(describeHumanReadable('0 9 * * 1,3')).toBe('Every Monday, Wednesday at 09:00')
  })

  it('echoes other shapes', () => {
    expect(describeHumanReadable('*/15 * * * *')).toBe('Cron: */15 * * * *')
  })

  it('reports invalid expressions', () => {
    expect(describeHumanReadable('bad')).toBe('Invalid: expected 5 fields, got 1')
  })
})

describe('time zone helpers', () => {
  it('validates zone names', () => {
    expect(validateTimeZone('Europe/London')).toBeNull()
    expect(validateTimeZone('Mars/Olympus')).toBe('unknown time zone: Mars/Olympus')
  })

  it('gives the local calendar date', () => {
    const at = new Date('2026-03-01T18:00:00Z')
    expect(zonedDate(at, 'UTC')).toBe('2026-03-01')
    expect(zonedDate(at, 'Pacific/Auckland')).toBe('2026-03-02')
  })

  it('keys wall-clock minutes', () => {
    expect(minuteKey(new Date('2026-03-02T07:05:42Z'), 'UTC')).toBe('2026-03-02T07:05')
  })
})
