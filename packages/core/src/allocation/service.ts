/**
 * DB-bound entry points: load one snapshot, run the pure algorithm, return a Result.
 */

import type Database from 'better-sqlite3'
import { z } from 'zod'
import { Ok, Err, BearingError, attempt, joinIssues, toBearingError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CheckInRepository } from '../checkins/repository.js'
import { EnergyLevelSchema } from '../checkins/schemas.js'
import type { EnergyLevel } from '../checkins/schemas.js'
import { generateBriefing, routeSingle } from './briefing.js'
import type { BriefingItem, BriefingOptions } from './briefing.js'
import { computeDrift } from './drift.js'
import type { DriftOptions, DriftReport } from './drift.js'
import { getDashboardData } from './health.js'
import type { DashboardEntry } from './health.js'
import { loadSnapshot } from './snapshot.js'
import type { AllocationSnapshot } from './snapshot.js'

export const BriefingRequestSchema = z.object({
  energyLevel: EnergyLevelSchema,
  availableBlocks: z.number().int().min(0, 'Available blocks cannot be negative'),
})

export type BriefingRequest = z.infer<typeof BriefingRequestSchema>

function withSnapshot<T>(
  db: Database.Database,
  compute: (snapshot: AllocationSnapshot) => T,
): Result<T, BearingError> {
  const snapshot = loadSnapshot(db)
  if (!snapshot.ok) return snapshot
  return attempt(() => compute(snapshot.value), toBearingError)
}

export function computeDashboard(
  db: Database.Database,
  now: Date,
): Result<Map<string, DashboardEntry>, BearingError> {
  return withSnapshot(db, (snapshot) => getDashboardData(snapshot, now))
}

export function computeBriefing(
  db: Database.Database,
  request: unknown,
  now: Date,
  options?: BriefingOptions,
): Result<BriefingItem[], BearingError> {
  const parsed = BriefingRequestSchema.safeParse(request)
  if (!parsed.success) {
    return Err(BearingError.validation(joinIssues(parsed.error)))
  }
  const { energyLevel, availableBlocks } = parsed.data
  return withSnapshot(db, (snapshot) => generateBriefing(energyLevel, availableBlocks, snapshot, now, options))
}

export function computeRoute(
  db: Database.Database,
  energyLevel: unknown,
  now: Date,
  options?: BriefingOptions,
): Result<BriefingItem | null, BearingError> {
  const parsed = EnergyLevelSchema.safeParse(energyLevel)
  if (!parsed.success) {
    return Err(BearingError.validation(joinIssues(parsed.error)))
  }
  const energy = parsed.data
  return withSnapshot(db, (snapshot) => routeSingle(energy, snapshot, now, options))
}

export function computeDriftReport(
  db: Database.Database,
  now: Date,
  options?: DriftOptions,
): Result<DriftReport, BearingError> {
  return withSnapshot(db, (snapshot) => computeDrift(snapshot, now, options))
}

// ── Day capacity ──

export interface DayCapacity {
  energyLevel: EnergyLevel
  availableBlocks: number
  fromCheckIn: boolean
}

/**
 * Today's check-in if there is one, otherwise the caller's defaults. The
 * allocator itself never guesses capacity.
 */
export function resolveDayCapacity(
  db: Database.Database,
  date: string,
  defaults: BriefingRequest,
): Result<DayCapacity, BearingError> {
  const checkIn = new CheckInRepository(db).getByDate(date)
  if (!checkIn.ok) return checkIn
  if (checkIn.value) {
    return Ok({
      energyLevel: checkIn.value.energyLevel,
      availableBlocks: checkIn.value.availableBlocks,
      fromCheckIn: true,
    })
  }
  return Ok({ ...defaults, fromCheckIn: false })
}
