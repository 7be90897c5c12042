/**
 * Weekly review — a Sunday-evening look back over the trailing week:
 * scoreboard, mission movement, drift, staleness, energy, rankings and the
 * week ahead.
 */

import type Database from 'better-sqlite3'
import { attempt, toBearingError } from '../common/index.js'
import type { Result, BearingError } from '../common/index.js'
import { CheckInRepository } from '../checkins/repository.js'
import type { DailyCheckIn, EnergyLevel } from '../checkins/schemas.js'
import type { MissionStatus } from '../missions/schemas.js'
import { computeDrift } from '../allocation/drift.js'
import type { DriftResult } from '../allocation/drift.js'
import { healthFromIndex, STALENESS_SENTINEL } from '../allocation/health.js'
import { activeCampaigns, indexSnapshot, loadSnapshot } from '../allocation/snapshot.js'
import type { AllocationSnapshot } from '../allocation/snapshot.js'
import { addDays, isoDate } from '../allocation/time.js'

// ── Types ──

export interface ScoreboardEntry {
  campaignId: string
  name: string
  colour: string
  priorityRank: number
  blocksCompleted: number
  weeklyTarget: number
  /** Rounded percent of target; 0 for a zero target. */
  completionPct: number
}

export interface MissionMove {
  missionId: string
  name: string
  campaignName: string
  oldStatus: MissionStatus
  newStatus: MissionStatus
}

export interface StalenessAlert {
  campaignId: string
  name: string
  days: number
  neverWorked: boolean
}

export interface EnergyDay {
  date: string
  shortDay: string
  level: EnergyLevel
}

export interface EnergyPatterns {
  checkIns: number
  daily: EnergyDay[]
  /** Mean on green=3, yellow=2, red=1, one decimal; 0 without check-ins. */
  average: number
  averageLabel: EnergyLevel | 'none'
}

export interface UpcomingTarget {
  kind: 'campaign' | 'mission'
  name: string
  targetDate: string
}

export interface BlockedSortie {
  sortieId: string
  title: string
  missionName: string
  campaignName: string
}

export interface WeeklyReview {
  date: string
  weekStart: string
  scoreboard: ScoreboardEntry[]
  missionsMoved: MissionMove[]
  driftSummary: DriftResult[]
  stalenessAlerts: StalenessAlert[]
  energyPatterns: EnergyPatterns
  currentRankings: Array<{ campaignId: string; name: string; rank: number }>
  nextWeekPreview: {
    upcomingTargets: UpcomingTarget[]
    blockedSorties: BlockedSortie[]
  }
}

// ── Constants ──

export const STALENESS_ALERT_DAYS = 5
const REVIEW_DAYS = 7
const PREVIEW_DAYS = 8

const ENERGY_VALUES: Record<EnergyLevel, number> = { green: 3, yellow: 2, red: 1 }
const DAY_SHORT_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat']

// ── Sections ──

function energyLabel(mean: number): EnergyLevel {
  const rounded = Math.round(mean)
  if (rounded >= 3) return 'green'
  if (rounded <= 1) return 'red'
  return 'yellow'
}

export function summarizeEnergy(checkIns: readonly DailyCheckIn[]): EnergyPatterns {
  if (checkIns.length === 0) {
    return { checkIns: 0, daily: [], average: 0, averageLabel: 'none' }
  }

  const sorted = checkIns.slice().sort((a, b) => a.date.localeCompare(b.date))
  const total = sorted.reduce((sum, c) => sum + ENERGY_VALUES[c.energyLevel], 0)
  const mean = total / sorted.length

  return {
    checkIns: sorted.length,
    daily: sorted.map((c) => ({
      date: c.date,
      shortDay: DAY_SHORT_NAMES[new Date(c.date + 'T00:00:00Z').getUTCDay()],
      level: c.energyLevel,
    })),
    average: Math.round(mean * 10) / 10,
    averageLabel: energyLabel(mean),
  }
}

/**
 * Build the review for the week ending at `now`. The week starts at UTC
 * midnight seven days before today.
 */
export function generateWeeklyReview(
  snapshot: AllocationSnapshot,
  checkIns: readonly DailyCheckIn[],
  now: Date,
): WeeklyReview {
  const today = isoDate(now)
  const weekStart = addDays(today, -REVIEW_DAYS)
  const cutoffMs = new Date(weekStart + 'T00:00:00Z').getTime()
  const nowMs = now.getTime()
  const index = indexSnapshot(snapshot)
  const campaigns = activeCampaigns(snapshot)

  const sinceCutoff = (timestamp: string | null): boolean => {
    if (!timestamp) return false
    const ms = new Date(timestamp).getTime()
    return ms >= cutoffMs && ms <= nowMs
  }

  // 1. Scoreboard
  const scoreboard = campaigns.map((c): ScoreboardEntry => {
    const blocks = (index.aarsByCampaign.get(c.id) ?? [])
      .filter((a) => sinceCutoff(a.createdAt))
      .reduce((sum, a) => sum + a.actualBlocks, 0)
    return {
      campaignId: c.id,
      name: c.name,
      colour: c.colour,
      priorityRank: c.priorityRank,
      blocksCompleted: blocks,
      weeklyTarget: c.weeklyBlockTarget,
      completionPct: c.weeklyBlockTarget > 0 ? Math.round((blocks / c.weeklyBlockTarget) * 100) : 0,
    }
  })

  // 2. Missions moved
  const campaignName = (id: string): string => index.campaignById.get(id)?.name ?? 'Unknown'
  const completed = snapshot.missions.filter((m) => m.status === 'completed' && sinceCutoff(m.completedAt))
  const completedIds = new Set(completed.map((m) => m.id))
  const started = snapshot.missions.filter(
    (m) => m.status === 'in_progress' && sinceCutoff(m.createdAt) && !completedIds.has(m.id),
  )
  const missionsMoved: MissionMove[] = [
    ...completed.map((m): MissionMove => ({
      missionId: m.id,
      name: m.name,
      campaignName: campaignName(m.campaignId),
      oldStatus: 'in_progress',
      newStatus: m.status,
    })),
    ...started.map((m): MissionMove => ({
      missionId: m.id,
      name: m.name,
      campaignName: campaignName(m.campaignId),
      oldStatus: 'not_started',
      newStatus: m.status,
    })),
  ]

  // 3. Drift over the week
  const driftSummary = [...computeDrift(snapshot, now, { windowWeeks: 1 }).campaigns.values()]

  // 4. Staleness
  const stalenessAlerts: StalenessAlert[] = []
  for (const c of campaigns) {
    const { staleness } = healthFromIndex(c, index, now)
    if (staleness > STALENESS_ALERT_DAYS) {
      stalenessAlerts.push({
        campaignId: c.id,
        name: c.name,
        days: staleness,
        neverWorked: staleness === STALENESS_SENTINEL,
      })
    }
  }

  // 5. Energy
  const energyPatterns = summarizeEnergy(checkIns.filter((c) => c.date >= weekStart && c.date <= today))

  // 6. Rankings
  const currentRankings = campaigns.map((c) => ({ campaignId: c.id, name: c.name, rank: c.priorityRank }))

  // 7. Next week
  const previewStart = addDays(today, 1)
  const previewEnd = addDays(today, PREVIEW_DAYS)
  const inPreview = (date: string | null): date is string =>
    date !== null && date >= previewStart && date <= previewEnd

  const upcomingTargets: UpcomingTarget[] = []
  const blockedSorties: BlockedSortie[] = []
  for (const c of campaigns) {
    if (inPreview(c.targetDate)) {
      upcomingTargets.push({ kind: 'campaign', name: c.name, targetDate: c.targetDate })
    }
    for (const m of index.missionsByCampaign.get(c.id) ?? []) {
      if (inPreview(m.targetDate)) {
        upcomingTargets.push({ kind: 'mission', name: `${c.name} > ${m.name}`, targetDate: m.targetDate })
      }
    }
  }
  upcomingTargets.sort((a, b) => a.targetDate.localeCompare(b.targetDate) || a.name.localeCompare(b.name))

  const activeIds = new Set(campaigns.map((c) => c.id))
  for (const s of snapshot.sorties) {
    if (s.status !== 'queued' && s.status !== 'active') continue
    const mission = index.missionById.get(s.missionId)
    if (!mission || mission.status !== 'blocked' || !activeIds.has(mission.campaignId)) continue
    blockedSorties.push({
      sortieId: s.id,
      title: s.title,
      missionName: mission.name,
      campaignName: campaignName(mission.campaignId),
    })
  }

  return {
    date: today,
    weekStart,
    scoreboard,
    missionsMoved,
    driftSummary,
    stalenessAlerts,
    energyPatterns,
    currentRankings,
    nextWeekPreview: { upcomingTargets, blockedSorties },
  }
}

export function computeWeeklyReview(db: Database.Database, now: Date): Result<WeeklyReview, BearingError> {
  const snapshot = loadSnapshot(db)
  if (!snapshot.ok) return snapshot

  const today = isoDate(now)
  const checkIns = new CheckInRepository(db).listRange(addDays(today, -REVIEW_DAYS), today)
  if (!checkIns.ok) return checkIns

  return attempt(() => generateWeeklyReview(snapshot.value, checkIns.value, now), toBearingError)
}
