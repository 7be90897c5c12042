/**
 * Campaign health — velocity, staleness and adherence to the weekly target,
 * folded into a traffic-light state.
 *
 * Classification is evaluated in order, first match wins:
 *   green   adherence >= 0.8 AND staleness <= 3
 *   red     adherence <  0.4 AND staleness >  7
 *   yellow  otherwise
 */

import type { Campaign } from '../campaigns/schemas.js'
import type { AAR } from '../sorties/schemas.js'
import type { AllocationSnapshot, SnapshotIndex } from './snapshot.js'
import { activeCampaigns, compareQueueOrder, indexSnapshot } from './snapshot.js'
import { MS_PER_WEEK, inWindow, trailingWindow, wholeDaysBetween } from './time.js'

// ── Types ──

export type HealthState = 'green' | 'yellow' | 'red'

export interface HealthResult {
  campaignId: string
  health: HealthState
  /** Blocks invested in the trailing 7 days. */
  velocity: number
  /** Whole days since the last AAR; STALENESS_SENTINEL when there is none. */
  staleness: number
  adherenceRatio: number
}

export interface DashboardEntry extends HealthResult {
  name: string
  colour: string
  priorityRank: number
  weeklyBlockTarget: number
  missionsCompleted: number
  missionsTotal: number
  nextSortieTitle: string | null
}

// ── Constants ──

/** Stands in for "never worked on"; larger than every staleness threshold. */
export const STALENESS_SENTINEL = 999

export const HEALTH_THRESHOLDS = {
  greenAdherence: 0.8,
  greenMaxStaleness: 3,
  redAdherence: 0.4,
  redMinStaleness: 7,
} as const

// ── Metrics ──

/** Sum of actual blocks from reports in (now − 7d, now]. */
export function computeVelocity(aars: readonly AAR[], now: Date): number {
  const window = trailingWindow(now.getTime(), MS_PER_WEEK)
  let total = 0
  for (const aar of aars) {
    if (inWindow(aar.createdAt, window)) total += aar.actualBlocks
  }
  return total
}

/** Whole days since the most recent report at or before `now`. */
export function computeStaleness(aars: readonly AAR[], now: Date): number {
  const nowMs = now.getTime()
  let latestMs = -Infinity
  for (const aar of aars) {
    const ms = new Date(aar.createdAt).getTime()
    if (ms <= nowMs && ms > latestMs) latestMs = ms
  }
  if (latestMs === -Infinity) return STALENESS_SENTINEL
  return wholeDaysBetween(latestMs, nowMs)
}

/** velocity / target; a zero-target campaign cannot be behind, so 1.0. */
export function computeAdherence(velocity: number, weeklyBlockTarget: number): number {
  if (weeklyBlockTarget === 0) return 1
  return velocity / weeklyBlockTarget
}

export function classifyHealth(adherenceRatio: number, staleness: number): HealthState {
  const t = HEALTH_THRESHOLDS
  if (adherenceRatio >= t.greenAdherence && staleness <= t.greenMaxStaleness) return 'green'
  if (adherenceRatio < t.redAdherence && staleness > t.redMinStaleness) return 'red'
  return 'yellow'
}

// ── Per-campaign ──

export function healthFromIndex(campaign: Campaign, index: SnapshotIndex, now: Date): HealthResult {
  const aars = index.aarsByCampaign.get(campaign.id) ?? []
  const velocity = computeVelocity(aars, now)
  const staleness = computeStaleness(aars, now)
  const adherenceRatio = computeAdherence(velocity, campaign.weeklyBlockTarget)
  return {
    campaignId: campaign.id,
    health: classifyHealth(adherenceRatio, staleness),
    velocity,
    staleness,
    adherenceRatio,
  }
}

export function computeCampaignHealth(
  campaign: Campaign,
  snapshot: AllocationSnapshot,
  now: Date,
): HealthResult {
  return healthFromIndex(campaign, indexSnapshot(snapshot), now)
}

/** Health for every active campaign, keyed by id, in priority order. */
export function getDashboardData(snapshot: AllocationSnapshot, now: Date): Map<string, DashboardEntry> {
  const index = indexSnapshot(snapshot)
  const dashboard = new Map<string, DashboardEntry>()

  for (const campaign of activeCampaigns(snapshot)) {
    const missions = index.missionsByCampaign.get(campaign.id) ?? []
    const missionIds = new Set(missions.map((m) => m.id))
    const nextSortie = snapshot.sorties
      .filter((s) => s.status === 'queued' && missionIds.has(s.missionId))
      .sort(compareQueueOrder(index))[0]

    dashboard.set(campaign.id, {
      ...healthFromIndex(campaign, index, now),
      name: campaign.name,
      colour: campaign.colour,
      priorityRank: campaign.priorityRank,
      weeklyBlockTarget: campaign.weeklyBlockTarget,
      missionsCompleted: missions.filter((m) => m.status === 'completed').length,
      missionsTotal: missions.length,
      nextSortieTitle: nextSortie?.title ?? null,
    })
  }

  return dashboard
}
