/**
 * Priority drift — how far each active campaign's share of invested blocks
 * sits from the share its weekly target claims.
 *
 *   expectedShare = target / Σ targets
 *   actualShare   = blocks in window / Σ blocks in window
 *   drift         = actualShare − expectedShare, misaligned when |drift| > 0.15
 *
 * Trend looks at the last four non-overlapping 7-day sub-windows, oldest first.
 */

import type { Campaign } from '../campaigns/schemas.js'
import { BearingError } from '../common/index.js'
import type { AllocationSnapshot } from './snapshot.js'
import { activeCampaigns, indexSnapshot } from './snapshot.js'
import type { SnapshotIndex } from './snapshot.js'
import { MS_PER_WEEK, inWindow, trailingWindow } from './time.js'
import type { TimeWindow } from './time.js'

// ── Types ──

export type DriftTrend = 'improving' | 'worsening' | 'mixed' | 'insufficient_data'

export interface DriftResult {
  campaignId: string
  campaignName: string
  priorityRank: number
  weeklyBlockTarget: number
  blocksInWindow: number
  expectedShare: number
  actualShare: number
  /** Signed: positive means more attention than the target warrants. */
  drift: number
  misaligned: boolean
  /** No work was logged by any campaign in the window. */
  insufficientData: boolean
  trend: DriftTrend
  statement: string
}

export interface DriftReport {
  windowWeeks: number
  windowStart: string
  windowEnd: string
  totalBlocks: number
  insufficientData: boolean
  /** Σ weekly targets is zero, so every expected share is 0. */
  noTargets: boolean
  /** Ordered by |drift| descending, then priority rank. */
  campaigns: Map<string, DriftResult>
  misalignmentStatements: string[]
}

export interface DriftOptions {
  windowWeeks?: number
}

// ── Constants ──

export const DEFAULT_DRIFT_WINDOW_WEEKS = 4
export const MISALIGNMENT_THRESHOLD = 0.15
export const TREND_SUB_WINDOWS = 4

/** Float noise allowance when comparing |drift| values for a trend. */
const TREND_EPSILON = 1e-9

// ── Share arithmetic ──

export interface CampaignShare {
  campaignId: string
  expectedShare: number
  actualShare: number
  drift: number
}

/** Blocks logged per active campaign inside a window. */
function blocksByCampaign(
  campaigns: readonly Campaign[],
  index: SnapshotIndex,
  window: TimeWindow,
): Map<string, number> {
  const blocks = new Map<string, number>()
  for (const campaign of campaigns) {
    let sum = 0
    for (const aar of index.aarsByCampaign.get(campaign.id) ?? []) {
      if (inWindow(aar.createdAt, window)) sum += aar.actualBlocks
    }
    blocks.set(campaign.id, sum)
  }
  return blocks
}

/**
 * Expected/actual shares for one window. Returns null when no campaign
 * logged any work, since actual shares are then undefined.
 */
export function computeShares(
  campaigns: readonly Campaign[],
  blocks: ReadonlyMap<string, number>,
): CampaignShare[] | null {
  const totalBlocks = campaigns.reduce((sum, c) => sum + (blocks.get(c.id) ?? 0), 0)
  if (totalBlocks === 0) return null

  const totalTarget = campaigns.reduce((sum, c) => sum + c.weeklyBlockTarget, 0)
  return campaigns.map((c) => {
    const expectedShare = totalTarget > 0 ? c.weeklyBlockTarget / totalTarget : 0
    const actualShare = (blocks.get(c.id) ?? 0) / totalBlocks
    return { campaignId: c.id, expectedShare, actualShare, drift: actualShare - expectedShare }
  })
}

// ── Trend ──

/**
 * Classify a series of |drift| values, oldest first. Needs at least two
 * points; a flat series counts as improving (non-increasing).
 */
export function classifyTrend(absDrifts: readonly number[]): DriftTrend {
  if (absDrifts.length < 2) return 'insufficient_data'

  let nonIncreasing = true
  let nonDecreasing = true
  for (let i = 1; i < absDrifts.length; i++) {
    if (absDrifts[i] > absDrifts[i - 1] + TREND_EPSILON) nonIncreasing = false
    if (absDrifts[i] < absDrifts[i - 1] - TREND_EPSILON) nonDecreasing = false
  }

  if (nonIncreasing) return 'improving'
  if (nonDecreasing) return 'worsening'
  return 'mixed'
}

// ── Wording ──

export function describeDrift(campaignName: string, drift: number): string {
  const points = Math.round(Math.abs(drift) * 100)
  if (points === 0) {
    return `${campaignName} is getting attention in line with its stated priority`
  }
  const direction = drift > 0 ? 'more' : 'less'
  const unit = points === 1 ? 'percentage point' : 'percentage points'
  return `${campaignName} is getting ${points} ${unit} ${direction} attention than its stated priority warrants`
}

function describeNoData(campaignName: string, windowWeeks: number): string {
  const span = windowWeeks === 1 ? 'week' : `${windowWeeks} weeks`
  return `${campaignName} has no logged work to compare against its stated priority in the last ${span}`
}

// ── Report ──

export function computeDrift(
  snapshot: AllocationSnapshot,
  now: Date,
  options: DriftOptions = {},
): DriftReport {
  const windowWeeks = options.windowWeeks ?? DEFAULT_DRIFT_WINDOW_WEEKS
  if (!Number.isInteger(windowWeeks) || windowWeeks < 1) {
    throw BearingError.validation(`windowWeeks must be a positive integer, got ${windowWeeks}`)
  }

  const index = indexSnapshot(snapshot)
  const campaigns = activeCampaigns(snapshot)
  const nowMs = now.getTime()

  const window = trailingWindow(nowMs, windowWeeks * MS_PER_WEEK)
  const windowBlocks = blocksByCampaign(campaigns, index, window)
  const totalBlocks = [...windowBlocks.values()].reduce((a, b) => a + b, 0)
  const totalTarget = campaigns.reduce((sum, c) => sum + c.weeklyBlockTarget, 0)
  const shares = computeShares(campaigns, windowBlocks)
  const shareById = new Map((shares ?? []).map((s) => [s.campaignId, s]))

  // Sub-window |drift| series, oldest first; empty sub-windows are skipped.
  const trendSeries = new Map<string, number[]>(campaigns.map((c) => [c.id, []]))
  for (let k = TREND_SUB_WINDOWS - 1; k >= 0; k--) {
    const sub = trailingWindow(nowMs - k * MS_PER_WEEK, MS_PER_WEEK)
    const subShares = computeShares(campaigns, blocksByCampaign(campaigns, index, sub))
    if (!subShares) continue
    for (const s of subShares) trendSeries.get(s.campaignId)?.push(Math.abs(s.drift))
  }

  const results: DriftResult[] = campaigns.map((c) => {
    const share = shareById.get(c.id)
    const expectedShare = totalTarget > 0 ? c.weeklyBlockTarget / totalTarget : 0
    const actualShare = share?.actualShare ?? 0
    const drift = share?.drift ?? 0
    const insufficientData = shares === null
    return {
      campaignId: c.id,
      campaignName: c.name,
      priorityRank: c.priorityRank,
      weeklyBlockTarget: c.weeklyBlockTarget,
      blocksInWindow: windowBlocks.get(c.id) ?? 0,
      expectedShare,
      actualShare,
      drift,
      misaligned: !insufficientData && Math.abs(drift) > MISALIGNMENT_THRESHOLD,
      insufficientData,
      trend: classifyTrend(trendSeries.get(c.id) ?? []),
      statement: insufficientData ? describeNoData(c.name, windowWeeks) : describeDrift(c.name, drift),
    }
  })

  results.sort(
    (a, b) =>
      Math.abs(b.drift) - Math.abs(a.drift) ||
      a.priorityRank - b.priorityRank ||
      a.campaignId.localeCompare(b.campaignId),
  )

  return {
    windowWeeks,
    windowStart: new Date(window.startMs).toISOString(),
    windowEnd: new Date(window.endMs).toISOString(),
    totalBlocks,
    insufficientData: shares === null,
    noTargets: totalTarget === 0,
    campaigns: new Map(results.map((r) => [r.campaignId, r])),
    misalignmentStatements: results.filter((r) => r.misaligned).map((r) => r.statement),
  }
}
