/**
 * Urgency — one signed scalar per campaign for allocation order.
 *
 *   urgency = (weeklyBlockTarget − velocity) × priorityWeight + min(staleness, 999) × 0.5
 *
 * The deficit term is not clamped: a campaign ahead of target scores below
 * zero on it, but enough staleness can still lift it above a neglected
 * lower-priority campaign.
 */

import type { Campaign } from '../campaigns/schemas.js'
import { STALENESS_SENTINEL } from './health.js'

/** Maps a 1-indexed priority rank to a weight that strictly decreases as rank grows. */
export type PriorityWeighting = (priorityRank: number, activeCampaignCount: number) => number

/** 1 / rank. */
export const reciprocalWeighting: PriorityWeighting = (rank) => 1 / rank

/** (n − rank + 1) / n, floored at 1 / n for ranks beyond the active count. */
export const linearWeighting: PriorityWeighting = (rank, n) => {
  const count = Math.max(n, 1)
  return Math.max(count - rank + 1, 1) / count
}

export const STALENESS_WEIGHT = 0.5

export interface UrgencyOptions {
  weighting?: PriorityWeighting
  /** Active campaign count passed to the weighting; only `linearWeighting` reads it. */
  activeCampaignCount?: number
}

export function computeUrgencyScore(
  campaign: Pick<Campaign, 'priorityRank' | 'weeklyBlockTarget'>,
  velocity: number,
  stalenessDays: number,
  options: UrgencyOptions = {},
): number {
  const weighting = options.weighting ?? reciprocalWeighting
  const priorityWeight = weighting(campaign.priorityRank, options.activeCampaignCount ?? 1)
  const deficit = campaign.weeklyBlockTarget - velocity
  return deficit * priorityWeight + Math.min(stalenessDays, STALENESS_SENTINEL) * STALENESS_WEIGHT
}
