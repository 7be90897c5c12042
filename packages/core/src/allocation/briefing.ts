/**
 * Briefing allocator — picks the day's sorties.
 *
 * 1. Energy gate: only loads the day's energy allows are eligible.
 * 2. Campaigns with eligible queued work are ordered by urgency (desc), then
 *    priority rank, earliest sortie creation, id. Sorties keep their manual
 *    queue order inside a campaign.
 * 3. Greedy fill: a campaign may take at most floor(0.6 × capacity) blocks
 *    unless it is the only campaign with eligible work; nothing may exceed
 *    total capacity. A sortie that does not fit is skipped, not a stop.
 */

import type { EnergyLevel } from '../checkins/schemas.js'
import type { Campaign } from '../campaigns/schemas.js'
import { BearingError } from '../common/index.js'
import type { CognitiveLoad, Sortie } from '../sorties/schemas.js'
import { healthFromIndex } from './health.js'
import type { AllocationSnapshot, SnapshotIndex } from './snapshot.js'
import { activeCampaigns, compareQueueOrder, indexSnapshot } from './snapshot.js'
import { computeUrgencyScore } from './urgency.js'
import type { PriorityWeighting } from './urgency.js'

// ── Types ──

export interface BriefingItem {
  sortie: Sortie
  campaignId: string
  campaignName: string
  campaignColour: string
  missionId: string
  missionName: string
  urgency: number
}

export interface BriefingOptions {
  weighting?: PriorityWeighting
}

/** One campaign's eligible queue, ready for allocation. */
export interface CampaignQueue {
  campaign: Campaign
  urgency: number
  items: BriefingItem[]
}

// ── Energy gate ──

export const ENERGY_ALLOWED_LOADS: Record<EnergyLevel, ReadonlySet<CognitiveLoad>> = {
  green: new Set<CognitiveLoad>(['deep', 'medium', 'light']),
  yellow: new Set<CognitiveLoad>(['medium', 'light']),
  red: new Set<CognitiveLoad>(['light']),
}

export function isEligible(load: CognitiveLoad, energy: EnergyLevel): boolean {
  return ENERGY_ALLOWED_LOADS[energy].has(load)
}

// ── Fairness cap ──

export const CAMPAIGN_SHARE_CAP = 0.6

const ROUTE_CAPACITY = 1

/** Per-campaign block limit; the cap only applies when work is contested. */
export function campaignBlockCap(availableBlocks: number, campaignsWithWork: number): number {
  if (campaignsWithWork <= 1) return availableBlocks
  return Math.floor(CAMPAIGN_SHARE_CAP * availableBlocks)
}

// ── Ordering ──

function buildQueues(
  energy: EnergyLevel,
  snapshot: AllocationSnapshot,
  index: SnapshotIndex,
  now: Date,
  options: BriefingOptions,
): CampaignQueue[] {
  const active = activeCampaigns(snapshot)
  const byQueueOrder = compareQueueOrder(index)

  const eligibleByCampaign = new Map<string, Sortie[]>()
  for (const sortie of snapshot.sorties) {
    if (sortie.status !== 'queued' || !isEligible(sortie.cognitiveLoad, energy)) continue
    const campaignId = index.campaignIdBySortie.get(sortie.id)
    if (!campaignId) continue
    const list = eligibleByCampaign.get(campaignId)
    if (list) list.push(sortie)
    else eligibleByCampaign.set(campaignId, [sortie])
  }

  const queues: Array<CampaignQueue & { firstCreatedAt: string }> = []
  for (const campaign of active) {
    const sorties = eligibleByCampaign.get(campaign.id)
    if (!sorties || sorties.length === 0) continue

    const health = healthFromIndex(campaign, index, now)
    const urgency = computeUrgencyScore(campaign, health.velocity, health.staleness, {
      weighting: options.weighting,
      activeCampaignCount: active.length,
    })

    const ordered = sorties.slice().sort(byQueueOrder)
    const items = ordered.map((sortie): BriefingItem => {
      const mission = index.missionById.get(sortie.missionId)
      return {
        sortie,
        campaignId: campaign.id,
        campaignName: campaign.name,
        campaignColour: campaign.colour,
        missionId: sortie.missionId,
        missionName: mission?.name ?? '',
        urgency,
      }
    })

    const firstCreatedAt = ordered.reduce(
      (min, s) => (s.createdAt < min ? s.createdAt : min),
      ordered[0].createdAt,
    )
    queues.push({ campaign, urgency, items, firstCreatedAt })
  }

  queues.sort(
    (a, b) =>
      b.urgency - a.urgency ||
      a.campaign.priorityRank - b.campaign.priorityRank ||
      a.firstCreatedAt.localeCompare(b.firstCreatedAt) ||
      a.campaign.id.localeCompare(b.campaign.id),
  )

  return queues.map(({ campaign, urgency, items }) => ({ campaign, urgency, items }))
}

/** Campaign queues with eligible work, in allocation order. */
export function rankCampaignQueues(
  energy: EnergyLevel,
  snapshot: AllocationSnapshot,
  now: Date,
  options: BriefingOptions = {},
): CampaignQueue[] {
  return buildQueues(energy, snapshot, indexSnapshot(snapshot), now, options)
}

// ── Allocation ──

/**
 * The day's briefing in presentation order (urgency-major, queue-order-minor).
 * Empty when there is no capacity or no eligible work.
 */
export function generateBriefing(
  energy: EnergyLevel,
  availableBlocks: number,
  snapshot: AllocationSnapshot,
  now: Date,
  options: BriefingOptions = {},
): BriefingItem[] {
  if (!Number.isInteger(availableBlocks) || availableBlocks < 0) {
    throw BearingError.validation(`availableBlocks must be a non-negative integer, got ${availableBlocks}`)
  }
  if (availableBlocks === 0) return []

  const queues = rankCampaignQueues(energy, snapshot, now, options)
  const cap = campaignBlockCap(availableBlocks, queues.length)

  const selected: BriefingItem[] = []
  let used = 0

  for (const queue of queues) {
    let taken = 0
    for (const item of queue.items) {
      if (used === availableBlocks) return selected
      const blocks = item.sortie.estimatedBlocks
      if (taken + blocks > cap) continue
      if (used + blocks > availableBlocks) continue
      selected.push(item)
      taken += blocks
      used += blocks
    }
  }

  return selected
}

/**
 * The single best thing to do now: the allocator's first pick at a capacity
 * of one block, with no fairness cap. Larger sorties are passed over; null
 * when no eligible sortie fits in one block.
 */
export function routeSingle(
  energy: EnergyLevel,
  snapshot: AllocationSnapshot,
  now: Date,
  options: BriefingOptions = {},
): BriefingItem | null {
  for (const queue of rankCampaignQueues(energy, snapshot, now, options)) {
    const item = queue.items.find((i) => i.sortie.estimatedBlocks <= ROUTE_CAPACITY)
    if (item) return item
  }
  return null
}
