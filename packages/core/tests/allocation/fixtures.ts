import type { Campaign } from '../../src/campaigns/schemas.js'
import type { Mission } from '../../src/missions/schemas.js'
import type { AAR, Sortie } from '../../src/sorties/schemas.js'
import type { AllocationSnapshot } from '../../src/allocation/snapshot.js'
import { MS_PER_DAY } from '../../src/allocation/time.js'

/** Monday, 2 March 2026, midday UTC. */
export const NOW = new Date('2026-03-02T12:00:00.000Z')

export function daysAgo(days: number, from: Date = NOW): string {
  return new Date(from.getTime() - days * MS_PER_DAY).toISOString()
}

export function makeCampaign(overrides: Partial<Campaign> = {}): Campaign {
  return {
    id: 'c1',
    name: 'Campaign',
    description: '',
    status: 'active',
    priorityRank: 1,
    weeklyBlockTarget: 0,
    colour: '#6366f1',
    tags: '',
    targetDate: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}

export function makeMission(overrides: Partial<Mission> = {}): Mission {
  return {
    id: 'm1',
    campaignId: 'c1',
    name: 'Mission',
    description: '',
    status: 'in_progress',
    targetDate: null,
    sortOrder: 0,
    createdAt: '2026-01-01T00:00:00.000Z',
    completedAt: null,
    ...overrides,
  }
}

export function makeSortie(overrides: Partial<Sortie> = {}): Sortie {
  return {
    id: 's1',
    missionId: 'm1',
    title: 'Sortie',
    description: '',
    status: 'queued',
    cognitiveLoad: 'medium',
    estimatedBlocks: 1,
    sortOrder: 0,
    createdAt: '2026-01-01T00:00:00.000Z',
    startedAt: null,
    completedAt: null,
    ...overrides,
  }
}

export function makeAAR(overrides: Partial<AAR> = {}): AAR {
  return {
    id: 'a1',
    sortieId: 's1',
    outcome: 'completed',
    energyBefore: 'green',
    energyAfter: 'green',
    actualBlocks: 1,
    notes: '',
    createdAt: daysAgo(1),
    ...overrides,
  }
}

export function makeSnapshot(parts: Partial<AllocationSnapshot> = {}): AllocationSnapshot {
  return {
    campaigns: parts.campaigns ?? [],
    missions: parts.missions ?? [],
    sorties: parts.sorties ?? [],
    aars: parts.aars ?? [],
  }
}

/**
 * A campaign with one mission (`m-<id>`) and `count` queued sorties
 * (`<id>-s1`, `<id>-s2`, …) in that order.
 */
export function campaignWithQueue(
  campaign: Partial<Campaign> & { id: string },
  count: number,
  sortie: Partial<Sortie> = {},
): Pick<AllocationSnapshot, 'campaigns' | 'missions' | 'sorties'> {
  const missionId = `m-${campaign.id}`
  return {
    campaigns: [makeCampaign({ name: campaign.id, ...campaign })],
    missions: [makeMission({ id: missionId, campaignId: campaign.id, name: `${campaign.id} mission` })],
    sorties: Array.from({ length: count }, (_, i) =>
      makeSortie({
        id: `${campaign.id}-s${i + 1}`,
        missionId,
        title: `${campaign.id} task ${i + 1}`,
        sortOrder: i,
        ...sortie,
      }),
    ),
  }
}

/** Merge partial snapshots. */
export function combine(
  ...parts: Array<Partial<AllocationSnapshot>>
): AllocationSnapshot {
  return {
    campaigns: parts.flatMap((p) => p.campaigns ?? []),
    missions: parts.flatMap((p) => p.missions ?? []),
    sorties: parts.flatMap((p) => p.sorties ?? []),
    aars: parts.flatMap((p) => p.aars ?? []),
  }
}

/** A completed sortie with its AAR, attributed to `missionId`. */
export function loggedWork(
  id: string,
  missionId: string,
  actualBlocks: number,
  createdAt: string,
): Pick<AllocationSnapshot, 'sorties' | 'aars'> {
  return {
    sorties: [makeSortie({ id, missionId, status: 'completed', completedAt: createdAt })],
    aars: [makeAAR({ id: `aar-${id}`, sortieId: id, actualBlocks, createdAt })],
  }
}
