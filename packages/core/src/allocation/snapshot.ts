/**
 * Allocation snapshot — every record the algorithms read, taken at one point
 * in time. Loading runs inside a single read transaction so counts and
 * reports agree with each other.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, toBearingError } from '../common/index.js'
import type { Result, BearingError } from '../common/index.js'
import { rowToCampaign } from '../campaigns/repository.js'
import type { CampaignRow } from '../campaigns/repository.js'
import type { Campaign } from '../campaigns/schemas.js'
import { rowToMission } from '../missions/repository.js'
import type { MissionRow } from '../missions/repository.js'
import type { Mission } from '../missions/schemas.js'
import { rowToSortie } from '../sorties/repository.js'
import type { SortieRow } from '../sorties/repository.js'
import { rowToAAR } from '../sorties/aar-repository.js'
import type { AARRow } from '../sorties/aar-repository.js'
import type { AAR, Sortie } from '../sorties/schemas.js'

export interface AllocationSnapshot {
  campaigns: Campaign[]
  missions: Mission[]
  sorties: Sortie[]
  aars: AAR[]
}

/** Lookup tables over a snapshot, keyed by id. */
export interface SnapshotIndex {
  campaignById: Map<string, Campaign>
  missionById: Map<string, Mission>
  /** Campaign owning each sortie, through its mission. */
  campaignIdBySortie: Map<string, string>
  aarsByCampaign: Map<string, AAR[]>
  missionsByCampaign: Map<string, Mission[]>
}

export function indexSnapshot(snapshot: AllocationSnapshot): SnapshotIndex {
  const campaignById = new Map(snapshot.campaigns.map((c) => [c.id, c]))
  const missionById = new Map(snapshot.missions.map((m) => [m.id, m]))

  const missionsByCampaign = new Map<string, Mission[]>()
  for (const m of snapshot.missions) {
    const list = missionsByCampaign.get(m.campaignId)
    if (list) list.push(m)
    else missionsByCampaign.set(m.campaignId, [m])
  }

  const campaignIdBySortie = new Map<string, string>()
  for (const s of snapshot.sorties) {
    const mission = missionById.get(s.missionId)
    if (mission) campaignIdBySortie.set(s.id, mission.campaignId)
  }

  const aarsByCampaign = new Map<string, AAR[]>()
  for (const aar of snapshot.aars) {
    const campaignId = campaignIdBySortie.get(aar.sortieId)
    if (!campaignId) continue
    const list = aarsByCampaign.get(campaignId)
    if (list) list.push(aar)
    else aarsByCampaign.set(campaignId, [aar])
  }

  return { campaignById, missionById, campaignIdBySortie, aarsByCampaign, missionsByCampaign }
}

/** Active campaigns in priority order (rank, then creation time, then id). */
export function activeCampaigns(snapshot: AllocationSnapshot): Campaign[] {
  return snapshot.campaigns
    .filter((c) => c.status === 'active')
    .sort(
      (a, b) =>
        a.priorityRank - b.priorityRank ||
        a.createdAt.localeCompare(b.createdAt) ||
        a.id.localeCompare(b.id),
    )
}

export function loadSnapshot(db: Database.Database): Result<AllocationSnapshot, BearingError> {
  try {
    const read = db.transaction((): AllocationSnapshot => {
      const campaigns = db.prepare('SELECT * FROM campaigns').all() as CampaignRow[]
      const missions = db.prepare('SELECT * FROM missions ORDER BY sort_order ASC, created_at ASC').all() as MissionRow[]
      const sorties = db.prepare('SELECT * FROM sorties ORDER BY sort_order ASC, created_at ASC').all() as SortieRow[]
      const aars = db.prepare('SELECT * FROM aars ORDER BY created_at ASC, id ASC').all() as AARRow[]
      return {
        campaigns: campaigns.map(rowToCampaign),
        missions: missions.map(rowToMission),
        sorties: sorties.map(rowToSortie),
        aars: aars.map(rowToAAR),
      }
    })
    return Ok(read())
  } catch (e) {
    return Err(toBearingError(e))
  }
}

/**
 * Manual queue order: sort_order, then the owning mission's order, then
 * creation time and id so the order is total.
 */
export function compareQueueOrder(index: SnapshotIndex): (a: Sortie, b: Sortie) => number {
  const missionOrder = (s: Sortie): number => index.missionById.get(s.missionId)?.sortOrder ?? 0
  return (a, b) =>
    a.sortOrder - b.sortOrder ||
    missionOrder(a) - missionOrder(b) ||
    a.createdAt.localeCompare(b.createdAt) ||
    a.id.localeCompare(b.id)
}
