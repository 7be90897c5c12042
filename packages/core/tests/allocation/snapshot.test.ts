import { describe, it, expect } from 'vitest'
import { indexSnapshot } from '../../src/allocation/snapshot.js'
import { NOW, daysAgo, campaignWithQueue, combine, loggedWork, makeAAR } from './fixtures.js'

describe('indexSnapshot', () => {
  it('builds only the lookups the allocator reads', () => {
    const index = indexSnapshot(combine(campaignWithQueue({ id: 'a' }, 1)))
    expect(Object.keys(index).sort()).toEqual([
      'aarsByCampaign',
      'campaignById',
      'campaignIdBySortie',
      'missionById',
      'missionsByCampaign',
    ])
  })

  it('attributes sorties and reports to their campaign through the mission', () => {
    const snapshot = combine(
      campaignWithQueue({ id: 'a' }, 1),
      campaignWithQueue({ id: 'b' }, 0),
      loggedWork('done-b', 'm-b', 2, daysAgo(1, NOW)),
      { aars: [makeAAR({ id: 'orphan', sortieId: 'missing' })] },
    )
    const index = indexSnapshot(snapshot)
    expect(index.campaignIdBySortie.get('a-s1')).toBe('a')
    expect(index.campaignIdBySortie.get('done-b')).toBe('b')
    expect(index.aarsByCampaign.get('b')?.map((r) => r.id)).toEqual(['aar-done-b'])
    expect(index.aarsByCampaign.has('a')).toBe(false)
    expect(index.missionsByCampaign.get('a')?.map((m) => m.id)).toEqual(['m-a'])
  })
})
