import { describe, it, expect } from 'vitest'
import {
  formatBriefingMarkdown,
  formatBriefingText,
  formatDriftMarkdown,
} from '../../src/allocation/render.js'
import { generateBriefing } from '../../src/allocation/briefing.js'
import { computeDrift } from '../../src/allocation/drift.js'
import { NOW, daysAgo, campaignWithQueue, combine, loggedWork, makeSortie } from './fixtures.js'

function sampleBriefing() {
  const snapshot = combine(campaignWithQueue({ id: 'a', name: 'Novel', weeklyBlockTarget: 4 }, 0), {
    sorties: [
      makeSortie({ id: 's1', missionId: 'm-a', title: 'Draft chapter', cognitiveLoad: 'deep', estimatedBlocks: 2 }),
      makeSortie({ id: 's2', missionId: 'm-a', title: 'Fix typos', cognitiveLoad: 'light', sortOrder: 1 }),
    ],
  })
  return generateBriefing('green', 3, snapshot, NOW)
}

describe('formatBriefingMarkdown', () => {
  it('lists each sortie with its load, campaign, mission and size', () => {
    const markdown = formatBriefingMarkdown(sampleBriefing(), {
      date: '2026-03-02',
      energyLevel: 'green',
      availableBlocks: 3,
    })
    expect(markdown.split('\n')).toEqual([
      '# Daily Briefing — 2026-03-02',
      '',
      'Energy: green | Blocks: 3',
      '',
      '1. [deep] **Draft chapter** (Novel → a mission, 2 blocks)',
      '2. [light] **Fix typos** (Novel → a mission, 1 block)',
    ])
  })

  it('says so when there is nothing to brief', () => {
    const markdown = formatBriefingMarkdown([], { date: '2026-03-02', energyLevel: 'red', availableBlocks: 0 })
    expect(markdown.split('\n').at(-1)).toBe(
      'Nothing to brief: no queued sortie fits today’s energy and capacity.',
    )
  })
})

describe('formatBriefingText', () => {
  it('renders a compact numbered list', () => {
    expect(formatBriefingText(sampleBriefing(), '2026-03-02')).toBe(
      'Morning Briefing — 2026-03-02\n\n1. Draft chapter (Novel)\n2. Fix typos (Novel)',
    )
  })
})

describe('formatDriftMarkdown', () => {
  it('lists misalignments and a share table', () => {
    const snapshot = combine(
      campaignWithQueue({ id: 'a', name: 'Alpha', priorityRank: 1, weeklyBlockTarget: 3 }, 0),
      campaignWithQueue({ id: 'b', name: 'Beta', priorityRank: 2, weeklyBlockTarget: 1 }, 0),
      loggedWork('a1', 'm-a', 1, daysAgo(1)),
      loggedWork('b1', 'm-b', 3, daysAgo(1)),
    )
    const markdown = formatDriftMarkdown(computeDrift(snapshot, NOW), '2026-03-02')
    expect(markdown.split('\n')).toEqual([
      '# Drift Report — 2026-03-02',
      '',
      '- Alpha is getting 50 percentage points less attention than its stated priority warrants',
      '- Beta is getting 50 percentage points more attention than its stated priority warrants',
      '',
      '| Campaign | Expected | Actual | Drift | Trend |',
      '|----------|----------|--------|-------|-------|',
      '| Alpha | 75% | 25% | -50% | insufficient_data (!) |',
      '| Beta | 25% | 75% | +50% | insufficient_data (!) |',
    ])
  })

  it('explains when there is no data yet', () => {
    const snapshot = combine(campaignWithQueue({ id: 'a', name: 'Alpha', weeklyBlockTarget: 2 }, 0))
    const markdown = formatDriftMarkdown(computeDrift(snapshot, NOW), '2026-03-02')
    expect(markdown.split('\n')[2]).toBe(
      'No work logged in the last 4 week(s); drift cannot be measured yet.',
    )
  })
})
