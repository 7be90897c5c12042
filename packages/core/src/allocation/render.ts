/**
 * Plain-text and markdown renderings of briefings and drift reports.
 */

import type { EnergyLevel } from '../checkins/schemas.js'
import type { BriefingItem } from './briefing.js'
import type { DriftReport } from './drift.js'

export interface BriefingHeader {
  date: string
  energyLevel: EnergyLevel
  availableBlocks: number
}

const EMPTY_BRIEFING = 'Nothing to brief: no queued sortie fits today’s energy and capacity.'

function pct(share: number): number {
  return Math.round(share * 100)
}

function signedPct(drift: number): string {
  const points = pct(drift)
  return points > 0 ? `+${points}%` : `${points === 0 ? 0 : points}%`
}

export function formatBriefingMarkdown(items: readonly BriefingItem[], header: BriefingHeader): string {
  const lines = [`# Daily Briefing — ${header.date}`, '']
  lines.push(`Energy: ${header.energyLevel} | Blocks: ${header.availableBlocks}`)
  lines.push('')

  if (items.length === 0) {
    lines.push(EMPTY_BRIEFING)
    return lines.join('\n')
  }

  items.forEach((item, i) => {
    const s = item.sortie
    const blocks = s.estimatedBlocks === 1 ? '1 block' : `${s.estimatedBlocks} blocks`
    lines.push(`${i + 1}. [${s.cognitiveLoad}] **${s.title}** (${item.campaignName} → ${item.missionName}, ${blocks})`)
  })

  return lines.join('\n')
}

/** Compact form for push notifications. */
export function formatBriefingText(items: readonly BriefingItem[], date: string): string {
  const lines = [`Morning Briefing — ${date}`, '']
  if (items.length === 0) {
    lines.push(EMPTY_BRIEFING)
  }
  items.forEach((item, i) => {
    lines.push(`${i + 1}. ${item.sortie.title} (${item.campaignName})`)
  })
  return lines.join('\n')
}

export function formatDriftMarkdown(report: DriftReport, date: string): string {
  const lines = [`# Drift Report — ${date}`, '']

  if (report.insufficientData) {
    lines.push(`No work logged in the last ${report.windowWeeks} week(s); drift cannot be measured yet.`)
  } else if (report.misalignmentStatements.length === 0) {
    lines.push('No significant misalignments detected.')
  } else {
    for (const statement of report.misalignmentStatements) {
      lines.push(`- ${statement}`)
    }
  }

  lines.push('')
  lines.push('| Campaign | Expected | Actual | Drift | Trend |')
  lines.push('|----------|----------|--------|-------|-------|')
  for (const c of report.campaigns.values()) {
    const flag = c.misaligned ? ' (!)' : ''
    lines.push(
      `| ${c.campaignName} | ${pct(c.expectedShare)}% | ${pct(c.actualShare)}% | ${signedPct(c.drift)} | ${c.trend}${flag} |`,
    )
  }

  return lines.join('\n')
}
