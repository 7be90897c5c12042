/**
 * Markdown rendering of the weekly review.
 */

import type { WeeklyReview } from './weekly-review.js'

const BAR_WIDTH = 10

/** Ten-cell progress bar, full at or above 100%. */
export function progressBar(pct: number): string {
  const filled = Math.max(0, Math.min(BAR_WIDTH, Math.round(pct / 10)))
  return '█'.repeat(filled) + '░'.repeat(BAR_WIDTH - filled)
}

function statusLabel(status: string): string {
  return status.replace(/_/g, ' ')
}

export function formatWeeklyReviewMarkdown(review: WeeklyReview): string {
  const lines: string[] = [`# Weekly Review — ${review.weekStart} to ${review.date}`, '']

  lines.push('## Scoreboard', '')
  if (review.scoreboard.length === 0) {
    lines.push('No active campaigns.')
  }
  for (const s of review.scoreboard) {
    lines.push(
      `- **${s.name}** ${progressBar(s.completionPct)} ${s.blocksCompleted}/${s.weeklyTarget} blocks (${s.completionPct}%)`,
    )
  }
  lines.push('')

  lines.push('## Missions Moved', '')
  if (review.missionsMoved.length === 0) {
    lines.push('No mission changed status this week.')
  }
  for (const m of review.missionsMoved) {
    lines.push(`- ${m.campaignName} > ${m.name}: ${statusLabel(m.oldStatus)} → ${statusLabel(m.newStatus)}`)
  }
  lines.push('')

  lines.push('## Drift', '')
  const statements = review.driftSummary.filter((d) => d.misaligned).map((d) => d.statement)
  if (statements.length === 0) {
    lines.push('No significant misalignments detected.')
  }
  for (const statement of statements) {
    lines.push(`- ${statement}`)
  }
  lines.push('')

  if (review.stalenessAlerts.length > 0) {
    lines.push('## Staleness Alerts', '')
    for (const a of review.stalenessAlerts) {
      lines.push(a.neverWorked ? `- **${a.name}**: never worked` : `- **${a.name}**: ${a.days} days without a sortie`)
    }
    lines.push('')
  }

  lines.push('## Energy', '')
  const energy = review.energyPatterns
  if (energy.checkIns === 0) {
    lines.push('No check-ins this week.')
  } else {
    lines.push(energy.daily.map((d) => `${d.shortDay}: ${d.level}`).join(' | '))
    lines.push(`Average: ${energy.average} (${energy.averageLabel}) over ${energy.checkIns} check-ins`)
  }
  lines.push('')

  lines.push('## Rankings', '')
  for (const r of review.currentRankings) {
    lines.push(`${r.rank}. ${r.name}`)
  }
  if (review.currentRankings.length > 0) lines.push('')

  lines.push('## Next Week', '')
  const { upcomingTargets, blockedSorties } = review.nextWeekPreview
  if (upcomingTargets.length === 0 && blockedSorties.length === 0) {
    lines.push('Nothing due and nothing blocked.')
  }
  for (const t of upcomingTargets) {
    lines.push(`- Due ${t.targetDate}: ${t.name}`)
  }
  for (const b of blockedSorties) {
    lines.push(`- Blocked: ${b.title} (${b.campaignName} > ${b.missionName})`)
  }

  return lines.join('\n')
}
