/**
 * Attention allocation — health, urgency, briefing and drift.
 */

export {
  computeVelocity,
  computeStaleness,
  computeAdherence,
  classifyHealth,
  computeCampaignHealth,
  getDashboardData,
  STALENESS_SENTINEL,
  HEALTH_THRESHOLDS,
} from './health.js'

export type { HealthState, HealthResult, DashboardEntry } from './health.js'

export {
  computeUrgencyScore,
  reciprocalWeighting,
  linearWeighting,
  STALENESS_WEIGHT,
} from './urgency.js'

export type { PriorityWeighting, UrgencyOptions } from './urgency.js'

export {
  generateBriefing,
  routeSingle,
  rankCampaignQueues,
  isEligible,
  campaignBlockCap,
  ENERGY_ALLOWED_LOADS,
  CAMPAIGN_SHARE_CAP,
} from './briefing.js'

export type { BriefingItem, BriefingOptions, CampaignQueue } from './briefing.js'

export {
  computeDrift,
  computeShares,
  classifyTrend,
  describeDrift,
  DEFAULT_DRIFT_WINDOW_WEEKS,
  MISALIGNMENT_THRESHOLD,
  TREND_SUB_WINDOWS,
} from './drift.js'

export type { DriftTrend, DriftResult, DriftReport, DriftOptions, CampaignShare } from './drift.js'

export { loadSnapshot, indexSnapshot, activeCampaigns } from './snapshot.js'
export type { AllocationSnapshot, SnapshotIndex } from './snapshot.js'

export { formatBriefingMarkdown, formatBriefingText, formatDriftMarkdown } from './render.js'
export type { BriefingHeader } from './render.js'

export {
  computeDashboard,
  computeBriefing,
  computeRoute,
  computeDriftReport,
  resolveDayCapacity,
  BriefingRequestSchema,
} from './service.js'

export type { BriefingRequest, DayCapacity } from './service.js'

export { isoDate, addDays, MS_PER_DAY, MS_PER_WEEK } from './time.js'
