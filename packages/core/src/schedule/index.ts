export {
  validateCron,
  validateTimeZone,
  matchesCron,
  lastCronMatch,
  describeHumanReadable,
  zonedParts,
  zonedDate,
  minuteKey,
} from './cron.js'
export type { ZonedParts } from './cron.js'
export { JobRunRepository } from './job-runs.js'
export { Scheduler } from './scheduler.js'
export type { ScheduledJob, SchedulerConfig } from './scheduler.js'
export {
  runMorningBriefing,
  runWeeklyReview,
  createDefaultJobs,
  createScheduler,
  MORNING_BRIEFING_JOB,
  WEEKLY_REVIEW_JOB,
} from './jobs.js'
export type { JobDeps } from './jobs.js'
