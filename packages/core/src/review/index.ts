export {
  generateWeeklyReview,
  computeWeeklyReview,
  summarizeEnergy,
  STALENESS_ALERT_DAYS,
} from './weekly-review.js'
export type {
  WeeklyReview,
  ScoreboardEntry,
  MissionMove,
  StalenessAlert,
  EnergyDay,
  EnergyPatterns,
  UpcomingTarget,
  BlockedSortie,
} from './weekly-review.js'
export { formatWeeklyReviewMarkdown, progressBar } from './render.js'
