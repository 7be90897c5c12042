/**
 * Daily check-ins — energy and capacity for the day's briefing.
 */

export { EnergyLevelSchema, UpsertCheckInInputSchema } from './schemas.js'
export type { EnergyLevel, UpsertCheckInInput, DailyCheckIn } from './schemas.js'
export { CheckInRepository } from './repository.js'
