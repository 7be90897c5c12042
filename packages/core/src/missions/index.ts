/**
 * Missions — ordered milestones inside a campaign.
 */

export {
  MissionStatusSchema,
  CreateMissionInputSchema,
  UpdateMissionInputSchema,
} from './schemas.js'

export type {
  MissionStatus,
  CreateMissionInput,
  UpdateMissionInput,
  Mission,
} from './schemas.js'

export { MissionRepository } from './repository.js'
