/**
 * Campaigns — long-running efforts competing for blocks.
 */

export {
  CampaignStatusSchema,
  CreateCampaignInputSchema,
  UpdateCampaignInputSchema,
  RerankInputSchema,
  DEFAULT_CAMPAIGN_COLOUR,
} from './schemas.js'

export type {
  CampaignStatus,
  CreateCampaignInput,
  UpdateCampaignInput,
  RerankInput,
  Campaign,
} from './schemas.js'

export { CampaignRepository } from './repository.js'
