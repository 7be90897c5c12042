/**
 * Zod schemas for campaigns.
 */

import { z } from 'zod'
import { UUIDSchema, DateStringSchema, ColourSchema } from '../common/index.js'

export const CampaignStatusSchema = z.enum(['active', 'paused', 'completed', 'archived'])
export type CampaignStatus = z.infer<typeof CampaignStatusSchema>

export const DEFAULT_CAMPAIGN_COLOUR = '#6366f1'

export const CreateCampaignInputSchema = z.object({
  name: z.string().min(1, 'Campaign name is required'),
  description: z.string().default(''),
  priorityRank: z.number().int().min(1, 'Priority rank starts at 1'),
  weeklyBlockTarget: z.number().int().min(0, 'Weekly block target cannot be negative').default(0),
  colour: ColourSchema.default(DEFAULT_CAMPAIGN_COLOUR),
  tags: z.string().default(''),
  targetDate: DateStringSchema.nullable().default(null),
})

export type CreateCampaignInput = z.input<typeof CreateCampaignInputSchema>

export const UpdateCampaignInputSchema = z.object({
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  status: CampaignStatusSchema.optional(),
  priorityRank: z.number().int().min(1).optional(),
  weeklyBlockTarget: z.number().int().min(0).optional(),
  colour: ColourSchema.optional(),
  tags: z.string().optional(),
  targetDate: DateStringSchema.nullable().optional(),
})

export type UpdateCampaignInput = z.infer<typeof UpdateCampaignInputSchema>

export const RerankInputSchema = z
  .array(z.object({ id: UUIDSchema, rank: z.number().int().min(1) }))
  .min(1, 'At least one campaign is required')
  .superRefine((ranks, ctx) => {
    const seen = new Set<number>()
    for (const r of ranks) {
      if (seen.has(r.rank)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate rank: ${r.rank}` })
      }
      seen.add(r.rank)
    }
  })

export type RerankInput = z.infer<typeof RerankInputSchema>

export interface Campaign {
  id: string
  name: string
  description: string
  status: CampaignStatus
  priorityRank: number
  weeklyBlockTarget: number
  colour: string
  tags: string
  targetDate: string | null
  createdAt: string
  updatedAt: string
}
