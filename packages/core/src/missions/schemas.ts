/**
 * Zod schemas for missions.
 */

import { z } from 'zod'
import { UUIDSchema, DateStringSchema } from '../common/index.js'

export const MissionStatusSchema = z.enum(['not_started', 'in_progress', 'blocked', 'completed'])
export type MissionStatus = z.infer<typeof MissionStatusSchema>

export const CreateMissionInputSchema = z.object({
  campaignId: UUIDSchema,
  name: z.string().min(1, 'Mission name is required'),
  description: z.string().default(''),
  status: MissionStatusSchema.default('not_started'),
  targetDate: DateStringSchema.nullable().default(null),
  sortOrder: z.number().int().min(0).optional(),
})

export type CreateMissionInput = z.input<typeof CreateMissionInputSchema>

export const UpdateMissionInputSchema = z.object({
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  status: MissionStatusSchema.optional(),
  targetDate: DateStringSchema.nullable().optional(),
  sortOrder: z.number().int().min(0).optional(),
})

export type UpdateMissionInput = z.infer<typeof UpdateMissionInputSchema>

export interface Mission {
  id: string
  campaignId: string
  name: string
  description: string
  status: MissionStatus
  targetDate: string | null
  sortOrder: number
  createdAt: string
  completedAt: string | null
}
