/**
 * Zod schemas for daily check-ins and the energy scale they record.
 */

import { z } from 'zod'
import { DateStringSchema } from '../common/index.js'

export const EnergyLevelSchema = z.enum(['green', 'yellow', 'red'])
export type EnergyLevel = z.infer<typeof EnergyLevelSchema>

export const UpsertCheckInInputSchema = z.object({
  date: DateStringSchema,
  energyLevel: EnergyLevelSchema,
  availableBlocks: z.number().int().min(0, 'Available blocks cannot be negative'),
  focusNote: z.string().default(''),
})

export type UpsertCheckInInput = z.input<typeof UpsertCheckInInputSchema>

export interface DailyCheckIn {
  id: string
  date: string
  energyLevel: EnergyLevel
  availableBlocks: number
  focusNote: string
  createdAt: string
  updatedAt: string
}
