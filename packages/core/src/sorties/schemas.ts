/**
 * Zod schemas for sorties and their after-action reports.
 */

import { z } from 'zod'
import { UUIDSchema } from '../common/index.js'
import { EnergyLevelSchema } from '../checkins/schemas.js'
import type { EnergyLevel } from '../checkins/schemas.js'

// ── Enums ──

export const SortieStatusSchema = z.enum(['queued', 'active', 'completed', 'abandoned'])
export type SortieStatus = z.infer<typeof SortieStatusSchema>

/** Ordered by the energy each load demands: deep > medium > light. */
export const CognitiveLoadSchema = z.enum(['deep', 'medium', 'light'])
export type CognitiveLoad = z.infer<typeof CognitiveLoadSchema>

export const AAROutcomeSchema = z.enum(['completed', 'partial', 'blocked', 'pivoted'])
export type AAROutcome = z.infer<typeof AAROutcomeSchema>

// ── Sortie inputs ──

export const CreateSortieInputSchema = z.object({
  missionId: UUIDSchema,
  title: z.string().min(1, 'Sortie title is required'),
  description: z.string().default(''),
  cognitiveLoad: CognitiveLoadSchema,
  estimatedBlocks: z.number().int().min(1, 'A sortie takes at least one block').default(1),
  sortOrder: z.number().int().min(0).optional(),
})

export type CreateSortieInput = z.input<typeof CreateSortieInputSchema>

export const UpdateSortieInputSchema = z.object({
  title: z.string().min(1).optional(),
  description: z.string().optional(),
  cognitiveLoad: CognitiveLoadSchema.optional(),
  estimatedBlocks: z.number().int().min(1).optional(),
  sortOrder: z.number().int().min(0).optional(),
})

export type UpdateSortieInput = z.infer<typeof UpdateSortieInputSchema>

export const CloseStatusSchema = z.enum(['completed', 'abandoned'])
export type CloseStatus = z.infer<typeof CloseStatusSchema>

// ── AAR input ──

export const CompleteSortieInputSchema = z.object({
  outcome: AAROutcomeSchema,
  energyBefore: EnergyLevelSchema,
  energyAfter: EnergyLevelSchema,
  actualBlocks: z.number().int().min(0, 'Actual blocks cannot be negative'),
  notes: z.string().default(''),
})

export type CompleteSortieInput = z.input<typeof CompleteSortieInputSchema>

// ── Records ──

export interface Sortie {
  id: string
  missionId: string
  title: string
  description: string
  status: SortieStatus
  cognitiveLoad: CognitiveLoad
  estimatedBlocks: number
  sortOrder: number
  createdAt: string
  startedAt: string | null
  completedAt: string | null
}

export interface AAR {
  id: string
  sortieId: string
  outcome: AAROutcome
  energyBefore: EnergyLevel
  energyAfter: EnergyLevel
  actualBlocks: number
  notes: string
  /** Completion timestamp of the sortie this report closes. */
  createdAt: string
}
