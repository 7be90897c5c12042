/**
 * Sorties — queued units of work and their after-action reports.
 */

export {
  SortieStatusSchema,
  CognitiveLoadSchema,
  AAROutcomeSchema,
  CloseStatusSchema,
  CreateSortieInputSchema,
  UpdateSortieInputSchema,
  CompleteSortieInputSchema,
} from './schemas.js'

export type {
  SortieStatus,
  CognitiveLoad,
  AAROutcome,
  CloseStatus,
  CreateSortieInput,
  UpdateSortieInput,
  CompleteSortieInput,
  Sortie,
  AAR,
} from './schemas.js'

export { SortieRepository } from './repository.js'
export type { CompletedSortie } from './repository.js'
export { AARRepository } from './aar-repository.js'
