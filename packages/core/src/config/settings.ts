/**
 * Runtime settings from BEARING_* environment variables.
 */

import { z } from 'zod'
import { Ok, Err, BearingError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { EnergyLevelSchema } from '../checkins/schemas.js'
import { WEBHOOK_TYPES } from '../notify/webhook.js'
import { validateCron, validateTimeZone } from '../schedule/cron.js'

const CronSchema = z.string().trim().superRefine((value, ctx) => {
  const error = validateCron(value)
  if (error) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid cron "${value}": ${error}` })
})

const TimeZoneSchema = z.string().trim().min(1).superRefine((value, ctx) => {
  const error = validateTimeZone(value)
  if (error) ctx.addIssue({ code: z.ZodIssueCode.custom, message: error })
})

export const SettingsSchema = z.object({
  BEARING_DB_PATH: z.string().min(1).default('./data/bearing.db'),
  BEARING_TIMEZONE: TimeZoneSchema.default('UTC'),
  BEARING_WEBHOOK_URL: z.union([z.literal(''), z.string().url()]).default(''),
  BEARING_WEBHOOK_TYPE: z.enum(WEBHOOK_TYPES).default('ntfy'),
  BEARING_BRIEFING_CRON: CronSchema.default('0 7 * * *'),
  BEARING_REVIEW_CRON: CronSchema.default('0 18 * * 0'),
  BEARING_DEFAULT_ENERGY: EnergyLevelSchema.default('green'),
  BEARING_DEFAULT_BLOCKS: z.coerce.number().int().min(0).default(4),
})

export interface Settings {
  dbPath: string
  timeZone: string
  webhookUrl: string
  webhookType: (typeof WEBHOOK_TYPES)[number]
  briefingCron: string
  reviewCron: string
  defaultEnergy: z.infer<typeof EnergyLevelSchema>
  defaultBlocks: number
}

/** Empty strings count as unset, so `BEARING_TIMEZONE=` falls back to the default. */
function dropEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('BEARING_') && value !== undefined && value.trim() !== '') {
      out[key] = value
    }
  }
  return out
}

export function loadSettings(
  env: Record<string, string | undefined> = process.env,
): Result<Settings, BearingError> {
  const parsed = SettingsSchema.safeParse(dropEmpty(env))
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    return Err(BearingError.validation(issues.join('; ')))
  }
  const s = parsed.data
  return Ok({
    dbPath: s.BEARING_DB_PATH,
    timeZone: s.BEARING_TIMEZONE,
    webhookUrl: s.BEARING_WEBHOOK_URL,
    webhookType: s.BEARING_WEBHOOK_TYPE,
    briefingCron: s.BEARING_BRIEFING_CRON,
    reviewCron: s.BEARING_REVIEW_CRON,
    defaultEnergy: s.BEARING_DEFAULT_ENERGY,
    defaultBlocks: s.BEARING_DEFAULT_BLOCKS,
  })
}
