/**
 * Webhook delivery for briefings and reviews.
 */

import { Ok, Err, BearingError, messageOf } from '../common/index.js'
import type { Result } from '../common/index.js'

export const WEBHOOK_TYPES = ['ntfy', 'slack', 'discord', 'generic'] as const
export type WebhookType = (typeof WEBHOOK_TYPES)[number]

export interface WebhookConfig {
  /** Empty disables delivery. */
  url: string
  type: WebhookType
  timeoutMs?: number
}

export interface Notification {
  /** Kept to ASCII: ntfy carries it in a header. */
  title: string
  body: string
}

export type DeliveryStatus = 'sent' | 'skipped'

export type Notifier = (notification: Notification) => Promise<Result<DeliveryStatus, BearingError>>

const DEFAULT_TIMEOUT_MS = 10_000
const DISCORD_CONTENT_LIMIT = 2000

interface WebhookRequest {
  headers: Record<string, string>
  body: string
}

export function buildWebhookRequest(type: WebhookType, notification: Notification): WebhookRequest {
  const { title, body } = notification
  switch (type) {
    case 'ntfy':
      return {
        headers: { 'Content-Type': 'text/plain; charset=utf-8', Title: title },
        body,
      }
    case 'slack':
      return {
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: `*${title}*\n${body}` }),
      }
    case 'discord': {
      // Code points, not UTF-16 units.
      const chars = Array.from(`**${title}**\n${body}`)
      const content =
        chars.length > DISCORD_CONTENT_LIMIT ? chars.slice(0, DISCORD_CONTENT_LIMIT - 1).join('') + '…' : chars.join('')
      return {
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ content }),
      }
    }
    case 'generic':
      return {
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ title, text: body, source: 'bearing' }),
      }
  }
}

export async function sendNotification(
  config: WebhookConfig,
  notification: Notification,
): Promise<Result<DeliveryStatus, BearingError>> {
  if (!config.url) return Ok('skipped')

  const request = buildWebhookRequest(config.type, notification)
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), config.timeoutMs ?? DEFAULT_TIMEOUT_MS)

  try {
    const res = await fetch(config.url, {
      method: 'POST',
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    })
    if (!res.ok) {
      return Err(BearingError.notify(`${config.type} webhook returned HTTP ${res.status}`))
    }
    return Ok('sent')
  } catch (e) {
    return Err(BearingError.notify(`${config.type} webhook failed: ${messageOf(e)}`))
  } finally {
    clearTimeout(timeout)
  }
}

export function createWebhookNotifier(config: WebhookConfig): Notifier {
  return async (notification) => {
    const result = await sendNotification(config, notification)
    if (!result.ok) {
      console.warn(`[notify] ${result.error.message}`)
    } else if (result.value === 'sent') {
      console.log(`[notify] Delivered "${notification.title}" via ${config.type}`)
    }
    return result
  }
}
