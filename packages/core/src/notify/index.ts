export {
  sendNotification,
  createWebhookNotifier,
  buildWebhookRequest,
  WEBHOOK_TYPES,
} from './webhook.js'
export type { WebhookType, WebhookConfig, Notification, DeliveryStatus, Notifier } from './webhook.js'
