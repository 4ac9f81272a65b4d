export type {
  CrmModule,
  WebhookEventType,
  RecordData,
  WebhookEvent,
  WebhookEventInput,
  DeadLetterEntry,
} from './webhook-event.js';
export {
  CRM_MODULES,
  WEBHOOK_EVENT_TYPES,
  InvalidEventError,
  isCrmModule,
  isWebhookEventType,
  createWebhookEvent,
} from './webhook-event.js';
export type { WebhookConfiguration, WebhookConfigurationInput } from './webhook-configuration.js';
export { InvalidConfigurationError, createWebhookConfiguration } from './webhook-configuration.js';
export type { SyncAction } from './sync-routing.js';
export {
  CRITICAL_ACCOUNT_FIELDS,
  resolveOwningAccountId,
  hasCriticalChanges,
  resolveSyncAction,
} from './sync-routing.js';
