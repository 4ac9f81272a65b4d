export * from './errors.js';
export * from './ports.js';
export { Counters, formatRate } from './counters.js';
export { computeSignature, verifySignature } from './signature.js';
export { backoffDelay, retryWithBackoff, sleep, abortableSleep } from './backoff.js';
export type { BackoffPolicy, RetryHooks, Sleep } from './backoff.js';
export {
  decodeWebhookPayload,
  normalizeWebhookPayload,
  decodeQueuedEvent,
} from './webhook-payload-schema.js';
export type { DecodedPayload } from './webhook-payload-schema.js';
export {
  registerSubscriptionSchema,
  updateSubscriptionSchema,
  reprocessDeadLetterSchema,
} from './subscription-schema.js';
export type { RegisterSubscriptionInput, UpdateSubscriptionInput } from './subscription-schema.js';
export { WebhookIngress } from './webhook-ingress.js';
export type {
  WebhookRequest,
  WebhookResponse,
  WebhookIngressOptions,
  IngressHealth,
  IngressMetrics,
} from './webhook-ingress.js';
export { EventProcessor } from './event-processor.js';
export type { EventProcessorOptions, ProcessorMetrics, ReprocessResult } from './event-processor.js';
export { WebhookConfigManager, DEFAULT_EVENTS } from './webhook-config-manager.js';
export type {
  WebhookConfigManagerOptions,
  WebhookUpdate,
  WebhookHealthReport,
  WebhookStats,
} from './webhook-config-manager.js';
