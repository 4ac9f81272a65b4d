export { default as webhookRoutes, sendPipelineError } from './webhook-routes.js';
export type { WebhookRoutesOptions } from './webhook-routes.js';
export { default as subscriptionRoutes } from './subscription-routes.js';
export type { SubscriptionRoutesOptions } from './subscription-routes.js';
export { default as deadLetterRoutes } from './dead-letter-routes.js';
export type { DeadLetterRoutesOptions } from './dead-letter-routes.js';
