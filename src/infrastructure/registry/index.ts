export { InMemoryWebhookRegistry } from './in-memory-webhook-registry.js';
