import { z } from 'zod';
import { CRM_MODULES, WEBHOOK_EVENT_TYPES } from '../domain/index.js';

const eventTypesSchema = z.array(z.enum(WEBHOOK_EVENT_TYPES)).min(1, 'At least one event type must be specified');

/**
 * Schema for POST /webhooks/subscriptions.
 * `url` defaults to the service's own ingress endpoint.
 */
export const registerSubscriptionSchema = z.object({
  name: z.string().min(1).max(255).regex(/^[A-Za-z0-9_.-]+$/, 'letters, digits, _ . and - only'),
  module: z.enum(CRM_MODULES),
  events: eventTypesSchema,
  url: z.string().url().optional(),
});

export type RegisterSubscriptionInput = z.infer<typeof registerSubscriptionSchema>;

/**
 * Schema for PATCH /webhooks/subscriptions/:name.
 * At least one of `events` / `enabled` must be present.
 */
export const updateSubscriptionSchema = z.object({
  events: eventTypesSchema.optional(),
  enabled: z.boolean().optional(),
}).refine((v) => v.events !== undefined || v.enabled !== undefined, {
  message: 'Provide events and/or enabled',
});

export type UpdateSubscriptionInput = z.infer<typeof updateSubscriptionSchema>;

/** Schema for POST /webhooks/dead-letter/reprocess. */
export const reprocessDeadLetterSchema = z.object({
  limit: z.number().int().min(1).max(1000).optional().default(10),
});
