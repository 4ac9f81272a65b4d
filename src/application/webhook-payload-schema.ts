import { z } from 'zod';
import { createWebhookEvent, InvalidEventError } from '../domain/index.js';
import type { WebhookEvent } from '../domain/index.js';
import { MalformedPayloadError } from './errors.js';

const recordSchema = z.record(z.string(), z.unknown());
const identifierSchema = z.union([z.string(), z.number()]).transform(String);

/**
 * CRM notification format:
 * `{ operation, module, data: [record, ...], modified_fields?, user: { id } }`.
 *
 * On multi-record payloads the first element of `data` is canonical.
 */
export const crmPayloadSchema = z.object({
  operation: z.string().default('update'),
  module: z.string().default('Accounts'),
  data: z.union([z.array(recordSchema), recordSchema]),
  modified_fields: z.array(z.string()).default([]),
  user: z.object({ id: identifierSchema.optional() }).passthrough().nullish(),
});

/**
 * Generic format:
 * `{ event_type, module, record_id, record_data, modified_fields?, user_id? }`.
 */
export const genericPayloadSchema = z.object({
  event_type: z.string().default('update'),
  module: z.string().default('Accounts'),
  record_id: identifierSchema.default(''),
  record_data: recordSchema.default({}),
  modified_fields: z.array(z.string()).default([]),
  user_id: identifierSchema.nullish(),
});

export type CrmPayload = z.infer<typeof crmPayloadSchema>;
export type GenericPayload = z.infer<typeof genericPayloadSchema>;

export type DecodedPayload =
  | { readonly variant: 'crm'; readonly payload: CrmPayload }
  | { readonly variant: 'generic'; readonly payload: GenericPayload };

/**
 * Tags a parsed JSON body with its format and validates it.
 *
 * A body carrying a `data` key is a CRM notification; anything else is
 * read as the generic format.
 */
export function decodeWebhookPayload(body: unknown): DecodedPayload {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new MalformedPayloadError('Webhook payload must be a JSON object');
  }

  if ('data' in body) {
    const parsed = crmPayloadSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedPayloadError('Invalid CRM webhook payload', parsed.error.issues);
    }
    return { variant: 'crm', payload: parsed.data };
  }

  const parsed = genericPayloadSchema.safeParse(body);
  if (!parsed.success) {
    throw new MalformedPayloadError('Invalid webhook payload', parsed.error.issues);
  }
  return { variant: 'generic', payload: parsed.data };
}

/**
 * Produces the canonical event from a decoded payload.
 *
 * Unknown modules or event types surface as MalformedPayloadError (400).
 */
export function normalizeWebhookPayload(
  decoded: DecodedPayload,
  eventId: string,
  now: Date = new Date(),
): WebhookEvent {
  try {
    switch (decoded.variant) {
      case 'crm': {
        const { payload } = decoded;
        const record = Array.isArray(payload.data) ? (payload.data[0] ?? {}) : payload.data;
        const recordId = record['id'];
        return createWebhookEvent({
          event_id: eventId,
          event_type: payload.operation.toLowerCase(),
          module: payload.module,
          record_id: typeof recordId === 'string' || typeof recordId === 'number' ? String(recordId) : '',
          record_data: record,
          modified_fields: payload.modified_fields,
          timestamp: now.toISOString(),
          user_id: payload.user?.id ?? null,
        });
      }
      case 'generic': {
        const { payload } = decoded;
        return createWebhookEvent({
          event_id: eventId,
          event_type: payload.event_type,
          module: payload.module,
          record_id: payload.record_id,
          record_data: payload.record_data,
          modified_fields: payload.modified_fields,
          timestamp: now.toISOString(),
          user_id: payload.user_id ?? null,
        });
      }
    }
  } catch (err: unknown) {
    if (err instanceof InvalidEventError) {
      throw new MalformedPayloadError(err.message, [], { cause: err });
    }
    throw err;
  }
}

/**
 * Shape of an event as serialized onto the queue.
 * Used by the processor to re-validate items it pops.
 */
export const queuedEventSchema = z.object({
  event_id: z.string().min(1),
  event_type: z.string(),
  module: z.string(),
  record_id: z.string().default(''),
  record_data: recordSchema.default({}),
  modified_fields: z.array(z.string()).default([]),
  timestamp: z.string().optional(),
  user_id: z.string().nullish(),
});

export function decodeQueuedEvent(value: unknown): WebhookEvent {
  const parsed = queuedEventSchema.parse(value);
  return createWebhookEvent(parsed);
}
