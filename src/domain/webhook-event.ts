/**
 * Core domain types for CRM change notifications.
 *
 * These types define the canonical shape of a webhook event as it flows
 * from ingress through the queue to the processor. They carry no
 * framework dependencies.
 */

export const CRM_MODULES = ['Accounts', 'Contacts', 'Deals', 'Tasks', 'Notes', 'Activities'] as const;
export type CrmModule = (typeof CRM_MODULES)[number];

export const WEBHOOK_EVENT_TYPES = ['create', 'update', 'delete', 'restore'] as const;
export type WebhookEventType = (typeof WEBHOOK_EVENT_TYPES)[number];

/** Snapshot of the changed record (may be partial). */
export type RecordData = Record<string, unknown>;

/**
 * Canonical webhook event.
 *
 * `event_id` is the deduplication key. It is taken from the sender's
 * event-id header when present and generated at ingress otherwise.
 */
export interface WebhookEvent {
  readonly event_id: string;
  readonly event_type: WebhookEventType;
  readonly module: CrmModule;
  readonly record_id: string;
  readonly record_data: RecordData;
  readonly modified_fields: readonly string[];
  readonly timestamp: string; // ISO-8601
  readonly user_id: string | null;
}

/** A permanently failed event, parked for manual or scheduled replay. */
export interface DeadLetterEntry {
  readonly event: WebhookEvent | Record<string, unknown>;
  readonly error: string;
  readonly failed_at: string;
  readonly retry_count: number;
}

export class InvalidEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidEventError';
  }
}

export function isCrmModule(value: unknown): value is CrmModule {
  return typeof value === 'string' && (CRM_MODULES as readonly string[]).includes(value);
}

export function isWebhookEventType(value: unknown): value is WebhookEventType {
  return typeof value === 'string' && (WEBHOOK_EVENT_TYPES as readonly string[]).includes(value);
}

export interface WebhookEventInput {
  event_id: string;
  event_type: string;
  module: string;
  record_id?: string;
  record_data?: RecordData;
  modified_fields?: readonly string[];
  timestamp?: string;
  user_id?: string | null;
}

/**
 * Builds a frozen WebhookEvent, rejecting unknown event types and modules.
 */
export function createWebhookEvent(input: WebhookEventInput): WebhookEvent {
  if (!isWebhookEventType(input.event_type)) {
    throw new InvalidEventError(
      `Event type must be one of ${WEBHOOK_EVENT_TYPES.join(', ')} (got "${input.event_type}")`,
    );
  }
  if (!isCrmModule(input.module)) {
    throw new InvalidEventError(
      `Module must be one of ${CRM_MODULES.join(', ')} (got "${input.module}")`,
    );
  }

  return Object.freeze({
    event_id: input.event_id,
    event_type: input.event_type,
    module: input.module,
    record_id: input.record_id ?? '',
    record_data: input.record_data ?? {},
    modified_fields: Object.freeze([...(input.modified_fields ?? [])]),
    timestamp: input.timestamp ?? new Date().toISOString(),
    user_id: input.user_id ?? null,
  });
}
