import type { WebhookConfiguration } from '../domain/index.js';

/** Redis key layout shared by the API and worker processes. */
export const QUEUE_KEY = 'webhook:queue';
export const DEAD_LETTER_KEY = 'webhook:dead_letter';
export const DEDUP_KEY_PREFIX = 'webhook:processed:';
export const EVENTS_CHANNEL = 'webhook:events';
export const PROCESSOR_METRICS_KEY = 'webhook:processor:metrics';

export function dedupKey(eventId: string): string {
  return `${DEDUP_KEY_PREFIX}${eventId}`;
}

/**
 * Durable list + key/value store backing the queue, the dead-letter
 * queue and the dedup ledger.
 *
 * Every method maps to a single atomic backend primitive; the pipeline
 * holds no locks of its own.
 */
export interface DurableQueue {
  /** Appends at the head; consumers pop from the tail (FIFO). */
  push(list: string, item: string): Promise<void>;
  /** Pops from the tail, waiting up to `timeoutSeconds`. Null on timeout. */
  popBlocking(list: string, timeoutSeconds: number): Promise<string | null>;
  /** Non-blocking tail pop. */
  pop(list: string): Promise<string | null>;
  length(list: string): Promise<number>;
  expire(key: string, ttlSeconds: number): Promise<void>;
  /** SET NX EX. Returns false when the key already existed. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
  remove(key: string): Promise<void>;
  get(key: string): Promise<string | null>;
  publish(channel: string, message: string): Promise<void>;
  /** Rejects when the backend is unreachable. */
  ping(): Promise<void>;
}

export interface SyncOptions {
  force: boolean;
}

/**
 * Downstream memory/knowledge store.
 *
 * `syncAccount` refreshes the account from current CRM state, so
 * repeated or reordered calls converge.
 */
export interface SyncTarget {
  syncAccount(accountId: string, options: SyncOptions): Promise<void>;
}

export interface CrmWatchStatus {
  active: boolean;
  [key: string]: unknown;
}

/** CRM notification-channel ("watch") API. */
export interface CrmWatchClient {
  /** Returns the channel id assigned by the CRM. */
  register(config: WebhookConfiguration): Promise<string>;
  update(config: WebhookConfiguration): Promise<void>;
  unregister(config: WebhookConfiguration): Promise<void>;
  status(config: WebhookConfiguration): Promise<CrmWatchStatus>;
}

/** Local persistence for subscriptions, keyed by name. */
export interface WebhookRegistry {
  load(): Promise<WebhookConfiguration[]>;
  save(config: WebhookConfiguration): Promise<void>;
  remove(name: string): Promise<boolean>;
}
