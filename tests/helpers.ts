import { vi } from 'vitest';
import type { Logger } from 'pino';
import { createWebhookEvent } from '../src/domain/index.js';
import type { WebhookEvent, WebhookEventInput } from '../src/domain/index.js';

let counter = 0;

/** Minimal fake logger; `child` returns the same instance. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger & typeof log;
}

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<WebhookEventInput> = {}): WebhookEvent {
  counter++;
  return createWebhookEvent({
    event_id: overrides.event_id ?? `evt-${counter}`,
    event_type: overrides.event_type ?? 'update',
    module: overrides.module ?? 'Accounts',
    record_id: overrides.record_id ?? `acc_${counter}`,
    record_data: overrides.record_data ?? {},
    modified_fields: overrides.modified_fields ?? [],
    timestamp: overrides.timestamp ?? FIXED_NOW.toISOString(),
    user_id: overrides.user_id ?? null,
  });
}

/** Fixed "now" for deterministic timestamps. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z');

export const TEST_SECRET = 'test-secret-0123456789';
