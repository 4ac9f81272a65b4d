import { describe, it, expect } from 'vitest';
import {
  createWebhookEvent,
  createWebhookConfiguration,
  InvalidEventError,
  InvalidConfigurationError,
} from '../../src/domain/index.js';

describe('createWebhookEvent', () => {
  it('fills defaults and freezes the event', () => {
    const event = createWebhookEvent({ event_id: 'e1', event_type: 'create', module: 'Deals' });

    expect(event.record_id).toBe('');
    expect(event.record_data).toEqual({});
    expect(event.modified_fields).toEqual([]);
    expect(event.user_id).toBeNull();
    expect(Object.isFrozen(event)).toBe(true);
  });

  it('rejects an unknown event type', () => {
    expect(() => createWebhookEvent({ event_id: 'e1', event_type: 'merge', module: 'Deals' }))
      .toThrow(InvalidEventError);
  });

  it('rejects an unknown module', () => {
    expect(() => createWebhookEvent({ event_id: 'e1', event_type: 'create', module: 'Leads' }))
      .toThrow('Module must be one of Accounts, Contacts, Deals, Tasks, Notes, Activities (got "Leads")');
  });
});

describe('createWebhookConfiguration', () => {
  const base = {
    name: 'accounts_webhook',
    url: 'https://sync.example.com/webhooks/zoho',
    module: 'Accounts' as const,
    secret_token: 'test-secret',
  };

  it('defaults enabled and de-duplicates events', () => {
    const config = createWebhookConfiguration({ ...base, events: ['create', 'update', 'create'] });

    expect(config.enabled).toBe(true);
    expect(config.webhook_id).toBeNull();
    expect(config.events).toEqual(['create', 'update']);
  });

  it('requires at least one event', () => {
    expect(() => createWebhookConfiguration({ ...base, events: [] }))
      .toThrow('At least one event type must be specified');
  });

  it('rejects an unparseable url', () => {
    expect(() => createWebhookConfiguration({ ...base, url: 'not a url', events: ['create'] }))
      .toThrow(InvalidConfigurationError);
  });
});
