import type { CrmModule, WebhookEventType } from './webhook-event.js';

/**
 * A CRM webhook subscription.
 *
 * `webhook_id` stays null until the CRM has accepted the registration.
 */
export interface WebhookConfiguration {
  readonly webhook_id: string | null;
  readonly name: string;
  readonly url: string;
  readonly module: CrmModule;
  readonly events: readonly WebhookEventType[];
  readonly enabled: boolean;
  readonly secret_token: string;
  readonly created_at: string | null;
  readonly updated_at: string | null;
}

export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

export interface WebhookConfigurationInput {
  webhook_id?: string | null;
  name: string;
  url: string;
  module: CrmModule;
  events: readonly WebhookEventType[];
  enabled?: boolean;
  secret_token: string;
  created_at?: string | null;
  updated_at?: string | null;
}

export function createWebhookConfiguration(input: WebhookConfigurationInput): WebhookConfiguration {
  if (input.events.length === 0) {
    throw new InvalidConfigurationError('At least one event type must be specified');
  }
  if (!URL.canParse(input.url)) {
    throw new InvalidConfigurationError(`Invalid webhook url "${input.url}"`);
  }

  return {
    webhook_id: input.webhook_id ?? null,
    name: input.name,
    url: input.url,
    module: input.module,
    events: [...new Set(input.events)],
    enabled: input.enabled ?? true,
    secret_token: input.secret_token,
    created_at: input.created_at ?? null,
    updated_at: input.updated_at ?? null,
  };
}
