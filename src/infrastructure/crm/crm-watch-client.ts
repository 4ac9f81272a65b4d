import { z } from 'zod';
import type { Logger } from 'pino';
import type { WebhookConfiguration } from '../../domain/index.js';
import type { CrmWatchClient, CrmWatchStatus } from '../../application/ports.js';

export interface CrmWatchClientConfig {
  /** e.g. https://www.zohoapis.com */
  apiUrl: string;
  accessToken: string;
  timeoutMs?: number;
}

export class CrmApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = 'CrmApiError';
  }
}

const watchResponseSchema = z.object({
  watch: z.array(z.record(z.string(), z.unknown())).default([]),
});

/**
 * CrmWatchClient over the CRM's notification-channel REST API.
 *
 * Channels live under `/crm/v3/<Module>/actions/watch`; the channel id
 * doubles as the webhook id.
 */
export class HttpCrmWatchClient implements CrmWatchClient {
  private readonly apiUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly config: CrmWatchClientConfig,
    private readonly log: Logger,
  ) {
    this.apiUrl = config.apiUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 10_000;
  }

  async register(config: WebhookConfiguration): Promise<string> {
    const body = await this.request('POST', this.watchPath(config), {
      watch: [{
        channel_id: config.name,
        events: [...config.events],
        channel_expiry: null,
        token: config.secret_token,
        notify_url: config.url,
      }],
    });

    const channelId = body.watch[0]?.['channel_id'];
    return typeof channelId === 'string' && channelId !== '' ? channelId : config.name;
  }

  async update(config: WebhookConfiguration): Promise<void> {
    await this.request('PUT', this.channelPath(config), {
      watch: [{
        channel_id: config.webhook_id,
        events: [...config.events],
        enabled: config.enabled,
        token: config.secret_token,
        notify_url: config.url,
      }],
    });
  }

  async unregister(config: WebhookConfiguration): Promise<void> {
    await this.request('DELETE', this.channelPath(config));
  }

  async status(config: WebhookConfiguration): Promise<CrmWatchStatus> {
    const body = await this.request('GET', this.channelPath(config));
    const channel = body.watch[0] ?? {};
    return { ...channel, active: channel['active'] === true };
  }

  private watchPath(config: WebhookConfiguration): string {
    return `/crm/v3/${config.module}/actions/watch`;
  }

  private channelPath(config: WebhookConfiguration): string {
    if (config.webhook_id === null) {
      throw new CrmApiError(`Webhook ${config.name} has no CRM channel id`, null);
    }
    return `${this.watchPath(config)}/${encodeURIComponent(config.webhook_id)}`;
  }

  private async request(
    method: 'GET' | 'POST' | 'PUT' | 'DELETE',
    path: string,
    payload?: unknown,
  ): Promise<z.infer<typeof watchResponseSchema>> {
    const response = await fetch(`${this.apiUrl}${path}`, {
      method,
      headers: {
        'Authorization': `Zoho-oauthtoken ${this.config.accessToken}`,
        ...(payload === undefined ? {} : { 'Content-Type': 'application/json' }),
      },
      body: payload === undefined ? undefined : JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      this.log.warn({ method, path, status: response.status }, 'CRM watch API returned non-OK status');
      throw new CrmApiError(`CRM watch API ${method} ${path} failed with status ${response.status}`, response.status);
    }

    if (response.status === 204) return { watch: [] };

    const text = await response.text();
    if (text === '') return { watch: [] };

    const parsed = watchResponseSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new CrmApiError(`Unexpected CRM watch API response for ${method} ${path}`, response.status);
    }
    return parsed.data;
  }
}
