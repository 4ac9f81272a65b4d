import { randomBytes } from 'node:crypto';
import type { Logger } from 'pino';
import { CRM_MODULES, createWebhookConfiguration } from '../domain/index.js';
import type { CrmModule, WebhookConfiguration, WebhookEventType } from '../domain/index.js';
import {
  ConfigManagerNotInitializedError,
  RemoteRegistrationError,
  WebhookNotFoundError,
  errorMessage,
} from './errors.js';
import type { CrmWatchClient, WebhookRegistry } from './ports.js';

export const DEFAULT_EVENTS: readonly WebhookEventType[] = ['create', 'update'];

export interface WebhookConfigManagerOptions {
  /** Public base URL the CRM calls back, e.g. https://sync.example.com */
  baseUrl: string;
  provider?: string;
  /**
   * Pre-shared secret. When absent, the secret of the persisted
   * subscriptions is reused, or a random 256-bit one generated.
   */
  secret?: string | undefined;
  autoRegister?: boolean;
  /**
   * Store a `local_<name>` id when the CRM rejects a registration.
   * Leaves local state referring to a channel the CRM does not have;
   * only for development against a stubbed CRM.
   */
  allowSyntheticIds?: boolean;
  now?: () => Date;
}

export interface WebhookUpdate {
  events?: readonly WebhookEventType[] | undefined;
  enabled?: boolean | undefined;
}

export type WebhookHealth = 'healthy' | 'unhealthy' | 'error';

export interface WebhookHealthDetail {
  name: string;
  module: CrmModule;
  health: WebhookHealth;
  enabled: boolean;
  webhook_id: string | null;
  error?: string;
}

export interface WebhookHealthReport {
  total: number;
  healthy: number;
  unhealthy: number;
  details: WebhookHealthDetail[];
}

export interface WebhookStats {
  total_webhooks: number;
  enabled: number;
  disabled: number;
  by_module: Partial<Record<CrmModule, number>>;
  webhook_names: string[];
  timestamp: string;
}

/**
 * Owns the shared webhook secret and the set of CRM subscriptions.
 *
 * The in-memory map is the working copy; every change is written
 * through to the registry after the CRM has accepted it.
 */
export class WebhookConfigManager {
  private readonly webhooks = new Map<string, WebhookConfiguration>();
  private secretToken: string | null = null;
  private readonly baseUrl: string;
  private readonly provider: string;
  private readonly now: () => Date;

  constructor(
    private readonly crm: CrmWatchClient,
    private readonly registry: WebhookRegistry,
    private readonly log: Logger,
    private readonly options: WebhookConfigManagerOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.provider = options.provider ?? 'zoho';
    this.now = options.now ?? (() => new Date());
  }

  async initialize(): Promise<void> {
    this.log.info('Initializing webhook config');

    for (const config of await this.registry.load()) {
      this.webhooks.set(config.name, config);
    }
    this.log.info({ count: this.webhooks.size }, 'Persisted webhooks loaded');

    if (this.secretToken === null) {
      this.resolveSecret();
    }

    if (this.options.autoRegister) {
      await this.registerDefaultWebhooks();
    }

    this.log.info('Webhook config initialized');
  }

  /**
   * Configured secret first, then the one persisted subscriptions were
   * registered with, then a fresh one. The CRM signs with the secret it
   * was given at registration, so a restart must not rotate it.
   */
  private resolveSecret(): void {
    if (this.options.secret) {
      this.secretToken = this.options.secret;
      this.log.info({ source: 'configured' }, 'Webhook secret ready');
      return;
    }

    const changedAt = (c: WebhookConfiguration): string => c.updated_at ?? c.created_at ?? '';
    const persisted = [...this.webhooks.values()]
      .sort((a, b) => changedAt(b).localeCompare(changedAt(a)))
      .find((config) => config.secret_token.length > 0);
    if (persisted !== undefined) {
      this.secretToken = persisted.secret_token;
      this.log.info({ source: 'persisted', name: persisted.name }, 'Webhook secret ready');
      return;
    }

    this.secretToken = WebhookConfigManager.generateSecretToken();
    this.log.info({ source: 'generated' }, 'Webhook secret ready');
  }

  /** 32 random bytes, hex encoded. */
  static generateSecretToken(): string {
    return randomBytes(32).toString('hex');
  }

  getSecretToken(): string {
    if (this.secretToken === null) {
      throw new ConfigManagerNotInitializedError();
    }
    return this.secretToken;
  }

  get defaultUrl(): string {
    return `${this.baseUrl}/webhooks/${this.provider}`;
  }

  /**
   * Registers a subscription with the CRM and stores it once the CRM has
   * assigned its id.
   *
   * @throws RemoteRegistrationError when the CRM rejects the registration;
   * nothing is stored in that case.
   */
  async registerWebhook(
    name: string,
    module: CrmModule,
    events: readonly WebhookEventType[],
    url?: string,
  ): Promise<WebhookConfiguration> {
    this.log.info({ name, module, events }, 'Registering webhook');

    const createdAt = this.now().toISOString();
    const draft = createWebhookConfiguration({
      name,
      url: url ?? this.defaultUrl,
      module,
      events,
      secret_token: this.getSecretToken(),
      created_at: createdAt,
    });

    let webhookId: string;
    try {
      webhookId = await this.crm.register(draft);
    } catch (err: unknown) {
      if (!this.options.allowSyntheticIds) {
        this.log.error({ name, error: errorMessage(err) }, 'Webhook registration failed');
        throw new RemoteRegistrationError(
          `Failed to register webhook ${name}: ${errorMessage(err)}`,
          { cause: err },
        );
      }
      webhookId = `local_${name}`;
      this.log.warn(
        { name, webhook_id: webhookId, error: errorMessage(err) },
        'CRM registration failed, storing synthetic webhook id',
      );
    }

    const config: WebhookConfiguration = {
      ...draft,
      webhook_id: webhookId,
      updated_at: this.now().toISOString(),
    };
    try {
      await this.registry.save(config);
    } catch (err: unknown) {
      this.log.error({ name, webhook_id: webhookId, error: errorMessage(err) }, 'Webhook could not be stored');
      await this.rollbackRemote(config);
      throw err;
    }
    this.webhooks.set(name, config);

    this.log.info({ name, webhook_id: webhookId }, 'Webhook registered');
    return config;
  }

  /** Deletes a channel the CRM accepted but that could not be stored. */
  private async rollbackRemote(config: WebhookConfiguration): Promise<void> {
    if (config.webhook_id === `local_${config.name}`) return;
    try {
      await this.crm.unregister(config);
      this.log.warn({ name: config.name, webhook_id: config.webhook_id }, 'CRM registration rolled back');
    } catch (err: unknown) {
      this.log.error(
        { name: config.name, webhook_id: config.webhook_id, error: errorMessage(err) },
        'CRM rollback failed, channel left orphaned',
      );
    }
  }

  /**
   * Changes events and/or the enabled flag, pushing the change to the CRM
   * before committing it locally.
   *
   * @throws WebhookNotFoundError for an unknown name
   * @throws RemoteRegistrationError when the CRM rejects the update
   */
  async updateWebhook(name: string, update: WebhookUpdate): Promise<WebhookConfiguration> {
    const current = this.webhooks.get(name);
    if (current === undefined) {
      throw new WebhookNotFoundError(name);
    }

    const next = createWebhookConfiguration({
      ...current,
      events: update.events ?? current.events,
      enabled: update.enabled ?? current.enabled,
      updated_at: this.now().toISOString(),
    });

    try {
      await this.crm.update(next);
    } catch (err: unknown) {
      this.log.error({ name, error: errorMessage(err) }, 'Webhook update failed');
      throw new RemoteRegistrationError(`Failed to update webhook ${name}: ${errorMessage(err)}`, { cause: err });
    }

    await this.registry.save(next);
    this.webhooks.set(name, next);
    this.log.info({ name, events: next.events, enabled: next.enabled }, 'Webhook updated');
    return next;
  }

  /**
   * Removes a subscription. The stored record goes first, so a failure
   * there leaves everything as it was. The CRM delete is best-effort.
   * Returns false for an unknown name.
   */
  async unregisterWebhook(name: string): Promise<boolean> {
    const config = this.webhooks.get(name);
    if (config === undefined) {
      this.log.warn({ name }, 'Webhook not found');
      return false;
    }

    await this.registry.remove(name);
    this.webhooks.delete(name);

    try {
      await this.crm.unregister(config);
    } catch (err: unknown) {
      this.log.error(
        { name, webhook_id: config.webhook_id, error: errorMessage(err) },
        'CRM unregistration failed, local record already removed',
      );
    }

    this.log.info({ name }, 'Webhook unregistered');
    return true;
  }

  /**
   * Registers `<module>_webhook` for every module not yet subscribed.
   * A failing module is logged and skipped.
   */
  async registerDefaultWebhooks(): Promise<WebhookConfiguration[]> {
    this.log.info('Registering default webhooks');
    const registered: WebhookConfiguration[] = [];

    for (const module of CRM_MODULES) {
      const name = `${module.toLowerCase()}_webhook`;
      if (this.webhooks.has(name)) continue;

      try {
        registered.push(await this.registerWebhook(name, module, DEFAULT_EVENTS));
      } catch (err: unknown) {
        this.log.error({ module, error: errorMessage(err) }, 'Default webhook registration failed');
      }
    }

    this.log.info({ count: registered.length }, 'Default webhooks registered');
    return registered;
  }

  getWebhook(name: string): WebhookConfiguration | undefined {
    return this.webhooks.get(name);
  }

  listWebhooks(): WebhookConfiguration[] {
    return [...this.webhooks.values()];
  }

  getWebhookStats(): WebhookStats {
    const webhooks = this.listWebhooks();
    const enabled = webhooks.filter((w) => w.enabled).length;

    const byModule: Partial<Record<CrmModule, number>> = {};
    for (const webhook of webhooks) {
      byModule[webhook.module] = (byModule[webhook.module] ?? 0) + 1;
    }

    return {
      total_webhooks: webhooks.length,
      enabled,
      disabled: webhooks.length - enabled,
      by_module: byModule,
      webhook_names: webhooks.map((w) => w.name),
      timestamp: this.now().toISOString(),
    };
  }

  /** Asks the CRM about every subscription. Read-only. */
  async verifyWebhookHealth(): Promise<WebhookHealthReport> {
    this.log.info('Verifying webhook health');
    const report: WebhookHealthReport = { total: this.webhooks.size, healthy: 0, unhealthy: 0, details: [] };

    for (const config of this.webhooks.values()) {
      const base = {
        name: config.name,
        module: config.module,
        enabled: config.enabled,
        webhook_id: config.webhook_id,
      };

      try {
        const status = await this.crm.status(config);
        const health: WebhookHealth = status.active ? 'healthy' : 'unhealthy';
        if (status.active) report.healthy++;
        else report.unhealthy++;
        report.details.push({ ...base, health });
      } catch (err: unknown) {
        this.log.error({ name: config.name, error: errorMessage(err) }, 'Webhook health check failed');
        report.unhealthy++;
        report.details.push({ ...base, health: 'error', error: errorMessage(err) });
      }
    }

    this.log.info(
      { total: report.total, healthy: report.healthy, unhealthy: report.unhealthy },
      'Webhook health verification completed',
    );
    return report;
  }
}
