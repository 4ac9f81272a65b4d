import type { WebhookConfiguration } from '../../domain/index.js';
import type { WebhookRegistry } from '../../application/ports.js';

/**
 * In-memory subscription registry.
 *
 * Default for single-instance deployments: subscriptions are
 * re-registered on every start when auto-registration is enabled.
 * Provides the same interface as the Postgres registry so the config
 * manager doesn't need to know where subscriptions live.
 */
export class InMemoryWebhookRegistry implements WebhookRegistry {
  private readonly configs: Map<string, WebhookConfiguration> = new Map();

  async load(): Promise<WebhookConfiguration[]> {
    return [...this.configs.values()];
  }

  async save(config: WebhookConfiguration): Promise<void> {
    this.configs.set(config.name, config);
  }

  async remove(name: string): Promise<boolean> {
    return this.configs.delete(name);
  }
}
