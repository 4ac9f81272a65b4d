import type { Logger } from 'pino';
import type { SyncOptions, SyncTarget } from '../../application/ports.js';

export interface HttpSyncTargetConfig {
  /** Base URL of the memory service, e.g. http://memory:8080 */
  url: string;
  timeoutMs?: number;
}

export class SyncTargetError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = 'SyncTargetError';
  }
}

/**
 * Sync Target reached over HTTP.
 *
 * POST <url>/accounts/<id>/sync with `{ force }`; the memory service
 * refetches the account from the CRM. Any non-2xx reply is thrown so
 * the processor retries it.
 */
export class HttpSyncTarget implements SyncTarget {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(config: HttpSyncTargetConfig, private readonly log: Logger) {
    this.url = config.url.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 30_000;
  }

  async syncAccount(accountId: string, options: SyncOptions): Promise<void> {
    const response = await fetch(`${this.url}/accounts/${encodeURIComponent(accountId)}/sync`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ force: options.force }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new SyncTargetError(
        `Account sync for ${accountId} failed with status ${response.status}`,
        response.status,
      );
    }

    this.log.debug({ account_id: accountId, force: options.force }, 'Account synced');
  }
}
