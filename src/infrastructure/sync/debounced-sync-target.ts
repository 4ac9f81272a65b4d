import type { Logger } from 'pino';
import type { SyncOptions, SyncTarget } from '../../application/ports.js';

/**
 * Drops non-forced syncs of an account synced within the last `windowMs`.
 *
 * Forced syncs always pass and restart the window. The map is local to
 * the process, so each worker process debounces independently.
 */
export class DebouncedSyncTarget implements SyncTarget {
  private readonly lastSynced = new Map<string, number>();

  constructor(
    private readonly inner: SyncTarget,
    private readonly windowMs: number,
    private readonly log: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  async syncAccount(accountId: string, options: SyncOptions): Promise<void> {
    const at = this.now();
    const previous = this.lastSynced.get(accountId);

    if (!options.force && previous !== undefined && at - previous < this.windowMs) {
      this.log.debug({ account_id: accountId, since_ms: at - previous }, 'Account sync debounced');
      return;
    }

    await this.inner.syncAccount(accountId, options);
    this.lastSynced.set(accountId, at);
    this.prune(at);
  }

  private prune(at: number): void {
    for (const [accountId, syncedAt] of this.lastSynced) {
      if (at - syncedAt >= this.windowMs) this.lastSynced.delete(accountId);
    }
  }
}
