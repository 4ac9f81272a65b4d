import type { Logger } from 'pino';
import { resolveSyncAction } from '../domain/index.js';
import type { DeadLetterEntry, WebhookEvent } from '../domain/index.js';
import { abortableSleep, retryWithBackoff } from './backoff.js';
import type { BackoffPolicy, Sleep } from './backoff.js';
import { Counters, formatRate } from './counters.js';
import { RetryExhaustedError, errorMessage } from './errors.js';
import type { DurableQueue, SyncTarget } from './ports.js';
import { DEAD_LETTER_KEY, QUEUE_KEY } from './ports.js';
import { decodeQueuedEvent } from './webhook-payload-schema.js';

export interface EventProcessorOptions {
  batchSize?: number;
  /** Per-pop blocking timeout. Fractions are allowed. */
  batchTimeoutSeconds?: number;
  maxRetries?: number;
  retryDelayBaseMs?: number;
  retryDelayMaxMs?: number;
  /** Pause after an empty pull. */
  idleDelayMs?: number;
  /** Pause after a loop-level failure. */
  errorDelayMs?: number;
  deadLetterTtlSeconds?: number;
  /**
   * Clock for the pause between retry attempts. Defaults to a timer;
   * a deployment may swap it for a scheduler-aware one.
   */
  retryClock?: Sleep;
}

const PROCESSOR_COUNTERS = {
  events_processed: 0,
  events_succeeded: 0,
  events_failed: 0,
  events_retried: 0,
  events_dead_letter: 0,
  batches_processed: 0,
  average_processing_time: 0,
};

export type ProcessorCounterName = keyof typeof PROCESSOR_COUNTERS;

export type ProcessorMetrics = Record<ProcessorCounterName, number> & {
  last_processed: string | null;
  current_queue_size: number;
  dead_letter_queue_size: number;
  workers_running: number;
  processor_running: boolean;
  success_rate: string;
  timestamp: string;
};

export interface ReprocessResult {
  attempted: number;
  succeeded: number;
  failed: number;
}

/**
 * Worker pool applying queued events to the Sync Target.
 *
 * Each worker loop pulls a batch, fans it out concurrently and records
 * metrics. A failing event is retried with exponential backoff and then
 * dead-lettered; it never fails its siblings or the loop.
 *
 * No ordering is guaranteed across events. Account syncs refetch current
 * CRM state, so out-of-order application converges.
 */
export class EventProcessor {
  readonly counters = new Counters<ProcessorCounterName>(PROCESSOR_COUNTERS);
  private lastProcessed: string | null = null;
  private controller: AbortController | null = null;
  private workers: Promise<void>[] = [];

  private readonly batchSize: number;
  private readonly batchTimeoutSeconds: number;
  private readonly idleDelayMs: number;
  private readonly errorDelayMs: number;
  private readonly deadLetterTtlSeconds: number;
  private readonly backoff: BackoffPolicy;
  private readonly retryClock: Sleep | undefined;

  constructor(
    private readonly queue: DurableQueue,
    private readonly syncTarget: SyncTarget,
    private readonly log: Logger,
    options: EventProcessorOptions = {},
  ) {
    this.batchSize = options.batchSize ?? 10;
    this.batchTimeoutSeconds = options.batchTimeoutSeconds ?? 5;
    this.idleDelayMs = options.idleDelayMs ?? 1000;
    this.errorDelayMs = options.errorDelayMs ?? 5000;
    this.deadLetterTtlSeconds = options.deadLetterTtlSeconds ?? 604_800;
    this.backoff = {
      maxAttempts: options.maxRetries ?? 3,
      baseDelayMs: options.retryDelayBaseMs ?? 2000,
      maxDelayMs: options.retryDelayMaxMs ?? 30_000,
    };
    this.retryClock = options.retryClock;
  }

  get running(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  get maxRetries(): number {
    return this.backoff.maxAttempts;
  }

  start(numWorkers = 3): void {
    if (this.running) {
      this.log.warn('Processor already running');
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.log.info({ num_workers: numWorkers }, 'Starting webhook processor');

    for (let i = 0; i < numWorkers; i++) {
      this.workers.push(this.runWorker(i, controller.signal));
    }

    this.log.info({ workers: numWorkers }, 'Webhook processor started');
  }

  /** Signals every worker to exit after its current batch and waits for them. */
  async stop(): Promise<void> {
    this.log.info('Stopping webhook processor');
    this.controller?.abort();

    await Promise.allSettled(this.workers);
    this.workers = [];
    this.controller = null;

    this.log.info('Webhook processor stopped');
  }

  private async runWorker(workerId: number, signal: AbortSignal): Promise<void> {
    const log = this.log.child({ worker_id: workerId });
    log.info('Worker started');

    while (!signal.aborted) {
      try {
        const batch = await this.collectBatch();

        if (batch.length === 0) {
          await abortableSleep(this.idleDelayMs, signal);
          continue;
        }

        await this.processBatch(batch, log);
      } catch (err: unknown) {
        log.error({ err }, 'Worker loop error');
        await abortableSleep(this.errorDelayMs, signal);
      }
    }

    log.info('Worker stopped');
  }

  /**
   * Pulls up to `batchSize` raw items, blocking up to the batch timeout
   * per pop and stopping at the first timeout.
   *
   * A pop failure ends the batch early; items already popped are
   * returned. It only rejects when nothing was popped.
   */
  async collectBatch(): Promise<string[]> {
    const items: string[] = [];

    while (items.length < this.batchSize) {
      let item: string | null;
      try {
        item = await this.queue.popBlocking(QUEUE_KEY, this.batchTimeoutSeconds);
      } catch (err: unknown) {
        if (items.length === 0) throw err;
        this.log.error({ err, collected: items.length }, 'Queue pop failed, processing partial batch');
        break;
      }
      if (item === null) break;
      items.push(item);
    }

    return items;
  }

  async processBatch(items: readonly string[], log: Logger = this.log): Promise<void> {
    const startedAt = performance.now();
    log.info({ batch_size: items.length }, 'Processing batch');

    const results = await Promise.allSettled(items.map((item) => this.processQueuedItem(item)));

    const succeeded = results.filter((r) => r.status === 'fulfilled' && r.value).length;
    const failed = results.length - succeeded;

    this.counters.increment('batches_processed');
    this.counters.increment('events_processed', items.length);
    this.counters.increment('events_succeeded', succeeded);
    this.counters.increment('events_failed', failed);
    this.lastProcessed = new Date().toISOString();

    const durationSeconds = (performance.now() - startedAt) / 1000;
    const batches = this.counters.get('batches_processed');
    const previousAvg = this.counters.get('average_processing_time');
    this.counters.set(
      'average_processing_time',
      (previousAvg * (batches - 1) + durationSeconds) / batches,
    );

    log.info(
      { succeeded, failed, duration_seconds: durationSeconds },
      'Batch processed',
    );
  }

  /** Decodes one raw queue item; undecodable items go straight to the dead-letter queue. */
  private async processQueuedItem(item: string): Promise<boolean> {
    let event: WebhookEvent;
    try {
      event = decodeQueuedEvent(JSON.parse(item));
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err), item }, 'Undecodable queue item');
      await this.moveToDeadLetter({ raw: item }, `Undecodable queue item: ${errorMessage(err)}`, 0);
      return false;
    }
    return this.processEvent(event);
  }

  /**
   * Applies one event with retry. Returns false after dead-lettering it.
   */
  async processEvent(event: WebhookEvent): Promise<boolean> {
    const context = {
      event_id: event.event_id,
      event_type: event.event_type,
      module: event.module,
      record_id: event.record_id,
    };
    this.log.info(context, 'Processing event');

    try {
      await retryWithBackoff(
        () => this.applyEvent(event),
        this.backoff,
        {
          sleep: this.retryClock,
          onRetry: (attempt, delayMs, err) => {
            this.counters.increment('events_retried');
            this.log.warn(
              { ...context, attempt, delay_ms: delayMs, error: errorMessage(err) },
              'Event processing failed, retrying',
            );
          },
        },
      );

      this.log.info({ event_id: event.event_id }, 'Event processed successfully');
      return true;
    } catch (err: unknown) {
      const attempts = err instanceof RetryExhaustedError ? err.attempts : this.backoff.maxAttempts;
      this.log.error({ ...context, error: errorMessage(err), attempts }, 'Event processing failed');
      await this.moveToDeadLetter(event, errorMessage(err), attempts);
      return false;
    }
  }

  private async applyEvent(event: WebhookEvent): Promise<void> {
    const action = resolveSyncAction(event);

    switch (action.kind) {
      case 'sync-account':
        this.log.debug(
          { event_id: event.event_id, account_id: action.account_id, force: action.force },
          'Syncing account',
        );
        await this.syncTarget.syncAccount(action.account_id, { force: action.force });
        return;
      case 'skip':
        this.log.debug({ event_id: event.event_id, reason: action.reason }, 'No sync required');
        return;
      case 'ignore-delete':
        this.log.warn(
          { event_id: event.event_id, module: event.module, record_id: event.record_id },
          'Delete event received, not propagated',
        );
        return;
    }
  }

  private async moveToDeadLetter(
    event: DeadLetterEntry['event'],
    error: string,
    retryCount: number,
  ): Promise<void> {
    const entry: DeadLetterEntry = {
      event,
      error,
      failed_at: new Date().toISOString(),
      retry_count: retryCount,
    };
    const eventId = typeof event['event_id'] === 'string' ? event['event_id'] : 'unknown';

    try {
      await this.queue.push(DEAD_LETTER_KEY, JSON.stringify(entry));
      await this.queue.expire(DEAD_LETTER_KEY, this.deadLetterTtlSeconds);
      this.counters.increment('events_dead_letter');
      this.log.warn({ event_id: eventId, error }, 'Event moved to dead letter queue');
    } catch (err: unknown) {
      // The entry exists only in this log line now.
      this.log.fatal({ err, entry }, 'Dead letter write failed');
    }
  }

  /**
   * Pops up to `limit` dead-letter entries and runs each through the
   * normal per-event path. An entry that fails again is dead-lettered anew.
   *
   * Only entries present when the call starts are visited; re-pushed
   * failures land behind them and wait for the next call.
   */
  async reprocessDeadLetter(limit = 10): Promise<ReprocessResult> {
    this.log.info({ limit }, 'Reprocessing dead letter queue');
    const result: ReprocessResult = { attempted: 0, succeeded: 0, failed: 0 };

    let available: number;
    try {
      available = Math.min(limit, await this.queue.length(DEAD_LETTER_KEY));
    } catch (err: unknown) {
      this.log.error({ err }, 'Dead letter size lookup failed');
      return result;
    }

    for (let i = 0; i < available; i++) {
      let raw: string | null;
      try {
        raw = await this.queue.pop(DEAD_LETTER_KEY);
      } catch (err: unknown) {
        this.log.error({ err }, 'Dead letter pop failed');
        break;
      }
      if (raw === null) break;

      result.attempted++;

      let event: WebhookEvent;
      try {
        const parsed: unknown = JSON.parse(raw);
        const inner = typeof parsed === 'object' && parsed !== null && 'event' in parsed
          ? parsed.event
          : undefined;
        event = decodeQueuedEvent(inner);
      } catch (err: unknown) {
        result.failed++;
        this.log.error({ err: errorMessage(err) }, 'Dead letter entry is not replayable, keeping it');
        await this.restoreDeadLetterEntry(raw);
        continue;
      }

      if (await this.processEvent(event)) {
        result.succeeded++;
      } else {
        result.failed++;
      }
    }

    this.log.info(result, 'Dead letter reprocessing completed');
    return result;
  }

  private async restoreDeadLetterEntry(raw: string): Promise<void> {
    try {
      await this.queue.push(DEAD_LETTER_KEY, raw);
    } catch (err: unknown) {
      // The entry exists only in this log line now.
      this.log.fatal({ err, entry: raw }, 'Dead letter restore failed');
    }
  }

  async getMetrics(): Promise<ProcessorMetrics> {
    const counts = this.counters.snapshot();

    let queueSize = -1;
    let deadLetterSize = -1;
    try {
      queueSize = await this.queue.length(QUEUE_KEY);
      deadLetterSize = await this.queue.length(DEAD_LETTER_KEY);
    } catch (err: unknown) {
      this.log.warn({ err }, 'Queue size lookup failed');
    }

    return {
      ...counts,
      last_processed: this.lastProcessed,
      current_queue_size: queueSize,
      dead_letter_queue_size: deadLetterSize,
      workers_running: this.workers.length,
      processor_running: this.running,
      success_rate: formatRate(counts.events_succeeded, counts.events_processed),
      timestamp: new Date().toISOString(),
    };
  }
}
