import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { WebhookEvent } from '../domain/index.js';
import { Counters, formatRate } from './counters.js';
import {
  IngressProcessingError,
  MalformedPayloadError,
  PipelineError,
  QueueCapacityExceededError,
  WebhookAuthenticationError,
  errorMessage,
} from './errors.js';
import type { DurableQueue } from './ports.js';
import { EVENTS_CHANNEL, QUEUE_KEY, dedupKey } from './ports.js';
import { verifySignature } from './signature.js';
import { decodeWebhookPayload, normalizeWebhookPayload } from './webhook-payload-schema.js';

export interface WebhookRequest {
  rawBody: Buffer;
  signature?: string | undefined;
  eventId?: string | undefined;
}

export interface WebhookResponse {
  status: 'accepted' | 'duplicate';
  event_id: string;
  message: string;
  queued: boolean;
}

export interface WebhookIngressOptions {
  /** Resolved on every request so a rotated secret takes effect immediately. */
  secret: () => string;
  dedupTtlSeconds?: number;
  maxQueueSize?: number;
  now?: () => Date;
}

export interface IngressHealth {
  status: 'healthy' | 'unhealthy';
  redis_connected: boolean;
  queue_size: number;
  queue_capacity: number;
  queue_utilization: string;
  timestamp: string;
}

const INGRESS_COUNTERS = {
  total_events: 0,
  verified_events: 0,
  rejected_events: 0,
  duplicated_events: 0,
  queued_events: 0,
  failed_events: 0,
};

export type IngressCounterName = keyof typeof INGRESS_COUNTERS;

export type IngressMetrics = Record<IngressCounterName, number> & {
  current_queue_size: number;
  acceptance_rate: string;
  deduplication_rate: string;
  timestamp: string;
};

/**
 * Trust boundary of the pipeline.
 *
 * verify → parse → dedupe → enqueue. Nothing reaches the queue without
 * a valid signature, a decodable body and a fresh event id.
 */
export class WebhookIngress {
  readonly counters = new Counters<IngressCounterName>(INGRESS_COUNTERS);
  readonly dedupTtlSeconds: number;
  readonly maxQueueSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly queue: DurableQueue,
    private readonly log: Logger,
    private readonly options: WebhookIngressOptions,
  ) {
    this.dedupTtlSeconds = options.dedupTtlSeconds ?? 3600;
    this.maxQueueSize = options.maxQueueSize ?? 10_000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Handles one inbound webhook request.
   *
   * @throws WebhookAuthenticationError on a missing or wrong signature (401)
   * @throws MalformedPayloadError when the body cannot be decoded (400)
   * @throws QueueCapacityExceededError when the queue is full or unreachable (503)
   * @throws IngressProcessingError on anything else (500)
   */
  async handleWebhook(request: WebhookRequest): Promise<WebhookResponse> {
    this.counters.increment('total_events');

    try {
      this.log.info(
        { event_id: request.eventId, content_length: request.rawBody.length },
        'Webhook received',
      );

      if (!verifySignature(this.options.secret(), request.rawBody, request.signature)) {
        this.counters.increment('rejected_events');
        this.log.warn(
          { event_id: request.eventId, signature_present: Boolean(request.signature) },
          'Webhook signature verification failed',
        );
        throw new WebhookAuthenticationError('Invalid webhook signature');
      }
      this.counters.increment('verified_events');

      const event = this.parse(request);

      if (!(await this.markAdmitted(event.event_id))) {
        this.counters.increment('duplicated_events');
        this.log.info({ event_id: event.event_id }, 'Duplicate webhook detected');
        return {
          status: 'duplicate',
          event_id: event.event_id,
          message: 'Event already processed',
          queued: false,
        };
      }

      if (!(await this.enqueue(event))) {
        this.counters.increment('failed_events');
        await this.releaseAdmission(event.event_id);
        throw new QueueCapacityExceededError('Queue full or unavailable');
      }

      this.counters.increment('queued_events');
      this.log.info(
        { event_id: event.event_id, module: event.module, event_type: event.event_type },
        'Webhook event queued',
      );
      return {
        status: 'accepted',
        event_id: event.event_id,
        message: 'Event queued for processing',
        queued: true,
      };
    } catch (err: unknown) {
      if (err instanceof PipelineError) throw err;

      this.counters.increment('failed_events');
      this.log.error({ err, event_id: request.eventId }, 'Webhook processing failed');
      throw new IngressProcessingError(`Internal processing error: ${errorMessage(err)}`, { cause: err });
    }
  }

  private parse(request: WebhookRequest): WebhookEvent {
    let body: unknown;
    try {
      body = JSON.parse(request.rawBody.toString('utf-8'));
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err), event_id: request.eventId }, 'Webhook JSON parse failed');
      throw new MalformedPayloadError('Invalid JSON payload', [], { cause: err });
    }

    try {
      const decoded = decodeWebhookPayload(body);
      return normalizeWebhookPayload(decoded, request.eventId || randomUUID(), this.now());
    } catch (err: unknown) {
      if (err instanceof MalformedPayloadError) {
        this.log.warn(
          { event_id: request.eventId, error: err.message, issues: err.issues },
          'Webhook payload rejected',
        );
      }
      throw err;
    }
  }

  /** SET NX on the dedup ledger. False means the id was already admitted. */
  private async markAdmitted(eventId: string): Promise<boolean> {
    return this.queue.setIfAbsent(dedupKey(eventId), '1', this.dedupTtlSeconds);
  }

  /**
   * Drops the dedup key of an event that was not queued, so the sender's
   * retry is admitted instead of answered as a duplicate.
   */
  private async releaseAdmission(eventId: string): Promise<void> {
    try {
      await this.queue.remove(dedupKey(eventId));
    } catch (err: unknown) {
      this.log.error({ err, event_id: eventId }, 'Failed to release dedup key; retries are dropped until it expires');
    }
  }

  /**
   * Pushes the serialized event onto the live queue and announces it on
   * the events channel.
   *
   * Returns false, without throwing, when the queue is at capacity or the
   * backend fails.
   */
  async enqueue(event: WebhookEvent): Promise<boolean> {
    try {
      const queueSize = await this.queue.length(QUEUE_KEY);
      if (queueSize >= this.maxQueueSize) {
        this.log.warn(
          { queue_size: queueSize, max_size: this.maxQueueSize, event_id: event.event_id },
          'Webhook queue full',
        );
        return false;
      }

      const serialized = JSON.stringify(event);
      await this.queue.push(QUEUE_KEY, serialized);
      await this.queue.publish(EVENTS_CHANNEL, serialized);
      return true;
    } catch (err: unknown) {
      this.log.error({ err, event_id: event.event_id }, 'Failed to enqueue webhook event');
      return false;
    }
  }

  async getHealthStatus(): Promise<IngressHealth> {
    let connected = true;
    try {
      await this.queue.ping();
    } catch (err: unknown) {
      this.log.error({ err }, 'Queue health check failed');
      connected = false;
    }

    const queueSize = await this.safeQueueSize();

    return {
      status: connected ? 'healthy' : 'unhealthy',
      redis_connected: connected,
      queue_size: queueSize,
      queue_capacity: this.maxQueueSize,
      queue_utilization: queueSize >= 0 ? formatRate(queueSize, this.maxQueueSize) : 'unknown',
      timestamp: this.now().toISOString(),
    };
  }

  async getMetrics(): Promise<IngressMetrics> {
    const counts = this.counters.snapshot();

    return {
      ...counts,
      current_queue_size: await this.safeQueueSize(),
      acceptance_rate: formatRate(counts.verified_events, counts.total_events),
      deduplication_rate: formatRate(counts.duplicated_events, counts.total_events),
      timestamp: this.now().toISOString(),
    };
  }

  private async safeQueueSize(): Promise<number> {
    try {
      return await this.queue.length(QUEUE_KEY);
    } catch {
      return -1;
    }
  }
}
