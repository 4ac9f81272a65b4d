import { pino } from 'pino';
import { EventProcessor, PROCESSOR_METRICS_KEY } from './application/index.js';
import type { SyncTarget } from './application/index.js';
import {
  createRedisClient,
  RedisDurableQueue,
  loadPipelineConfig,
  HttpSyncTarget,
  DebouncedSyncTarget,
} from './infrastructure/index.js';

/**
 * Standalone worker process draining the webhook queue into the Sync Target.
 *
 * Runs independently of the Fastify HTTP server and can be scaled
 * horizontally: every instance pops from the same Redis list.
 * Metrics are published to Redis under a TTL key for the API to serve.
 */
const config = loadPipelineConfig();
const log = pino({ level: config.server.logLevel });

const redis = createRedisClient(config.redisUrl);
const queue = new RedisDurableQueue(redis);

const httpTarget = new HttpSyncTarget({ url: config.sync.url }, log.child({ component: 'sync-target' }));
const syncTarget: SyncTarget = config.sync.debounceMs > 0
  ? new DebouncedSyncTarget(httpTarget, config.sync.debounceMs, log.child({ component: 'sync-debounce' }))
  : httpTarget;

const processor = new EventProcessor(queue, syncTarget, log.child({ component: 'processor' }), {
  batchSize: config.processor.batchSize,
  batchTimeoutSeconds: config.processor.batchTimeoutSeconds,
  maxRetries: config.processor.maxRetries,
  retryDelayBaseMs: config.processor.retryDelayBaseMs,
  retryDelayMaxMs: config.processor.retryDelayMaxMs,
  deadLetterTtlSeconds: config.processor.deadLetterTtlSeconds,
});

let metricsTimer: NodeJS.Timeout | null = null;

async function publishMetrics(): Promise<void> {
  const ttlSeconds = Math.ceil((config.processor.metricsPublishIntervalMs * 3) / 1000);
  const metrics = await processor.getMetrics();
  await queue.setWithExpiry(PROCESSOR_METRICS_KEY, JSON.stringify(metrics), ttlSeconds);
}

async function main(): Promise<void> {
  await redis.connect();
  log.info('Redis connected');

  processor.start(config.processor.workers);

  metricsTimer = setInterval(() => {
    publishMetrics().catch((err: unknown) => {
      log.warn({ err }, 'Processor metrics publish failed');
    });
  }, config.processor.metricsPublishIntervalMs);
  await publishMetrics();
}

// Graceful shutdown on SIGINT / SIGTERM
async function shutdown(signal: string): Promise<void> {
  log.info({ signal }, 'Shutting down worker...');
  if (metricsTimer !== null) clearInterval(metricsTimer);

  await processor.stop();
  await queue.close();
  await redis.quit();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Worker shutdown failed');
        process.exit(1);
      },
    );
  });
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
