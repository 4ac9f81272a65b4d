import Fastify from 'fastify';
import type { FastifyBaseLogger } from 'fastify';
import { pino } from 'pino';

import {
  redisPlugin,
  dbPlugin,
  loadPipelineConfig,
  InMemoryWebhookRegistry,
  PostgresWebhookRegistry,
  HttpCrmWatchClient,
  HttpSyncTarget,
  DebouncedSyncTarget,
} from './infrastructure/index.js';

import {
  webhookRoutes,
  subscriptionRoutes,
  deadLetterRoutes,
} from './interfaces/http/index.js';

import {
  EventProcessor,
  WebhookConfigManager,
  WebhookIngress,
} from './application/index.js';
import type { SyncTarget, WebhookRegistry } from './application/index.js';

/**
 * Bootstrap the API process (ingress + subscription management).
 *
 * Order:
 * 1) Configuration
 * 2) Infrastructure plugins
 * 3) Application services
 * 4) HTTP routes
 * 5) listen()
 *
 * Queue consumption runs in the separate worker process (src/worker.ts).
 */
async function main(): Promise<void> {
  const config = loadPipelineConfig();

  // One pino instance shared by Fastify and the services.
  const log = pino({ level: config.server.logLevel });
  const baseLogger: FastifyBaseLogger = log;
  const fastify = Fastify({ loggerInstance: baseLogger });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { url: config.redisUrl });

  let registry: WebhookRegistry;
  if (config.webhook.registry === 'postgres') {
    await fastify.register(dbPlugin, { url: config.databaseUrl });
    registry = new PostgresWebhookRegistry(fastify.db, log.child({ component: 'registry' }));
  } else {
    registry = new InMemoryWebhookRegistry();
  }

  // --------------------------------------------------
  // Application services
  // --------------------------------------------------

  const crm = new HttpCrmWatchClient(config.crm, log.child({ component: 'crm' }));

  const manager = new WebhookConfigManager(crm, registry, log.child({ component: 'config-manager' }), {
    baseUrl: config.webhook.baseUrl,
    provider: config.webhook.provider,
    secret: config.webhook.secret,
    autoRegister: config.webhook.autoRegister,
    allowSyntheticIds: config.webhook.allowSyntheticIds,
  });
  await manager.initialize();

  const ingress = new WebhookIngress(fastify.queue, log.child({ component: 'ingress' }), {
    secret: () => manager.getSecretToken(),
    dedupTtlSeconds: config.ingress.dedupTtlSeconds,
    maxQueueSize: config.ingress.maxQueueSize,
  });

  const httpTarget = new HttpSyncTarget({ url: config.sync.url }, log.child({ component: 'sync-target' }));
  const syncTarget: SyncTarget = config.sync.debounceMs > 0
    ? new DebouncedSyncTarget(httpTarget, config.sync.debounceMs, log.child({ component: 'sync-debounce' }))
    : httpTarget;

  // Not started: this instance only serves dead-letter replays.
  const replayProcessor = new EventProcessor(fastify.queue, syncTarget, log.child({ component: 'replay' }), {
    maxRetries: config.processor.maxRetries,
    retryDelayBaseMs: config.processor.retryDelayBaseMs,
    retryDelayMaxMs: config.processor.retryDelayMaxMs,
    deadLetterTtlSeconds: config.processor.deadLetterTtlSeconds,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(webhookRoutes, {
    ingress,
    queue: fastify.queue,
    provider: config.webhook.provider,
  });
  await fastify.register(subscriptionRoutes, { manager });
  await fastify.register(deadLetterRoutes, { processor: replayProcessor });

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down API');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
