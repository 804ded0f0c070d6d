import { config } from '@config/index';
import { createServer, startServer } from '@infrastructure/server';
import { initTracing, shutdownTracing } from '@infrastructure/observability';
import { logger } from '@infrastructure/logging';
import { toError } from '@domain/errors';
import { createPipeline } from '@services/pipeline';

async function main(): Promise<void> {
  if (config.tracing.enabled) {
    initTracing();
  }

  const pipeline = createPipeline(config);
  pipeline.jobs.start();

  const server = await createServer(pipeline);
  await startServer(server, pipeline);

  logger.info('Image pipeline service started', {
    storage: pipeline.storage.name,
    metadata: pipeline.store.name,
    cache: pipeline.cache.backendName,
    queue: pipeline.jobs.queueName,
    concurrency: config.queue.concurrency,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);
    await server.close();
    await pipeline.close();
    await shutdownTracing();
    logger.info('Server closed');
  };

  const onSignal = (signal: string): void => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.fatal('Shutdown failed', toError(error));
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((error: unknown) => {
  logger.fatal('Failed to start server', toError(error));
  process.exit(1);
});
