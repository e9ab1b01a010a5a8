import type { FastifyInstance } from 'fastify';
import { buildApp } from './app';
import { loadServiceConfig } from './config/serviceConfig';
import { closePool, getDatabase, setPoolErrorHandler, withConnection } from './db/client';
import { runMigrationsWithConnection } from './db/migrations';
import { ensureSchemaExists } from './db/schema';
import { EarthEngineProvider } from './imagery/earthEngine';
import { ImageryExportClient } from './imagery/exportClient';
import { PostgresAreaStore, PostgresJobStore, PostgresTimeseriesStore } from './jobs/store';
import { componentLogger, createLogger } from './observability/logger';
import { createPipelineMetrics } from './observability/metrics';
import { RasterProcessor } from './raster/processor';
import { PipelineDispatcher } from './scheduler/dispatch';
import { JobScheduler } from './scheduler/scheduler';
import { createBlobStore } from './storage/blobStore';

async function main(): Promise<void> {
  const config = loadServiceConfig();
  const logger = createLogger(config.logLevel);
  const log = componentLogger(logger, 'worker');
  setPoolErrorHandler((err) => log.error({ err }, 'unexpected error on idle postgres client'));

  await ensureSchemaExists(config.database.schema);
  await runMigrationsWithConnection();

  const metrics = createPipelineMetrics({ enabled: config.metricsEnabled, collectDefaults: true });
  const db = getDatabase();
  const jobStore = new PostgresJobStore(db);
  const blobStore = createBlobStore(config.storage, componentLogger(logger, 'storage'));

  const exportClient = new ImageryExportClient({
    provider: new EarthEngineProvider({ config: config.imagery, logger: componentLogger(logger, 'imagery') }),
    blobStore,
    jobStore,
    metrics,
    logger: componentLogger(logger, 'export')
  });
  const rasterProcessor = new RasterProcessor({
    blobStore,
    timeseriesStore: new PostgresTimeseriesStore(db),
    config: config.raster,
    logger: componentLogger(logger, 'raster')
  });
  const scheduler = new JobScheduler({
    jobStore,
    blobStore,
    dispatcher: new PipelineDispatcher({ areaStore: new PostgresAreaStore(db), exportClient, rasterProcessor }),
    config: config.scheduler,
    metrics,
    logger: componentLogger(logger, 'scheduler')
  });

  let app: FastifyInstance | null = null;
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ signal }, 'shutting down pipeline worker');
    try {
      await scheduler.stop();
      if (app) {
        await app.close();
      }
      await closePool();
    } catch (err) {
      log.error({ err }, 'error during pipeline worker shutdown');
    }
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
  // The poll timer keeps running; a failed cycle is retried on the next tick.
  process.on('uncaughtException', (err) => {
    log.error({ err }, 'uncaught exception in pipeline worker');
  });
  process.on('unhandledRejection', (reason) => {
    log.error({ err: reason }, 'unhandled rejection in pipeline worker');
  });

  app = await buildApp({
    config,
    metrics,
    getSchedulerState: () => scheduler.getState(),
    checkDatabase: async () => {
      await withConnection(async (client) => {
        await client.query('SELECT 1 AS readiness_check');
      });
    }
  });
  await app.listen({ host: config.host, port: config.port });
  log.info({ host: config.host, port: config.port }, 'pipeline system server listening');

  scheduler.start();
}

main().catch(async (err) => {
  console.error('[nightlight:pipeline] fatal startup error', err);
  try {
    await closePool();
  } catch (closeErr) {
    console.error('[nightlight:pipeline] failed to close postgres pool after startup failure', closeErr);
  }
  process.exit(1);
});
