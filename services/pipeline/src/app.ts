import fastify, { type FastifyInstance } from 'fastify';
import type { ServiceConfig } from './config/serviceConfig';
import type { PipelineMetrics } from './observability/metrics';
import { metricsPlugin } from './plugins/metrics';
import { registerSystemRoutes, type SystemRouteOptions } from './routes/system';

export type BuildAppOptions = SystemRouteOptions & {
  config: ServiceConfig;
  metrics: PipelineMetrics;
};

/** System server of the worker process: health, readiness and Prometheus metrics. */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = fastify({
    logger: {
      level: options.config.logLevel
    }
  });

  await app.register(metricsPlugin, {
    metrics: options.metrics,
    getSchedulerState: options.getSchedulerState
  });
  await registerSystemRoutes(app, options);

  return app;
}
