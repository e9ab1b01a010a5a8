import fp from 'fastify-plugin';
import type { PipelineMetrics, SchedulerPhase } from '../observability/metrics';
import type { SchedulerState } from '../scheduler/scheduler';

declare module 'fastify' {
  interface FastifyRequest {
    metricsStart?: bigint;
  }
}

type MetricsPluginOptions = {
  metrics: PipelineMetrics;
  getSchedulerState: () => SchedulerState;
};

export function schedulerPhase(state: SchedulerState): SchedulerPhase {
  if (!state.started) {
    return 'stopped';
  }
  return state.cycleInFlight ? 'cycling' : 'idle';
}

/** Times system-server requests into the pipeline metrics and serves `/metrics`. */
export const metricsPlugin = fp<MetricsPluginOptions>(async (app, { metrics, getSchedulerState }) => {
  if (metrics.enabled) {
    app.addHook('onRequest', async (request) => {
      request.metricsStart = process.hrtime.bigint();
    });

    app.addHook('onResponse', async (request, reply) => {
      const start = request.metricsStart ?? process.hrtime.bigint();
      metrics.observeHttpRequest({
        method: request.method,
        route: request.routeOptions?.url ?? request.raw.url ?? 'unknown',
        status: reply.statusCode,
        scheduler: schedulerPhase(getSchedulerState()),
        seconds: Number(process.hrtime.bigint() - start) / 1_000_000_000
      });
    });
  }

  app.get('/metrics', async (_request, reply) => {
    const body = await metrics.render();
    if (body === null) {
      reply.code(503).type('text/plain').send('metrics disabled');
      return;
    }
    reply.type('text/plain; version=0.0.4');
    return body;
  });
});
