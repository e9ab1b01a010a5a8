import type { FastifyInstance, FastifyReply } from 'fastify';
import { errorMessage } from '../errors';
import type { SchedulerState } from '../scheduler/scheduler';

export type SystemRouteOptions = {
  getSchedulerState: () => SchedulerState;
  checkDatabase: () => Promise<void>;
};

export async function registerSystemRoutes(app: FastifyInstance, options: SystemRouteOptions): Promise<void> {
  app.get('/health', async () => {
    const scheduler = options.getSchedulerState();
    return {
      status: scheduler.storageReady ? 'ok' : 'degraded',
      scheduler
    };
  });

  app.get('/ready', async (_request, reply: FastifyReply) => {
    try {
      await options.checkDatabase();
    } catch (err) {
      app.log.warn({ err }, 'readiness check failed');
      reply.status(503);
      return { status: 'unavailable', reason: errorMessage(err) };
    }
    return { status: 'ok' };
  });
}
