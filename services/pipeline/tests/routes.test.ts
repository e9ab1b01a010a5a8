import assert from 'node:assert/strict';
import { afterEach, test } from 'node:test';
import type { FastifyInstance } from 'fastify';
import { Registry } from 'prom-client';

import { buildApp } from '../src/app';
import { loadServiceConfig, resetCachedServiceConfig } from '../src/config/serviceConfig';
import { createPipelineMetrics, type PipelineMetrics } from '../src/observability/metrics';
import { schedulerPhase } from '../src/plugins/metrics';
import type { SchedulerState } from '../src/scheduler/scheduler';

const apps: FastifyInstance[] = [];

afterEach(async () => {
  while (apps.length > 0) {
    await apps.pop()?.close();
  }
  resetCachedServiceConfig();
});

function schedulerState(overrides: Partial<SchedulerState> = {}): SchedulerState {
  return { started: true, cycleInFlight: false, storageReady: true, lastCycle: null, ...overrides };
}

async function createApp(options: {
  env?: Record<string, string>;
  state?: SchedulerState;
  checkDatabase?: () => Promise<void>;
  metrics?: PipelineMetrics;
} = {}): Promise<FastifyInstance> {
  resetCachedServiceConfig();
  const config = loadServiceConfig({ NIGHTLIGHT_LOG_LEVEL: 'silent', ...options.env });
  const app = await buildApp({
    config,
    metrics: options.metrics ?? createPipelineMetrics({ enabled: config.metricsEnabled }),
    getSchedulerState: () => options.state ?? schedulerState(),
    checkDatabase: options.checkDatabase ?? (async () => {})
  });
  apps.push(app);
  return app;
}

test('reports health with the scheduler state', async () => {
  const app = await createApp();
  const response = await app.inject({ method: 'GET', url: '/health' });
  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), { status: 'ok', scheduler: schedulerState() });
});

test('reports degraded health until storage is ready', async () => {
  const app = await createApp({ state: schedulerState({ storageReady: false }) });
  const response = await app.inject({ method: 'GET', url: '/health' });
  assert.equal(response.json().status, 'degraded');
});

test('reports readiness from the database check', async () => {
  const ready = await createApp();
  const ok = await ready.inject({ method: 'GET', url: '/ready' });
  assert.equal(ok.statusCode, 200);
  assert.deepEqual(ok.json(), { status: 'ok' });

  const down = await createApp({
    checkDatabase: async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
    }
  });
  const unavailable = await down.inject({ method: 'GET', url: '/ready' });
  assert.equal(unavailable.statusCode, 503);
  assert.deepEqual(unavailable.json(), { status: 'unavailable', reason: 'connect ECONNREFUSED 127.0.0.1:5432' });
});

test('exposes pipeline and http metrics from the shared registry', async () => {
  const registry = new Registry();
  const metrics = createPipelineMetrics({ enabled: true, registry });
  metrics.recordClaimed('etl_processing');
  const app = await createApp({ metrics });

  await app.inject({ method: 'GET', url: '/health' });
  const response = await app.inject({ method: 'GET', url: '/metrics' });
  assert.equal(response.statusCode, 200);
  assert.match(response.body, /nightlight_jobs_claimed_total\{job_type="etl_processing"\} 1/);
  assert.match(
    response.body,
    /nightlight_http_requests_total\{method="GET",route="\/health",status="200",scheduler="idle"\} 1/
  );
});

test('labels http requests with the scheduler phase at response time', async () => {
  const registry = new Registry();
  let state = schedulerState({ cycleInFlight: true });
  const app = await buildApp({
    config: loadServiceConfig({ NIGHTLIGHT_LOG_LEVEL: 'silent' }),
    metrics: createPipelineMetrics({ enabled: true, registry }),
    getSchedulerState: () => state,
    checkDatabase: async () => {}
  });
  apps.push(app);

  await app.inject({ method: 'GET', url: '/ready' });
  state = schedulerState({ started: false });
  await app.inject({ method: 'GET', url: '/ready' });

  const body = await registry.metrics();
  assert.match(body, /nightlight_http_requests_total\{method="GET",route="\/ready",status="200",scheduler="cycling"\} 1/);
  assert.match(body, /nightlight_http_requests_total\{method="GET",route="\/ready",status="200",scheduler="stopped"\} 1/);
});

test('derives the scheduler phase from its state', () => {
  assert.equal(schedulerPhase(schedulerState({ started: false, cycleInFlight: true })), 'stopped');
  assert.equal(schedulerPhase(schedulerState({ cycleInFlight: true })), 'cycling');
  assert.equal(schedulerPhase(schedulerState()), 'idle');
});

test('answers 503 on metrics when they are disabled', async () => {
  const app = await createApp({ env: { NIGHTLIGHT_METRICS_ENABLED: 'false' } });
  const response = await app.inject({ method: 'GET', url: '/metrics' });
  assert.equal(response.statusCode, 503);
  assert.equal(response.body, 'metrics disabled');
});
