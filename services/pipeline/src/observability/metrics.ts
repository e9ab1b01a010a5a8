import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';
export type JobOutcome = 'completed' | 'failed';
export type CycleResult = 'completed' | 'skipped' | 'aborted';
/** What the scheduler was doing when a system-server request finished. */
export type SchedulerPhase = 'stopped' | 'idle' | 'cycling';

export type HttpRequestSample = {
  method: string;
  route: string;
  status: number;
  scheduler: SchedulerPhase;
  seconds: number;
};

export interface PipelineMetrics {
  readonly enabled: boolean;
  recordCycle(result: CycleResult): void;
  recordClaimed(jobType: string): void;
  recordJobResult(outcome: JobOutcome, jobType: string): void;
  observeDuration(outcome: JobOutcome, jobType: string, seconds: number): void;
  recordExportMonthFailure(): void;
  observeHttpRequest(sample: HttpRequestSample): void;
  /** Prometheus exposition text, or null when metrics are disabled. */
  render(): Promise<string | null>;
}

export interface PipelineMetricsOptions {
  enabled: boolean;
  registry?: Registry | null;
  prefix?: string;
  /** Adds the process metrics prom-client collects by default. */
  collectDefaults?: boolean;
}

const DEFAULT_PREFIX = 'nightlight_';
const DURATION_BUCKETS = [0.5, 1, 5, 15, 30, 60, 120, 300, 600, 1200, 1800];
const HTTP_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5];

export function createPipelineMetrics(options: PipelineMetricsOptions): PipelineMetrics {
  const prefix = options.prefix ?? DEFAULT_PREFIX;
  const registry = options.enabled ? options.registry ?? new Registry() : null;
  const registers = registry ? [registry] : [];

  if (registry && options.collectDefaults) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const cycles = options.enabled
    ? new Counter({
        name: `${prefix}poll_cycles_total`,
        help: 'Scheduler poll cycles grouped by result',
        labelNames: ['result'],
        registers
      })
    : null;

  const claimed = options.enabled
    ? new Counter({
        name: `${prefix}jobs_claimed_total`,
        help: 'Jobs claimed by this scheduler grouped by job type',
        labelNames: ['job_type'],
        registers
      })
    : null;

  const jobResults = options.enabled
    ? new Counter({
        name: `${prefix}jobs_finished_total`,
        help: 'Processing job outcomes grouped by result and job type',
        labelNames: ['outcome', 'job_type'],
        registers
      })
    : null;

  const jobDuration = options.enabled
    ? new Histogram({
        name: `${prefix}job_duration_seconds`,
        help: 'Processing job duration in seconds grouped by outcome and job type',
        labelNames: ['outcome', 'job_type'],
        buckets: DURATION_BUCKETS,
        registers
      })
    : null;

  const monthFailures = options.enabled
    ? new Counter({
        name: `${prefix}export_month_failures_total`,
        help: 'Months that failed to export from the imagery provider',
        registers
      })
    : null;

  const httpRequests = options.enabled
    ? new Counter({
        name: `${prefix}http_requests_total`,
        help: 'System server requests grouped by route, status and scheduler phase',
        labelNames: ['method', 'route', 'status', 'scheduler'],
        registers
      })
    : null;

  const httpDuration = options.enabled
    ? new Histogram({
        name: `${prefix}http_request_duration_seconds`,
        help: 'System server request duration in seconds',
        labelNames: ['method', 'route', 'status', 'scheduler'],
        buckets: HTTP_BUCKETS,
        registers
      })
    : null;

  return {
    enabled: options.enabled,
    recordCycle(result) {
      cycles?.labels(result).inc();
    },
    recordClaimed(jobType) {
      claimed?.labels(jobType).inc();
    },
    recordJobResult(outcome, jobType) {
      jobResults?.labels(outcome, jobType).inc();
    },
    observeDuration(outcome, jobType, seconds) {
      jobDuration?.labels(outcome, jobType).observe(seconds);
    },
    recordExportMonthFailure() {
      monthFailures?.inc();
    },
    observeHttpRequest(sample) {
      const labels = [sample.method, sample.route, String(sample.status), sample.scheduler];
      httpRequests?.labels(...labels).inc();
      httpDuration?.labels(...labels).observe(sample.seconds);
    },
    async render() {
      return registry ? registry.metrics() : null;
    }
  };
}

export function createDisabledMetrics(): PipelineMetrics {
  return createPipelineMetrics({ enabled: false });
}
