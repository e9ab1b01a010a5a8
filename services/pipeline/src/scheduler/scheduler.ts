import type { SchedulerConfig } from '../config/serviceConfig';
import { describeError, ExternalServiceError, InternalSchedulerError } from '../errors';
import type { JobStore } from '../jobs/store';
import type { JobOutcome, ProcessingJobRecord } from '../jobs/types';
import { createSilentLogger, type Logger } from '../observability/logger';
import { createDisabledMetrics, type CycleResult, type PipelineMetrics } from '../observability/metrics';
import type { BlobStore } from '../storage/blobStore';
import type { JobDispatcher } from './dispatch';
import { runWithConcurrency } from './pool';
import { withTimeout } from './timeout';

export type CycleSummary = {
  result: CycleResult;
  claimed: number;
  completed: number;
  failed: number;
  /** Pending jobs another actor claimed first. */
  skipped: number;
  aborted: boolean;
};

export type SchedulerState = {
  started: boolean;
  cycleInFlight: boolean;
  storageReady: boolean;
  lastCycle: (CycleSummary & { finishedAt: string }) | null;
};

export type JobSchedulerOptions = {
  jobStore: JobStore;
  blobStore: Pick<BlobStore, 'ensureReady' | 'isReady'>;
  dispatcher: JobDispatcher;
  config: SchedulerConfig;
  metrics?: PipelineMetrics;
  logger?: Logger;
  now?: () => number;
};

type CycleCounters = Omit<CycleSummary, 'result' | 'aborted'>;

export const ABANDONED_JOB_MESSAGE = describeError(
  new InternalSchedulerError('job abandoned while running', 'ABANDONED')
);

function emptyCounters(): CycleCounters {
  return { claimed: 0, completed: 0, failed: 0, skipped: 0 };
}

/**
 * Timer-driven poll loop over the job store. One cycle runs at a time; a tick that
 * fires while a cycle is in flight is skipped.
 */
export class JobScheduler {
  private readonly jobStore: JobStore;
  private readonly blobStore: Pick<BlobStore, 'ensureReady' | 'isReady'>;
  private readonly dispatcher: JobDispatcher;
  private readonly config: SchedulerConfig;
  private readonly metrics: PipelineMetrics;
  private readonly logger: Logger;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private activeCycle: Promise<CycleSummary> | null = null;
  private lastCycle: SchedulerState['lastCycle'] = null;

  constructor(options: JobSchedulerOptions) {
    this.jobStore = options.jobStore;
    this.blobStore = options.blobStore;
    this.dispatcher = options.dispatcher;
    this.config = options.config;
    this.metrics = options.metrics ?? createDisabledMetrics();
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.logger.info(
      { pollIntervalMs: this.config.pollIntervalMs, concurrency: this.config.concurrency },
      'scheduler started'
    );
    this.timer = setInterval(() => this.trigger(), this.config.pollIntervalMs);
    this.timer.unref();
    this.trigger();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.activeCycle) {
      await this.activeCycle;
    }
    this.logger.info('scheduler stopped');
  }

  getState(): SchedulerState {
    return {
      started: this.timer !== null,
      cycleInFlight: this.activeCycle !== null,
      storageReady: this.blobStore.isReady(),
      lastCycle: this.lastCycle
    };
  }

  runCycle(): Promise<CycleSummary> {
    if (this.activeCycle) {
      this.metrics.recordCycle('skipped');
      this.logger.debug('previous poll cycle still running, skipping');
      const skipped: CycleSummary = { result: 'skipped', aborted: false, ...emptyCounters() };
      return Promise.resolve(skipped);
    }
    const cycle = this.executeCycle().finally(() => {
      this.activeCycle = null;
    });
    this.activeCycle = cycle;
    return cycle;
  }

  private trigger(): void {
    this.runCycle().catch((err: unknown) => {
      this.logger.error({ err }, 'poll cycle crashed');
    });
  }

  private async executeCycle(): Promise<CycleSummary> {
    const counters = emptyCounters();
    let summary: CycleSummary;

    try {
      await this.sweepStaleJobs();
      const pending = await this.jobStore.listPending(this.config.batchSize);
      if (pending.length > 0) {
        await this.prepareStorage();
        await runWithConcurrency(pending, this.config.concurrency, (job) => this.processJob(job, counters));
      }
      summary = { result: 'completed', aborted: false, ...counters };
    } catch (err) {
      this.logger.error({ err, ...counters }, 'poll cycle aborted');
      summary = { result: 'aborted', aborted: true, ...counters };
    }

    this.metrics.recordCycle(summary.result);
    this.lastCycle = { ...summary, finishedAt: new Date(this.now()).toISOString() };
    if (summary.claimed > 0 || summary.aborted) {
      this.logger.info(summary, 'poll cycle finished');
    }
    return summary;
  }

  private async sweepStaleJobs(): Promise<void> {
    if (this.config.staleRunningAfterMs <= 0) {
      return;
    }
    const abandoned = await this.jobStore.failStaleRunning(this.config.staleRunningAfterMs, ABANDONED_JOB_MESSAGE);
    if (abandoned.length > 0) {
      this.logger.warn({ jobIds: abandoned }, 'marked stale running jobs as failed');
    }
  }

  /** Storage is initialized only once there is work; until it succeeds nothing is claimed. */
  private async prepareStorage(): Promise<void> {
    if (this.blobStore.isReady()) {
      return;
    }
    try {
      await this.blobStore.ensureReady();
    } catch (err) {
      this.logger.warn({ err }, 'object storage unavailable, leaving jobs pending until the next cycle');
      throw err;
    }
  }

  private async processJob(job: ProcessingJobRecord, counters: CycleCounters): Promise<void> {
    const context = { jobId: job.id, jobType: job.jobType, areaId: job.areaId };
    const claimed = await this.jobStore.claim(job.id);
    if (!claimed) {
      counters.skipped += 1;
      this.logger.debug(context, 'job already claimed elsewhere');
      return;
    }
    counters.claimed += 1;
    this.metrics.recordClaimed(job.jobType);
    this.logger.info(context, 'job claimed');

    const startedAt = this.now();
    const outcome = await this.execute(job);
    const durationSeconds = (this.now() - startedAt) / 1000;

    const finished = await this.jobStore.finish(job.id, outcome);
    if (!finished) {
      this.logger.warn({ ...context, status: outcome.status }, 'job left running state before it could be finalized');
    }

    this.metrics.recordJobResult(outcome.status, job.jobType);
    this.metrics.observeDuration(outcome.status, job.jobType, durationSeconds);
    if (outcome.status === 'completed') {
      counters.completed += 1;
      this.logger.info({ ...context, durationSeconds }, 'job completed');
    } else {
      counters.failed += 1;
      this.logger.warn({ ...context, durationSeconds, error: outcome.errorMessage }, 'job failed');
    }
  }

  /** Every per-job error becomes a failed outcome here. */
  private async execute(job: ProcessingJobRecord): Promise<JobOutcome> {
    try {
      const result = await withTimeout(
        (signal) => this.dispatcher.dispatch(job, signal),
        this.config.jobTimeoutMs,
        () => new ExternalServiceError(`job exceeded the ${this.config.jobTimeoutMs}ms timeout`, 'TIMEOUT')
      );
      if (result.failure) {
        return { status: 'failed', errorMessage: describeError(result.failure), metadata: result.metadata };
      }
      return { status: 'completed', metadata: result.metadata };
    } catch (err) {
      return { status: 'failed', errorMessage: describeError(err) };
    }
  }
}
