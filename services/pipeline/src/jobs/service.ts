import { ValidationError } from '../errors';
import { parsePolygon } from '../raster/geometry';
import { monthsInRange, monthToDate, nextMonth, parseIsoDate, parseMonth } from '../utils/months';
import { ensureEtlJob } from './etlJobs';
import { buildEtlMetadata } from './metadata';
import type { AreaStore, JobStore, ProcessingJobFilter, TimeseriesRange, TimeseriesStore } from './store';
import {
  isJobType,
  type AreaRecord,
  type JobStatus,
  type JsonObject,
  type ProcessingJobRecord,
  type TimeseriesEntry
} from './types';

export type CreateAreaInput = {
  name: string;
  geometry: unknown;
  metadata?: JsonObject;
};

export type CreateExportJobInput = {
  areaId: number;
  startDate: string;
  endDate?: string | null;
  source?: string;
};

export type CreateEtlJobInput = {
  areaId: number;
  month: string;
  rasterKey: string;
};

export type TimeseriesPoint = TimeseriesEntry & {
  tileUrlTemplate: string;
};

export type PipelineStatistics = {
  areaCount: number;
  monthCount: number;
  recordCount: number;
  latestMonth: string | null;
  jobCounts: Record<JobStatus, number>;
};

export type PipelineServiceOptions = {
  areaStore: AreaStore;
  jobStore: JobStore;
  timeseriesStore: TimeseriesStore;
  rastersBucket: string;
  tilesPublicUrl: string;
};

const INPUT_METADATA_KEYS = ['source', 'raster_key', 'raster_path', 'month', 'parent_job_id'];

function normalizeMonthBound(value: string | undefined): string | undefined {
  return value === undefined ? undefined : monthToDate(parseMonth(value.slice(0, 7)));
}

/** Job-creation and read contracts consumed by the API layer and the operator CLI. */
export class PipelineService {
  private readonly areaStore: AreaStore;
  private readonly jobStore: JobStore;
  private readonly timeseriesStore: TimeseriesStore;
  private readonly rastersBucket: string;
  private readonly tilesPublicUrl: string;

  constructor(options: PipelineServiceOptions) {
    this.areaStore = options.areaStore;
    this.jobStore = options.jobStore;
    this.timeseriesStore = options.timeseriesStore;
    this.rastersBucket = options.rastersBucket;
    this.tilesPublicUrl = options.tilesPublicUrl.replace(/\/+$/, '');
  }

  async createArea(input: CreateAreaInput): Promise<AreaRecord> {
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError('area name is required', 'INVALID_METADATA');
    }
    const geometry = parsePolygon(input.geometry);
    return this.areaStore.create({ name, geometry, metadata: input.metadata ?? {} });
  }

  listAreas(): Promise<AreaRecord[]> {
    return this.areaStore.list();
  }

  getArea(areaId: number): Promise<AreaRecord> {
    return this.requireArea(areaId);
  }

  async createExportJob(input: CreateExportJobInput): Promise<ProcessingJobRecord> {
    const start = parseIsoDate(input.startDate);
    const endDate = input.endDate ?? monthToDate(nextMonth(start));
    monthsInRange(input.startDate, endDate);
    await this.requireArea(input.areaId);

    return this.jobStore.insert({
      areaId: input.areaId,
      jobType: 'earth_engine_export',
      startDate: input.startDate,
      endDate,
      metadata: input.source ? { source: input.source } : {}
    });
  }

  async createEtlJob(input: CreateEtlJobInput): Promise<{ job: ProcessingJobRecord; created: boolean }> {
    const rasterKey = input.rasterKey.trim();
    if (!rasterKey) {
      throw new ValidationError('raster key is required', 'INVALID_METADATA');
    }
    const month = monthToDate(parseMonth(input.month));
    await this.requireArea(input.areaId);

    return ensureEtlJob(this.jobStore, {
      areaId: input.areaId,
      month,
      metadata: buildEtlMetadata({ rasterKey, rasterBucket: this.rastersBucket, month })
    });
  }

  /** Queues a fresh pending copy of a failed job; the failed job itself is left as is. */
  async resubmitJob(jobId: string): Promise<ProcessingJobRecord> {
    const job = await this.jobStore.get(jobId);
    if (!job) {
      throw new ValidationError(`job ${jobId} not found`, 'JOB_NOT_FOUND', { jobId });
    }
    if (job.status !== 'failed') {
      throw new ValidationError(`job ${jobId} is ${job.status}; only failed jobs can be resubmitted`, 'JOB_NOT_FAILED', {
        jobId,
        status: job.status
      });
    }

    if (!isJobType(job.jobType)) {
      throw new ValidationError(`job ${jobId} has unknown type '${job.jobType}'`, 'UNKNOWN_JOB_TYPE');
    }

    const metadata: JsonObject = { resubmitted_from: job.id };
    for (const key of INPUT_METADATA_KEYS) {
      const value = job.metadata[key];
      if (value !== undefined) {
        metadata[key] = value;
      }
    }

    return this.jobStore.insert({
      areaId: job.areaId,
      jobType: job.jobType,
      startDate: job.startDate,
      endDate: job.endDate,
      metadata
    });
  }

  listJobs(filter: ProcessingJobFilter = {}): Promise<ProcessingJobRecord[]> {
    return this.jobStore.list(filter);
  }

  getJob(jobId: string): Promise<ProcessingJobRecord | null> {
    return this.jobStore.get(jobId);
  }

  async getTimeseries(areaId: number, range: TimeseriesRange = {}): Promise<TimeseriesPoint[]> {
    await this.requireArea(areaId);
    const entries = await this.timeseriesStore.list(areaId, {
      from: normalizeMonthBound(range.from),
      to: normalizeMonthBound(range.to)
    });
    return entries.map((entry) => ({
      ...entry,
      tileUrlTemplate: `${this.tilesPublicUrl}/${entry.tilePathPattern}`
    }));
  }

  async getStatistics(): Promise<PipelineStatistics> {
    const [areaCount, summary, jobCounts] = await Promise.all([
      this.areaStore.count(),
      this.timeseriesStore.summarize(),
      this.jobStore.countByStatus()
    ]);
    return { areaCount, ...summary, jobCounts };
  }

  private async requireArea(areaId: number): Promise<AreaRecord> {
    const area = await this.areaStore.get(areaId);
    if (!area) {
      throw new ValidationError(`area ${areaId} not found`, 'AREA_NOT_FOUND', { areaId });
    }
    return area;
  }
}
