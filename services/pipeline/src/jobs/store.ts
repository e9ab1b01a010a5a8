import type { PoolClient } from 'pg';
import type { Database } from '../db/client';
import { countAreas, getAreaById, insertArea, listAreas } from '../db/areas';
import {
  claimProcessingJob,
  countProcessingJobsByStatus,
  failStaleRunningJobs,
  findActiveEtlJob,
  finishProcessingJob,
  getProcessingJob,
  insertProcessingJob,
  listPendingProcessingJobs,
  listProcessingJobs,
  type ProcessingJobFilter
} from '../db/processingJobs';
import {
  listTimeseries,
  summarizeTimeseries,
  upsertTimeseriesEntry,
  type TimeseriesRange,
  type TimeseriesSummary
} from '../db/timeseries';
import { errorMessage, ExternalServiceError, PipelineError } from '../errors';
import type {
  AreaRecord,
  JobOutcome,
  JobStatus,
  JsonObject,
  NewProcessingJob,
  PolygonGeometry,
  ProcessingJobRecord,
  TimeseriesEntry
} from './types';

export type { ProcessingJobFilter } from '../db/processingJobs';
export type { TimeseriesRange, TimeseriesSummary } from '../db/timeseries';

function pgErrorCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

/** Database failures surface as external-service errors; the SQLSTATE stays in `details.pgCode`. */
export function toDatabaseError(err: unknown): never {
  if (err instanceof PipelineError) {
    throw err;
  }
  const pgCode = pgErrorCode(err);
  throw new ExternalServiceError(`database error: ${errorMessage(err)}`, 'DATABASE', pgCode ? { pgCode } : undefined, {
    cause: err
  });
}

function guarded<T>(db: Database, fn: (client: PoolClient) => Promise<T>, transactional = false): Promise<T> {
  const pending = transactional ? db.withTransaction(fn) : db.withConnection(fn);
  return pending.catch(toDatabaseError);
}

/** Durable queue of processing jobs. `claim` is the only synchronization point between schedulers. */
export interface JobStore {
  listPending(limit: number): Promise<ProcessingJobRecord[]>;
  claim(jobId: string): Promise<boolean>;
  finish(jobId: string, outcome: JobOutcome): Promise<boolean>;
  insert(job: NewProcessingJob): Promise<ProcessingJobRecord>;
  get(jobId: string): Promise<ProcessingJobRecord | null>;
  list(filter?: ProcessingJobFilter): Promise<ProcessingJobRecord[]>;
  /** Non-failed `etl_processing` job for the month (`YYYY-MM-01`), if any. */
  findActiveEtlJob(areaId: number, month: string): Promise<ProcessingJobRecord | null>;
  failStaleRunning(olderThanMs: number, message: string): Promise<string[]>;
  countByStatus(): Promise<Record<JobStatus, number>>;
}

export interface AreaStore {
  create(input: { name: string; geometry: PolygonGeometry; metadata: JsonObject }): Promise<AreaRecord>;
  get(areaId: number): Promise<AreaRecord | null>;
  list(): Promise<AreaRecord[]>;
  count(): Promise<number>;
}

export interface TimeseriesStore {
  upsert(entry: TimeseriesEntry): Promise<void>;
  list(areaId: number, range?: TimeseriesRange): Promise<TimeseriesEntry[]>;
  summarize(): Promise<TimeseriesSummary>;
}

export class PostgresJobStore implements JobStore {
  constructor(private readonly db: Database) {}

  listPending(limit: number): Promise<ProcessingJobRecord[]> {
    return guarded(this.db, (client) => listPendingProcessingJobs(client, limit));
  }

  claim(jobId: string): Promise<boolean> {
    return guarded(this.db, (client) => claimProcessingJob(client, jobId));
  }

  finish(jobId: string, outcome: JobOutcome): Promise<boolean> {
    return guarded(this.db, (client) => finishProcessingJob(client, jobId, outcome));
  }

  insert(job: NewProcessingJob): Promise<ProcessingJobRecord> {
    return guarded(this.db, (client) => insertProcessingJob(client, job));
  }

  get(jobId: string): Promise<ProcessingJobRecord | null> {
    return guarded(this.db, (client) => getProcessingJob(client, jobId));
  }

  list(filter?: ProcessingJobFilter): Promise<ProcessingJobRecord[]> {
    return guarded(this.db, (client) => listProcessingJobs(client, filter));
  }

  findActiveEtlJob(areaId: number, month: string): Promise<ProcessingJobRecord | null> {
    return guarded(this.db, (client) => findActiveEtlJob(client, areaId, month));
  }

  failStaleRunning(olderThanMs: number, message: string): Promise<string[]> {
    return guarded(this.db, (client) => failStaleRunningJobs(client, olderThanMs, message));
  }

  countByStatus(): Promise<Record<JobStatus, number>> {
    return guarded(this.db, (client) => countProcessingJobsByStatus(client));
  }
}

export class PostgresAreaStore implements AreaStore {
  constructor(private readonly db: Database) {}

  create(input: { name: string; geometry: PolygonGeometry; metadata: JsonObject }): Promise<AreaRecord> {
    return guarded(this.db, (client) => insertArea(client, input), true);
  }

  get(areaId: number): Promise<AreaRecord | null> {
    return guarded(this.db, (client) => getAreaById(client, areaId));
  }

  list(): Promise<AreaRecord[]> {
    return guarded(this.db, (client) => listAreas(client));
  }

  count(): Promise<number> {
    return guarded(this.db, (client) => countAreas(client));
  }
}

export class PostgresTimeseriesStore implements TimeseriesStore {
  constructor(private readonly db: Database) {}

  upsert(entry: TimeseriesEntry): Promise<void> {
    return guarded(this.db, (client) => upsertTimeseriesEntry(client, entry));
  }

  list(areaId: number, range?: TimeseriesRange): Promise<TimeseriesEntry[]> {
    return guarded(this.db, (client) => listTimeseries(client, areaId, range));
  }

  summarize(): Promise<TimeseriesSummary> {
    return guarded(this.db, (client) => summarizeTimeseries(client));
  }
}
