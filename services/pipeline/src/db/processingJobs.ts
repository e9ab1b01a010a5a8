import type { PoolClient } from 'pg';
import {
  isJobStatus,
  type JobOutcome,
  type JobStatus,
  type JobType,
  type NewProcessingJob,
  type ProcessingJobRecord
} from '../jobs/types';
import { toJsonObject } from '../utils/json';

type ProcessingJobRow = {
  job_id: string;
  area_id: number;
  job_type: string;
  status: string;
  start_date: string | null;
  end_date: string | null;
  created_at: Date;
  updated_at: Date;
  error_message: string | null;
  meta_data: unknown;
};

export type ProcessingJobFilter = {
  areaId?: number;
  status?: JobStatus;
  jobType?: JobType;
  limit?: number;
};

export function mapRow(row: ProcessingJobRow): ProcessingJobRecord {
  if (!isJobStatus(row.status)) {
    throw new Error(`processing job ${row.job_id} has unknown status '${row.status}'`);
  }
  return {
    id: row.job_id,
    areaId: row.area_id,
    jobType: row.job_type,
    status: row.status,
    startDate: row.start_date ?? null,
    endDate: row.end_date ?? null,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    errorMessage: row.error_message ?? null,
    metadata: toJsonObject(row.meta_data)
  } satisfies ProcessingJobRecord;
}

export async function insertProcessingJob(client: PoolClient, input: NewProcessingJob): Promise<ProcessingJobRecord> {
  const { rows } = await client.query<ProcessingJobRow>(
    `INSERT INTO processing_jobs (area_id, job_type, status, start_date, end_date, meta_data)
     VALUES ($1, $2, 'pending', $3, $4, $5::jsonb)
     RETURNING *`,
    [input.areaId, input.jobType, input.startDate ?? null, input.endDate ?? null, JSON.stringify(input.metadata ?? {})]
  );
  return mapRow(rows[0]);
}

export async function getProcessingJob(client: PoolClient, jobId: string): Promise<ProcessingJobRecord | null> {
  const { rows } = await client.query<ProcessingJobRow>(`SELECT * FROM processing_jobs WHERE job_id = $1`, [jobId]);
  return rows.length > 0 ? mapRow(rows[0]) : null;
}

export async function listPendingProcessingJobs(client: PoolClient, limit: number): Promise<ProcessingJobRecord[]> {
  const { rows } = await client.query<ProcessingJobRow>(
    `SELECT *
       FROM processing_jobs
      WHERE status = 'pending'
      ORDER BY created_at ASC, job_id ASC
      LIMIT $1`,
    [limit]
  );
  return rows.map(mapRow);
}

/** Atomic compare-and-set `pending -> running`; false when another actor got there first. */
export async function claimProcessingJob(client: PoolClient, jobId: string): Promise<boolean> {
  const result = await client.query(
    `UPDATE processing_jobs
        SET status = 'running'
      WHERE job_id = $1
        AND status = 'pending'`,
    [jobId]
  );
  return (result.rowCount ?? 0) === 1;
}

/** Moves a `running` job to its terminal state, merging output references into the metadata. */
export async function finishProcessingJob(client: PoolClient, jobId: string, outcome: JobOutcome): Promise<boolean> {
  const errorMessage = outcome.status === 'failed' ? outcome.errorMessage : null;
  const metadata = outcome.metadata ?? {};
  const result = await client.query(
    `UPDATE processing_jobs
        SET status = $2,
            error_message = $3,
            meta_data = COALESCE(meta_data, '{}'::jsonb) || $4::jsonb
      WHERE job_id = $1
        AND status = 'running'`,
    [jobId, outcome.status, errorMessage, JSON.stringify(metadata)]
  );
  return (result.rowCount ?? 0) === 1;
}

export async function findActiveEtlJob(
  client: PoolClient,
  areaId: number,
  month: string
): Promise<ProcessingJobRecord | null> {
  const { rows } = await client.query<ProcessingJobRow>(
    `SELECT *
       FROM processing_jobs
      WHERE job_type = 'etl_processing'
        AND area_id = $1
        AND start_date = $2
        AND status <> 'failed'
      ORDER BY created_at ASC
      LIMIT 1`,
    [areaId, month]
  );
  return rows.length > 0 ? mapRow(rows[0]) : null;
}

export async function failStaleRunningJobs(
  client: PoolClient,
  olderThanMs: number,
  errorMessage: string
): Promise<string[]> {
  const { rows } = await client.query<{ job_id: string }>(
    `UPDATE processing_jobs
        SET status = 'failed',
            error_message = $2
      WHERE status = 'running'
        AND updated_at < NOW() - ($1::double precision * INTERVAL '1 millisecond')
      RETURNING job_id`,
    [olderThanMs, errorMessage]
  );
  return rows.map((row) => row.job_id);
}

export async function listProcessingJobs(
  client: PoolClient,
  filter: ProcessingJobFilter = {}
): Promise<ProcessingJobRecord[]> {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filter.areaId !== undefined) {
    params.push(filter.areaId);
    conditions.push(`area_id = $${params.length}`);
  }
  if (filter.status) {
    params.push(filter.status);
    conditions.push(`status = $${params.length}`);
  }
  if (filter.jobType) {
    params.push(filter.jobType);
    conditions.push(`job_type = $${params.length}`);
  }

  params.push(Math.max(1, Math.min(filter.limit ?? 100, 1_000)));
  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const { rows } = await client.query<ProcessingJobRow>(
    `SELECT *
       FROM processing_jobs
       ${where}
      ORDER BY created_at DESC, job_id DESC
      LIMIT $${params.length}`,
    params
  );
  return rows.map(mapRow);
}

export async function countProcessingJobsByStatus(client: PoolClient): Promise<Record<JobStatus, number>> {
  const { rows } = await client.query<{ status: string; count: number }>(
    `SELECT status, COUNT(*)::int AS count FROM processing_jobs GROUP BY status`
  );
  const counts: Record<JobStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0 };
  for (const row of rows) {
    if (isJobStatus(row.status)) {
      counts[row.status] = row.count;
    }
  }
  return counts;
}
