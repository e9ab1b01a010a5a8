import { PipelineError } from '../errors';
import type { JobStore } from './store';
import type { JsonObject, ProcessingJobRecord } from './types';

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(err: unknown): boolean {
  return err instanceof PipelineError && err.details?.pgCode === UNIQUE_VIOLATION;
}

export type EnsureEtlJobInput = {
  areaId: number;
  /** First day of the month, `YYYY-MM-DD`. */
  month: string;
  metadata: JsonObject;
};

/**
 * Returns the live `etl_processing` job for (area, month), creating it when
 * there is none. A concurrent insert that wins the unique index is looked up
 * and returned instead of surfacing the violation.
 */
export async function ensureEtlJob(
  jobStore: JobStore,
  input: EnsureEtlJobInput
): Promise<{ job: ProcessingJobRecord; created: boolean }> {
  const existing = await jobStore.findActiveEtlJob(input.areaId, input.month);
  if (existing) {
    return { job: existing, created: false };
  }

  try {
    const job = await jobStore.insert({
      areaId: input.areaId,
      jobType: 'etl_processing',
      startDate: input.month,
      metadata: input.metadata
    });
    return { job, created: true };
  } catch (err) {
    if (!isUniqueViolation(err)) {
      throw err;
    }
    const raced = await jobStore.findActiveEtlJob(input.areaId, input.month);
    if (!raced) {
      throw err;
    }
    return { job: raced, created: false };
  }
}
