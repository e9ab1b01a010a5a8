import { z } from 'zod';
import { ValidationError } from '../errors';
import { isIsoDate, parseMonth, type CalendarMonth } from '../utils/months';
import { isJobType, type JsonObject, type ProcessingJobRecord } from './types';

const isoDate = z.string().refine(isIsoDate, { message: 'expected a YYYY-MM-DD date' });

const monthValue = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])(-01)?$/, 'expected YYYY-MM or YYYY-MM-01');

export const exportMetadataSchema = z
  .object({
    source: z.string().min(1).optional()
  })
  .passthrough();

export const etlMetadataSchema = z
  .object({
    raster_key: z.string().min(1, 'raster_key is required'),
    month: monthValue.optional(),
    parent_job_id: z.string().min(1).optional()
  })
  .passthrough();

const exportJobSchema = z.object({
  jobType: z.literal('earth_engine_export'),
  startDate: isoDate,
  endDate: isoDate.nullable(),
  metadata: exportMetadataSchema
});

const etlJobSchema = z.object({
  jobType: z.literal('etl_processing'),
  startDate: isoDate.nullable(),
  endDate: isoDate.nullable(),
  metadata: etlMetadataSchema
});

const jobPayloadSchema = z
  .discriminatedUnion('jobType', [exportJobSchema, etlJobSchema])
  .superRefine((value, ctx) => {
    if (value.jobType === 'etl_processing' && !value.metadata.month && !value.startDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['metadata', 'month'],
        message: 'month is required when the job has no start_date'
      });
    }
  });

export type ExportJobPayload = {
  jobType: 'earth_engine_export';
  startDate: string;
  endDate: string | null;
  source: string | null;
};

export type EtlJobPayload = {
  jobType: 'etl_processing';
  month: CalendarMonth;
  rasterKey: string;
  parentJobId: string | null;
};

export type JobPayload = ExportJobPayload | EtlJobPayload;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Narrows a stored job to the payload its job type requires.
 * Raises {@link ValidationError} before any side effect when the row does not fit.
 */
export function parseJobPayload(job: ProcessingJobRecord): JobPayload {
  if (!isJobType(job.jobType)) {
    throw new ValidationError(`unknown job type '${job.jobType}'`, 'UNKNOWN_JOB_TYPE', { jobType: job.jobType });
  }

  const candidate = {
    jobType: job.jobType,
    startDate: job.startDate,
    endDate: job.endDate,
    metadata: job.metadata
  };
  const parsed = jobPayloadSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ValidationError(`invalid ${job.jobType} job: ${formatIssues(parsed.error)}`, 'INVALID_METADATA');
  }

  const value = parsed.data;
  if (value.jobType === 'earth_engine_export') {
    return {
      jobType: 'earth_engine_export',
      startDate: value.startDate,
      endDate: value.endDate,
      source: value.metadata.source ?? null
    };
  }

  const monthSource = value.metadata.month ?? value.startDate ?? '';
  return {
    jobType: 'etl_processing',
    month: parseMonth(monthSource.slice(0, 7)),
    rasterKey: value.metadata.raster_key,
    parentJobId: value.metadata.parent_job_id ?? null
  };
}

export function buildEtlMetadata(input: {
  rasterKey: string;
  rasterBucket: string;
  month: string;
  parentJobId?: string | null;
}): JsonObject {
  const metadata: JsonObject = {
    raster_key: input.rasterKey,
    raster_path: `${input.rasterBucket}/${input.rasterKey}`,
    month: input.month
  };
  if (input.parentJobId) {
    metadata.parent_job_id = input.parentJobId;
  }
  return metadata;
}
