import { describeError, ExternalServiceError, PipelineError } from '../errors';
import { ensureEtlJob } from '../jobs/etlJobs';
import { buildEtlMetadata } from '../jobs/metadata';
import type { JobStore } from '../jobs/store';
import type { JsonObject, PolygonGeometry } from '../jobs/types';
import { createSilentLogger, type Logger } from '../observability/logger';
import { createDisabledMetrics, type PipelineMetrics } from '../observability/metrics';
import type { BlobStore } from '../storage/blobStore';
import { monthsInRange, monthToDate, monthToSegment, type CalendarMonth } from '../utils/months';
import type { ImageryProvider } from './provider';

export type ExportRequest = {
  jobId: string;
  areaId: number;
  geometry: PolygonGeometry;
  startDate: string;
  endDate: string | null;
};

export type ExportedMonth = {
  month: string;
  rasterKey: string;
  etlJobId: string;
  created: boolean;
};

export type FailedMonth = {
  month: string;
  error: string;
};

export type ExportResult = {
  months: ExportedMonth[];
  failedMonths: FailedMonth[];
  metadata: JsonObject;
  failure: PipelineError | null;
};

export type ImageryExportClientOptions = {
  provider: ImageryProvider;
  blobStore: BlobStore;
  jobStore: JobStore;
  metrics?: PipelineMetrics;
  logger?: Logger;
};

/** `{area_id}/rasters/{source}/{year}_{MM}.tif` in the rasters bucket. */
export function rasterKeyFor(areaId: number, source: string, month: CalendarMonth): string {
  return `${areaId}/rasters/${source}/${monthToSegment(month)}.tif`;
}

function resultMetadata(months: ExportedMonth[], failedMonths: FailedMonth[]): JsonObject {
  return {
    months: months.map((entry) => ({ ...entry })),
    failedMonths: failedMonths.map((entry) => ({ ...entry }))
  };
}

/**
 * Exports one composite raster per covered month and queues an `etl_processing`
 * job for each. A failed month is recorded and the remaining months still run.
 */
export class ImageryExportClient {
  private readonly provider: ImageryProvider;
  private readonly blobStore: BlobStore;
  private readonly jobStore: JobStore;
  private readonly metrics: PipelineMetrics;
  private readonly logger: Logger;

  constructor(options: ImageryExportClientOptions) {
    this.provider = options.provider;
    this.blobStore = options.blobStore;
    this.jobStore = options.jobStore;
    this.metrics = options.metrics ?? createDisabledMetrics();
    this.logger = options.logger ?? createSilentLogger();
  }

  async run(request: ExportRequest, signal?: AbortSignal): Promise<ExportResult> {
    const months = monthsInRange(request.startDate, request.endDate);
    await this.blobStore.ensureReady();

    const exported: ExportedMonth[] = [];
    const failed: FailedMonth[] = [];

    for (const month of months) {
      signal?.throwIfAborted();
      const monthDate = monthToDate(month);
      try {
        exported.push(await this.exportMonth(request, month, signal));
      } catch (err) {
        signal?.throwIfAborted();
        this.metrics.recordExportMonthFailure();
        this.logger.warn({ err, jobId: request.jobId, areaId: request.areaId, month: monthDate }, 'month export failed');
        failed.push({ month: monthDate, error: describeError(err) });
      }
    }

    const failure =
      failed.length > 0
        ? new ExternalServiceError(
            `export failed for ${failed.length} of ${months.length} months: ${failed
              .map((entry) => `${entry.month.slice(0, 7)} (${entry.error})`)
              .join('; ')}`,
            'EXPORT_INCOMPLETE',
            { failedMonths: failed.map((entry) => entry.month) }
          )
        : null;

    return { months: exported, failedMonths: failed, metadata: resultMetadata(exported, failed), failure };
  }

  private async exportMonth(request: ExportRequest, month: CalendarMonth, signal?: AbortSignal): Promise<ExportedMonth> {
    const monthDate = monthToDate(month);
    const rasterKey = rasterKeyFor(request.areaId, this.provider.source, month);

    const raster = await this.provider.fetchMonthlyComposite({
      geometry: request.geometry,
      year: month.year,
      month: month.month,
      signal
    });
    signal?.throwIfAborted();
    await this.blobStore.put(this.blobStore.buckets.rasters, rasterKey, raster, { contentType: 'image/tiff' });

    signal?.throwIfAborted();
    const { job, created } = await ensureEtlJob(this.jobStore, {
      areaId: request.areaId,
      month: monthDate,
      metadata: buildEtlMetadata({
        rasterKey,
        rasterBucket: this.blobStore.buckets.rasters,
        month: monthDate,
        parentJobId: request.jobId
      })
    });
    this.logger.info(
      { jobId: request.jobId, areaId: request.areaId, month: monthDate, etlJobId: job.id, created },
      created ? 'queued etl job' : 'etl job already exists'
    );
    return { month: monthDate, rasterKey, etlJobId: job.id, created };
  }
}
