import { assertUnreachable, ValidationError, type PipelineError } from '../errors';
import type { ImageryExportClient } from '../imagery/exportClient';
import { parseJobPayload } from '../jobs/metadata';
import type { AreaStore } from '../jobs/store';
import type { AreaRecord, JsonObject, ProcessingJobRecord } from '../jobs/types';
import type { RasterProcessor } from '../raster/processor';

export type DispatchResult = {
  /** Output references merged into the job's metadata. */
  metadata: JsonObject;
  /** Set when the delegate finished but reports the job as failed. */
  failure: PipelineError | null;
};

export interface JobDispatcher {
  dispatch(job: ProcessingJobRecord, signal: AbortSignal): Promise<DispatchResult>;
}

export type PipelineDispatcherOptions = {
  areaStore: Pick<AreaStore, 'get'>;
  exportClient: Pick<ImageryExportClient, 'run'>;
  rasterProcessor: Pick<RasterProcessor, 'process'>;
};

/** Routes a claimed job to the export client or the raster processor by job type. */
export class PipelineDispatcher implements JobDispatcher {
  private readonly areaStore: Pick<AreaStore, 'get'>;
  private readonly exportClient: Pick<ImageryExportClient, 'run'>;
  private readonly rasterProcessor: Pick<RasterProcessor, 'process'>;

  constructor(options: PipelineDispatcherOptions) {
    this.areaStore = options.areaStore;
    this.exportClient = options.exportClient;
    this.rasterProcessor = options.rasterProcessor;
  }

  async dispatch(job: ProcessingJobRecord, signal: AbortSignal): Promise<DispatchResult> {
    const payload = parseJobPayload(job);
    const area = await this.loadArea(job.areaId);

    switch (payload.jobType) {
      case 'earth_engine_export': {
        const result = await this.exportClient.run(
          {
            jobId: job.id,
            areaId: area.id,
            geometry: area.geometry,
            startDate: payload.startDate,
            endDate: payload.endDate
          },
          signal
        );
        return { metadata: result.metadata, failure: result.failure };
      }
      case 'etl_processing': {
        const result = await this.rasterProcessor.process(
          {
            jobId: job.id,
            areaId: area.id,
            geometry: area.geometry,
            month: payload.month,
            rasterKey: payload.rasterKey
          },
          signal
        );
        return { metadata: result.metadata, failure: null };
      }
      default:
        return assertUnreachable(payload);
    }
  }

  private async loadArea(areaId: number): Promise<AreaRecord> {
    const area = await this.areaStore.get(areaId);
    if (!area) {
      throw new ValidationError(`area ${areaId} not found`, 'AREA_NOT_FOUND', { areaId });
    }
    return area;
  }
}
