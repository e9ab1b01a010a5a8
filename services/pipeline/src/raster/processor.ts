import { mkdir, mkdtemp, readFile, rm } from 'node:fs/promises';
import path from 'node:path';
import type { RasterConfig } from '../config/serviceConfig';
import type { TimeseriesStore } from '../jobs/store';
import type { JsonObject, PolygonGeometry, TimeseriesEntry } from '../jobs/types';
import { createSilentLogger, type Logger } from '../observability/logger';
import type { BlobStore } from '../storage/blobStore';
import { monthToDate, monthToSegment, type CalendarMonth } from '../utils/months';
import { decodeGeoTiff } from './decode';
import { outerRing } from './geometry';
import { cropToMask, encodeMaskedRaster } from './maskedRaster';
import { renderTilePyramid } from './tiles';
import { computeZonalStatistics } from './zonalStats';

export type RasterProcessingRequest = {
  jobId: string;
  areaId: number;
  geometry: PolygonGeometry;
  month: CalendarMonth;
  rasterKey: string;
};

export type RasterProcessingResult = {
  entry: TimeseriesEntry;
  tileCount: number;
  metadata: JsonObject;
};

export type RasterProcessorOptions = {
  blobStore: BlobStore;
  timeseriesStore: TimeseriesStore;
  config: RasterConfig;
  logger?: Logger;
  now?: () => Date;
};

export function tilePrefix(areaId: number, month: CalendarMonth): string {
  return `${areaId}/${monthToSegment(month)}`;
}

/** Polygon-masked copy of the month's raster, kept in the rasters bucket. */
export function maskedRasterKey(areaId: number, month: CalendarMonth): string {
  return `${tilePrefix(areaId, month)}/masked.tif`;
}

export function tilePathPattern(tilesBucket: string, areaId: number, month: CalendarMonth): string {
  return `${tilesBucket}/${tilePrefix(areaId, month)}/{z}/{x}/{y}.png`;
}

/**
 * Turns a stored raster into an `area_timeseries` row, a tile pyramid and a
 * masked copy of the raster. The row is written only after every upload succeeded.
 */
export class RasterProcessor {
  private readonly blobStore: BlobStore;
  private readonly timeseriesStore: TimeseriesStore;
  private readonly config: RasterConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: RasterProcessorOptions) {
    this.blobStore = options.blobStore;
    this.timeseriesStore = options.timeseriesStore;
    this.config = options.config;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  async process(request: RasterProcessingRequest, signal?: AbortSignal): Promise<RasterProcessingResult> {
    await this.blobStore.ensureReady();
    const { rasters: rastersBucket, tiles: tilesBucket } = this.blobStore.buckets;

    await mkdir(this.config.tmpDir, { recursive: true });
    const workDir = await mkdtemp(
      path.join(this.config.tmpDir, `nightlight-${request.areaId}-${monthToSegment(request.month)}-`)
    );

    try {
      const bytes = await this.blobStore.get(rastersBucket, request.rasterKey);
      const raster = await decodeGeoTiff(bytes);
      const { statistics, mask } = computeZonalStatistics(raster, outerRing(request.geometry), this.config.litThreshold);

      const tiles = await renderTilePyramid({
        raster,
        mask,
        range: { min: statistics.min, max: statistics.max },
        minZoom: this.config.minZoom,
        maxZoom: this.config.maxZoom,
        outputDir: path.join(workDir, 'tiles')
      });

      const prefix = tilePrefix(request.areaId, request.month);
      for (const tile of tiles) {
        signal?.throwIfAborted();
        const body = await readFile(tile.file);
        await this.blobStore.put(tilesBucket, `${prefix}/${tile.z}/${tile.x}/${tile.y}.png`, body, {
          contentType: 'image/png'
        });
      }

      signal?.throwIfAborted();
      const maskedKey = maskedRasterKey(request.areaId, request.month);
      await this.blobStore.put(rastersBucket, maskedKey, encodeMaskedRaster(cropToMask(raster, mask), raster), {
        contentType: 'image/tiff'
      });

      const entry: TimeseriesEntry = {
        areaId: request.areaId,
        month: monthToDate(request.month),
        meanBrightness: statistics.mean,
        medianBrightness: statistics.median,
        sumBrightness: statistics.sum,
        litPixelCount: statistics.litPixelCount,
        litPercentage: statistics.litPercentage,
        tilePathPattern: tilePathPattern(tilesBucket, request.areaId, request.month),
        rasterPath: `${rastersBucket}/${maskedKey}`,
        minZoom: this.config.minZoom,
        maxZoom: this.config.maxZoom,
        boundingBox: raster.bounds,
        metadata: {
          processedAt: this.now().toISOString(),
          threshold: this.config.litThreshold,
          totalPixelCount: statistics.validPixelCount,
          tileCount: tiles.length,
          sourceRasterPath: `${rastersBucket}/${request.rasterKey}`,
          jobId: request.jobId
        }
      };
      signal?.throwIfAborted();
      await this.timeseriesStore.upsert(entry);

      this.logger.info(
        { jobId: request.jobId, areaId: request.areaId, month: entry.month, tileCount: tiles.length },
        'raster processed'
      );

      return {
        entry,
        tileCount: tiles.length,
        metadata: {
          month: entry.month,
          tileCount: tiles.length,
          tilePathPattern: entry.tilePathPattern,
          meanBrightness: entry.meanBrightness,
          litPercentage: entry.litPercentage
        }
      };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
