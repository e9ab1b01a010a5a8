import assert from 'node:assert/strict';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, test } from 'node:test';

import { BlobNotFoundError, DataQualityError, StorageError } from '../src/errors';
import type { PolygonGeometry } from '../src/jobs/types';
import { decodeGeoTiff } from '../src/raster/decode';
import { maskedRasterKey, RasterProcessor, tilePathPattern } from '../src/raster/processor';
import { S3BlobStore } from '../src/storage/blobStore';
import { SQUARE, tiffBytes } from './helpers/fixtures';
import { InMemoryS3Client } from './helpers/inMemoryS3';
import { MemoryTimeseriesStore } from './helpers/memoryStores';

const RASTER_KEY = '1/rasters/viirs/2023_01.tif';
const VALUES = Array.from({ length: 16 }, (_, index) => index + 1);

let tmpDir: string;
let client: InMemoryS3Client;
let timeseries: MemoryTimeseriesStore;
let processor: RasterProcessor;

beforeEach(async () => {
  tmpDir = await mkdtemp(path.join(tmpdir(), 'nightlight-processor-'));
  client = new InMemoryS3Client(['rasters', 'tiles']);
  timeseries = new MemoryTimeseriesStore();
  processor = new RasterProcessor({
    blobStore: new S3BlobStore({ client, buckets: { rasters: 'rasters', tiles: 'tiles' }, maxAttempts: 1 }),
    timeseriesStore: timeseries,
    config: { litThreshold: 10, minZoom: 1, maxZoom: 2, tmpDir },
    now: () => new Date('2024-02-01T00:00:00.000Z')
  });
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

function storeRaster(body: Buffer): void {
  client.objects.set(`rasters/${RASTER_KEY}`, { body, contentType: 'image/tiff' });
}

const request = { jobId: 'job-7', areaId: 1, geometry: SQUARE, month: { year: 2023, month: 1 }, rasterKey: RASTER_KEY };

test('writes statistics and tiles for the month', async () => {
  storeRaster(tiffBytes(VALUES));
  const result = await processor.process(request);

  assert.equal(result.tileCount, 2);
  assert.deepEqual(client.keys('tiles/'), ['tiles/1/2023_01/1/1/0.png', 'tiles/1/2023_01/2/2/1.png']);
  assert.equal(client.objects.get('tiles/1/2023_01/1/1/0.png')?.contentType, 'image/png');

  assert.deepEqual(timeseries.entries.get('1:2023-01-01'), {
    areaId: 1,
    month: '2023-01-01',
    meanBrightness: 8.5,
    medianBrightness: 8.5,
    sumBrightness: 136,
    litPixelCount: 7,
    litPercentage: 43.75,
    tilePathPattern: 'tiles/1/2023_01/{z}/{x}/{y}.png',
    rasterPath: 'rasters/1/2023_01/masked.tif',
    minZoom: 1,
    maxZoom: 2,
    boundingBox: { minx: 10, miny: 10, maxx: 11, maxy: 11 },
    metadata: {
      processedAt: '2024-02-01T00:00:00.000Z',
      threshold: 10,
      totalPixelCount: 16,
      tileCount: 2,
      sourceRasterPath: `rasters/${RASTER_KEY}`,
      jobId: 'job-7'
    }
  });
  assert.deepEqual(result.metadata, {
    month: '2023-01-01',
    tileCount: 2,
    tilePathPattern: 'tiles/1/2023_01/{z}/{x}/{y}.png',
    meanBrightness: 8.5,
    litPercentage: 43.75
  });
  assert.deepEqual(await readdir(tmpDir), []);
});

test('stores the raster cropped and masked to the polygon', async () => {
  storeRaster(tiffBytes(VALUES));
  const quadrant: PolygonGeometry = {
    type: 'Polygon',
    coordinates: [
      [
        [10, 10],
        [10.5, 10],
        [10.5, 10.5],
        [10, 10.5],
        [10, 10]
      ]
    ]
  };
  await processor.process({ ...request, geometry: quadrant });

  const stored = client.objects.get('rasters/1/2023_01/masked.tif');
  assert.equal(stored?.contentType, 'image/tiff');
  const masked = await decodeGeoTiff(stored?.body ?? Buffer.alloc(0));
  assert.equal(masked.width, 2);
  assert.equal(masked.height, 2);
  assert.deepEqual(Array.from(masked.values), [9, 10, 13, 14]);
  assert.deepEqual(masked.bounds, { minx: 10, miny: 10, maxx: 10.5, maxy: 10.5 });
  assert.equal(timeseries.entries.get('1:2023-01-01')?.rasterPath, 'rasters/1/2023_01/masked.tif');
});

test('writes no row when the masked raster upload fails', async () => {
  storeRaster(tiffBytes(VALUES));
  client.rejectPutsUnder = 'rasters/1/2023_01/';
  await assert.rejects(processor.process(request), StorageError);
  assert.equal(timeseries.upserts, 0);
  assert.deepEqual(await readdir(tmpDir), []);
});

test('overwrites the row when the month is reprocessed', async () => {
  storeRaster(tiffBytes(VALUES));
  await processor.process(request);
  storeRaster(tiffBytes(new Array<number>(16).fill(20)));
  await processor.process(request);

  assert.equal(timeseries.entries.size, 1);
  assert.equal(timeseries.entries.get('1:2023-01-01')?.meanBrightness, 20);
  assert.equal(timeseries.entries.get('1:2023-01-01')?.litPercentage, 100);
});

test('fails on an undecodable raster without writing anything', async () => {
  storeRaster(Buffer.from('not a raster'));
  await assert.rejects(processor.process(request), (err: unknown) => err instanceof DataQualityError && err.code === 'RASTER_DECODE');
  assert.equal(timeseries.upserts, 0);
  assert.deepEqual(client.keys('tiles/'), []);
  assert.deepEqual(await readdir(tmpDir), []);
});

test('fails when no pixel inside the polygon is valid', async () => {
  storeRaster(tiffBytes(new Array<number>(16).fill(0)));
  await assert.rejects(processor.process(request), (err: unknown) => err instanceof DataQualityError && err.code === 'NO_VALID_PIXELS');
  assert.equal(timeseries.upserts, 0);
});

test('fails when the raster is missing', async () => {
  await assert.rejects(processor.process(request), BlobNotFoundError);
  assert.equal(timeseries.upserts, 0);
});

test('writes no row when a tile upload fails', async () => {
  storeRaster(tiffBytes(VALUES));
  client.rejectPutsUnder = 'tiles/1/2023_01/2/';
  await assert.rejects(processor.process(request), StorageError);
  assert.equal(timeseries.upserts, 0);
  assert.deepEqual(await readdir(tmpDir), []);
});

test('stops before writing when the job is aborted', async () => {
  storeRaster(tiffBytes(VALUES));
  const controller = new AbortController();
  const reason = new Error('job exceeded the timeout');
  controller.abort(reason);
  await assert.rejects(processor.process(request, controller.signal), (err: unknown) => err === reason);
  assert.equal(timeseries.upserts, 0);
});

test('builds the tile path pattern from the tiles bucket', () => {
  assert.equal(tilePathPattern('tiles', 42, { year: 2023, month: 11 }), 'tiles/42/2023_11/{z}/{x}/{y}.png');
  assert.equal(maskedRasterKey(42, { year: 2023, month: 11 }), '42/2023_11/masked.tif');
});
