import assert from 'node:assert/strict';
import { test } from 'node:test';

import { DataQualityError } from '../src/errors';
import { decodeGeoTiff } from '../src/raster/decode';
import { tiffBytes } from './helpers/fixtures';

function isDecodeFailure(err: unknown): boolean {
  return err instanceof DataQualityError && err.code === 'RASTER_DECODE' && err.message.startsWith('failed to decode raster: ');
}

test('reads band values and georeferencing', async () => {
  const raster = await decodeGeoTiff(tiffBytes([1, 2, 3, 4, 5, 6], 3));
  assert.equal(raster.width, 3);
  assert.equal(raster.height, 2);
  assert.deepEqual(Array.from(raster.values), [1, 2, 3, 4, 5, 6]);
  assert.equal(raster.originX, 10);
  assert.equal(raster.originY, 11);
  assert.equal(raster.pixelWidth, 0.25);
  assert.equal(raster.pixelHeight, -0.25);
});

test('rejects empty and corrupt rasters', async () => {
  await assert.rejects(decodeGeoTiff(new Uint8Array()), isDecodeFailure);
  await assert.rejects(decodeGeoTiff(Buffer.from('definitely not a tiff')), isDecodeFailure);
});
