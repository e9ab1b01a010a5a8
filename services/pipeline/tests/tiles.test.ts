import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { PNG } from 'pngjs';

import { latToTileY, lonToTileX, renderTile, renderTilePyramid, TILE_SIZE, tilesForBounds } from '../src/raster/tiles';
import { gridRaster } from './helpers/fixtures';

const raster = gridRaster(new Array<number>(16).fill(5));
const mask = new Uint8Array(16).fill(1);
const range = { min: 0, max: 10 };

test('maps coordinates onto web mercator tiles', () => {
  assert.equal(lonToTileX(-180, 0), 0);
  assert.equal(lonToTileX(0, 1), 1);
  assert.equal(lonToTileX(180, 2), 3);
  assert.equal(latToTileY(0, 1), 1);
  assert.equal(latToTileY(85, 1), 0);
  assert.equal(latToTileY(-90, 1), 1);
});

test('lists tiles intersecting a bounding box', () => {
  const bounds = { minx: 10, miny: 10, maxx: 11, maxy: 11 };
  assert.deepEqual(tilesForBounds(bounds, 0), [{ z: 0, x: 0, y: 0 }]);
  assert.deepEqual(tilesForBounds(bounds, 6), [{ z: 6, x: 33, y: 30 }]);
  assert.deepEqual(tilesForBounds({ minx: -1, miny: -1, maxx: 1, maxy: 1 }, 1), [
    { z: 1, x: 0, y: 0 },
    { z: 1, x: 0, y: 1 },
    { z: 1, x: 1, y: 0 },
    { z: 1, x: 1, y: 1 }
  ]);
});

test('renders masked pixels in grey and leaves the rest transparent', () => {
  const image = renderTile({ raster, mask, range }, { z: 6, x: 33, y: 30 });
  assert.ok(image);
  const png = PNG.sync.read(image);
  assert.equal(png.width, TILE_SIZE);
  const inside = (30 * TILE_SIZE + 221) * 4;
  assert.deepEqual(Array.from(png.data.subarray(inside, inside + 4)), [128, 128, 128, 255]);
  assert.equal(png.data[3], 0);
});

test('skips tiles without masked pixels', () => {
  assert.equal(renderTile({ raster, mask, range }, { z: 6, x: 0, y: 0 }), null);
  assert.equal(renderTile({ raster, mask: new Uint8Array(16), range }, { z: 6, x: 33, y: 30 }), null);
});

test('writes a z/x/y pyramid over the zoom range', async () => {
  const outputDir = await mkdtemp(path.join(tmpdir(), 'nightlight-tiles-'));
  try {
    const tiles = await renderTilePyramid({ raster, mask, range, minZoom: 1, maxZoom: 2, outputDir });
    assert.deepEqual(
      tiles.map(({ z, x, y }) => `${z}/${x}/${y}`),
      ['1/1/0', '2/2/1']
    );
    const written = await readFile(path.join(outputDir, '2', '2', '1.png'));
    assert.equal(PNG.sync.read(written).height, TILE_SIZE);
  } finally {
    await rm(outputDir, { recursive: true, force: true });
  }
});
