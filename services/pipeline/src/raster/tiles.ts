import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { PNG } from 'pngjs';
import type { BoundingBox } from '../jobs/types';
import type { DecodedRaster, TileCoordinate } from './types';

export const TILE_SIZE = 256;
const MAX_LATITUDE = 85.0511287798066;

export type RenderedTile = TileCoordinate & {
  file: string;
};

export type TileRenderOptions = {
  raster: DecodedRaster;
  mask: Uint8Array;
  /** Valid-pixel range mapped linearly onto 0-255 grey. */
  range: { min: number; max: number };
  minZoom: number;
  maxZoom: number;
  outputDir: string;
};

function clampLatitude(lat: number): number {
  return Math.max(-MAX_LATITUDE, Math.min(MAX_LATITUDE, lat));
}

export function lonToTileX(lon: number, zoom: number): number {
  const n = 2 ** zoom;
  return Math.min(n - 1, Math.max(0, Math.floor(((lon + 180) / 360) * n)));
}

export function latToTileY(lat: number, zoom: number): number {
  const n = 2 ** zoom;
  const rad = (clampLatitude(lat) * Math.PI) / 180;
  const y = Math.floor(((1 - Math.log(Math.tan(rad) + 1 / Math.cos(rad)) / Math.PI) / 2) * n);
  return Math.min(n - 1, Math.max(0, y));
}

/** Tiles at `zoom` intersecting the bounds, in x then y order. */
export function tilesForBounds(bounds: BoundingBox, zoom: number): TileCoordinate[] {
  const minX = lonToTileX(bounds.minx, zoom);
  const maxX = lonToTileX(bounds.maxx, zoom);
  const minY = latToTileY(bounds.maxy, zoom);
  const maxY = latToTileY(bounds.miny, zoom);
  const tiles: TileCoordinate[] = [];
  for (let x = minX; x <= maxX; x += 1) {
    for (let y = minY; y <= maxY; y += 1) {
      tiles.push({ z: zoom, x, y });
    }
  }
  return tiles;
}

function pixelLongitude(tileX: number, px: number, zoom: number): number {
  return ((tileX + (px + 0.5) / TILE_SIZE) / 2 ** zoom) * 360 - 180;
}

function pixelLatitude(tileY: number, py: number, zoom: number): number {
  const n = Math.PI * (1 - (2 * (tileY + (py + 0.5) / TILE_SIZE)) / 2 ** zoom);
  return (Math.atan(Math.sinh(n)) * 180) / Math.PI;
}

/**
 * Renders one 256x256 RGBA tile by nearest-neighbour sampling. Returns null when
 * no masked pixel falls inside the tile.
 */
export function renderTile(options: Omit<TileRenderOptions, 'minZoom' | 'maxZoom' | 'outputDir'>, tile: TileCoordinate): Buffer | null {
  const { raster, mask, range } = options;
  const span = range.max - range.min;
  const png = new PNG({ width: TILE_SIZE, height: TILE_SIZE });
  png.data.fill(0);
  let visible = false;

  const columns = new Int32Array(TILE_SIZE);
  for (let px = 0; px < TILE_SIZE; px += 1) {
    const lon = pixelLongitude(tile.x, px, tile.z);
    columns[px] = Math.floor((lon - raster.originX) / raster.pixelWidth);
  }

  for (let py = 0; py < TILE_SIZE; py += 1) {
    const lat = pixelLatitude(tile.y, py, tile.z);
    const row = Math.floor((lat - raster.originY) / raster.pixelHeight);
    if (row < 0 || row >= raster.height) {
      continue;
    }
    for (let px = 0; px < TILE_SIZE; px += 1) {
      const col = columns[px];
      if (col < 0 || col >= raster.width) {
        continue;
      }
      const index = row * raster.width + col;
      if (mask[index] !== 1) {
        continue;
      }
      const value = raster.values[index];
      const grey = span > 0 ? Math.round(((value - range.min) / span) * 255) : 255;
      const offset = (py * TILE_SIZE + px) * 4;
      png.data[offset] = grey;
      png.data[offset + 1] = grey;
      png.data[offset + 2] = grey;
      png.data[offset + 3] = 255;
      visible = true;
    }
  }

  return visible ? PNG.sync.write(png) : null;
}

/** Writes `{outputDir}/{z}/{x}/{y}.png` for every non-empty tile over the zoom range. */
export async function renderTilePyramid(options: TileRenderOptions): Promise<RenderedTile[]> {
  const rendered: RenderedTile[] = [];
  for (let zoom = options.minZoom; zoom <= options.maxZoom; zoom += 1) {
    for (const tile of tilesForBounds(options.raster.bounds, zoom)) {
      const image = renderTile(options, tile);
      if (!image) {
        continue;
      }
      const directory = path.join(options.outputDir, String(tile.z), String(tile.x));
      await mkdir(directory, { recursive: true });
      const file = path.join(directory, `${tile.y}.png`);
      await writeFile(file, image);
      rendered.push({ ...tile, file });
    }
  }
  return rendered;
}
