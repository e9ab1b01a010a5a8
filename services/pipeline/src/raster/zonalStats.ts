import { DataQualityError } from '../errors';
import { cellIntersectsRing, ringBounds } from './geometry';
import type { DecodedRaster, ZonalStatistics } from './types';

export type ZonalResult = {
  statistics: ZonalStatistics;
  /** 1 for pixels that entered the statistics, 0 otherwise; same layout as the raster. */
  mask: Uint8Array;
};

export function isValidPixel(value: number, nodata: number | null): boolean {
  return Number.isFinite(value) && value !== nodata && value > 0;
}

function median(sorted: Float64Array): number {
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

/**
 * Statistics over every pixel the polygon touches, including partly covered
 * edge pixels. Nodata, NaN and non-positive radiance are excluded; a pixel is
 * lit when `value >= litThreshold`.
 */
export function computeZonalStatistics(
  raster: DecodedRaster,
  ring: readonly [number, number][],
  litThreshold: number
): ZonalResult {
  const mask = new Uint8Array(raster.width * raster.height);
  const bounds = ringBounds(ring);
  const values: number[] = [];
  let sum = 0;
  let lit = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (let row = 0; row < raster.height; row += 1) {
    const top = raster.originY + row * raster.pixelHeight;
    const bottom = top + raster.pixelHeight;
    const miny = Math.min(top, bottom);
    const maxy = Math.max(top, bottom);
    if (maxy <= bounds.miny || miny >= bounds.maxy) {
      continue;
    }
    for (let col = 0; col < raster.width; col += 1) {
      const minx = raster.originX + col * raster.pixelWidth;
      const maxx = minx + raster.pixelWidth;
      if (maxx <= bounds.minx || minx >= bounds.maxx) {
        continue;
      }
      const index = row * raster.width + col;
      const value = raster.values[index];
      if (!isValidPixel(value, raster.nodata) || !cellIntersectsRing(ring, { minx, miny, maxx, maxy })) {
        continue;
      }
      mask[index] = 1;
      values.push(value);
      sum += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
      if (value >= litThreshold) {
        lit += 1;
      }
    }
  }

  if (values.length === 0) {
    throw new DataQualityError('no valid pixels inside the area polygon', 'NO_VALID_PIXELS', {
      width: raster.width,
      height: raster.height
    });
  }

  const sorted = Float64Array.from(values).sort();
  return {
    statistics: {
      mean: sum / values.length,
      median: median(sorted),
      sum,
      min,
      max,
      litPixelCount: lit,
      litPercentage: (lit / values.length) * 100,
      validPixelCount: values.length
    },
    mask
  };
}
