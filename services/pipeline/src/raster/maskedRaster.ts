import { writeArrayBuffer } from 'geotiff';
import type { BoundingBox } from '../jobs/types';
import type { DecodedRaster } from './types';

export type MaskedRaster = {
  width: number;
  height: number;
  /** Pixels outside the mask are 0, the nodata value of the written file. */
  values: number[];
  bounds: BoundingBox;
};

/**
 * Crops the raster to the window of masked pixels and blanks everything the
 * mask leaves out. geotiff writes 8-bit samples, so radiance is rounded and
 * held in 1..255 to keep 0 free for nodata.
 */
export function cropToMask(raster: DecodedRaster, mask: Uint8Array): MaskedRaster {
  let firstRow = raster.height;
  let lastRow = -1;
  let firstCol = raster.width;
  let lastCol = -1;
  for (let row = 0; row < raster.height; row += 1) {
    for (let col = 0; col < raster.width; col += 1) {
      if (mask[row * raster.width + col] === 1) {
        firstRow = Math.min(firstRow, row);
        lastRow = Math.max(lastRow, row);
        firstCol = Math.min(firstCol, col);
        lastCol = Math.max(lastCol, col);
      }
    }
  }
  if (lastRow < 0) {
    return { width: 0, height: 0, values: [], bounds: raster.bounds };
  }

  const width = lastCol - firstCol + 1;
  const height = lastRow - firstRow + 1;
  const values: number[] = [];
  for (let row = firstRow; row <= lastRow; row += 1) {
    for (let col = firstCol; col <= lastCol; col += 1) {
      const index = row * raster.width + col;
      values.push(mask[index] === 1 ? Math.min(255, Math.max(1, Math.round(raster.values[index]))) : 0);
    }
  }

  const top = raster.originY + firstRow * raster.pixelHeight;
  const bottom = raster.originY + (lastRow + 1) * raster.pixelHeight;
  const minx = raster.originX + firstCol * raster.pixelWidth;
  return {
    width,
    height,
    values,
    bounds: {
      minx,
      miny: Math.min(top, bottom),
      maxx: minx + width * raster.pixelWidth,
      maxy: Math.max(top, bottom)
    }
  };
}

export function encodeMaskedRaster(masked: MaskedRaster, raster: DecodedRaster): Buffer {
  const arrayBuffer = writeArrayBuffer(masked.values, {
    width: masked.width,
    height: masked.height,
    ModelPixelScale: [raster.pixelWidth, Math.abs(raster.pixelHeight), 0],
    ModelTiepoint: [0, 0, 0, masked.bounds.minx, masked.bounds.maxy, 0],
    GeographicTypeGeoKey: 4326
  });
  return Buffer.from(arrayBuffer);
}
