import { fromArrayBuffer } from 'geotiff';
import { DataQualityError, errorMessage } from '../errors';
import type { DecodedRaster } from './types';

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new Uint8Array(bytes.byteLength);
  copy.set(bytes);
  return copy.buffer;
}

function decodeFailure(reason: string, cause?: unknown): DataQualityError {
  return new DataQualityError(`failed to decode raster: ${reason}`, 'RASTER_DECODE', undefined, { cause });
}

/** Reads band 1 of a GeoTIFF together with its georeferencing and GDAL nodata value. */
export async function decodeGeoTiff(bytes: Uint8Array): Promise<DecodedRaster> {
  if (bytes.byteLength === 0) {
    throw decodeFailure('raster is empty');
  }

  try {
    const tiff = await fromArrayBuffer(toArrayBuffer(bytes));
    const image = await tiff.getImage();
    const width = image.getWidth();
    const height = image.getHeight();
    if (width <= 0 || height <= 0) {
      throw decodeFailure(`invalid dimensions ${width}x${height}`);
    }

    const [originX, originY] = image.getOrigin();
    const [pixelWidth, pixelHeight] = image.getResolution();
    const [minx, miny, maxx, maxy] = image.getBoundingBox();
    const rasters = await image.readRasters({ samples: [0] });
    const band = Array.isArray(rasters) ? rasters[0] : rasters;
    if (!band || band.length !== width * height) {
      throw decodeFailure('band 1 is missing or truncated');
    }

    return {
      width,
      height,
      values: Float64Array.from(band),
      nodata: image.getGDALNoData(),
      originX,
      originY,
      pixelWidth: Math.abs(pixelWidth),
      pixelHeight: pixelHeight > 0 ? -pixelHeight : pixelHeight,
      bounds: { minx, miny, maxx, maxy }
    };
  } catch (err) {
    if (err instanceof DataQualityError) {
      throw err;
    }
    throw decodeFailure(errorMessage(err), err);
  }
}
