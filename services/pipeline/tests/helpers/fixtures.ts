import { writeArrayBuffer } from 'geotiff';
import type { PolygonGeometry, ProcessingJobRecord } from '../../src/jobs/types';
import type { DecodedRaster } from '../../src/raster/types';

export const SQUARE: PolygonGeometry = {
  type: 'Polygon',
  coordinates: [
    [
      [10, 10],
      [11, 10],
      [11, 11],
      [10, 11],
      [10, 10]
    ]
  ]
};

export function jobRecord(overrides: Partial<ProcessingJobRecord> = {}): ProcessingJobRecord {
  return {
    id: 'job-1',
    areaId: 1,
    jobType: 'earth_engine_export',
    status: 'pending',
    startDate: '2023-01-01',
    endDate: '2023-02-01',
    createdAt: '2023-01-01T00:00:00.000Z',
    updatedAt: '2023-01-01T00:00:00.000Z',
    errorMessage: null,
    metadata: {},
    ...overrides
  };
}

/** A north-up raster whose top-left corner sits at (10, 11) with 0.25 degree pixels. */
export function gridRaster(values: number[], width = 4, nodata: number | null = -9999): DecodedRaster {
  const height = values.length / width;
  return {
    width,
    height,
    values: Float64Array.from(values),
    nodata,
    originX: 10,
    originY: 11,
    pixelWidth: 0.25,
    pixelHeight: -0.25,
    bounds: { minx: 10, miny: 11 - height * 0.25, maxx: 10 + width * 0.25, maxy: 11 }
  };
}

/** 8-bit GeoTIFF with the same georeferencing as {@link gridRaster}. */
export function tiffBytes(values: number[], width = 4): Buffer {
  const arrayBuffer = writeArrayBuffer(values, {
    width,
    height: values.length / width,
    ModelPixelScale: [0.25, 0.25, 0],
    ModelTiepoint: [0, 0, 0, 10, 11, 0],
    GeographicTypeGeoKey: 4326
  });
  return Buffer.from(arrayBuffer);
}
