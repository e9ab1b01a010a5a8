import type { BoundingBox } from '../jobs/types';

/** Single-band raster in EPSG:4326, row-major from the top-left pixel. */
export type DecodedRaster = {
  width: number;
  height: number;
  values: Float64Array;
  nodata: number | null;
  originX: number;
  originY: number;
  /** Degrees per pixel along x; positive. */
  pixelWidth: number;
  /** Degrees per pixel along y; negative for north-up rasters. */
  pixelHeight: number;
  bounds: BoundingBox;
};

export type ZonalStatistics = {
  mean: number;
  median: number;
  sum: number;
  min: number;
  max: number;
  litPixelCount: number;
  litPercentage: number;
  validPixelCount: number;
};

export type TileCoordinate = {
  z: number;
  x: number;
  y: number;
};
