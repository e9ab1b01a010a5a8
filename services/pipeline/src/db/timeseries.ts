import type { PoolClient } from 'pg';
import { z } from 'zod';
import type { BoundingBox, TimeseriesEntry } from '../jobs/types';
import { toJsonObject } from '../utils/json';

type TimeseriesRow = {
  area_id: number;
  month: string;
  mean_brightness: number | null;
  median_brightness: number | null;
  sum_brightness: number | null;
  lit_pixel_count: number | null;
  lit_percentage: number | null;
  tile_path_pattern: string | null;
  raster_path: string | null;
  min_zoom: number | null;
  max_zoom: number | null;
  bounding_box: unknown;
  meta_data: unknown;
};

export type TimeseriesRange = {
  from?: string;
  to?: string;
};

export type TimeseriesSummary = {
  monthCount: number;
  recordCount: number;
  latestMonth: string | null;
};

const boundingBoxSchema = z.object({
  minx: z.number(),
  miny: z.number(),
  maxx: z.number(),
  maxy: z.number()
});

function parseBoundingBox(value: unknown): BoundingBox {
  const parsed = boundingBoxSchema.safeParse(value);
  return parsed.success ? parsed.data : { minx: 0, miny: 0, maxx: 0, maxy: 0 };
}

function mapRow(row: TimeseriesRow): TimeseriesEntry {
  return {
    areaId: row.area_id,
    month: row.month,
    meanBrightness: row.mean_brightness ?? 0,
    medianBrightness: row.median_brightness ?? 0,
    sumBrightness: row.sum_brightness ?? 0,
    litPixelCount: row.lit_pixel_count ?? 0,
    litPercentage: row.lit_percentage ?? 0,
    tilePathPattern: row.tile_path_pattern ?? '',
    rasterPath: row.raster_path ?? '',
    minZoom: row.min_zoom ?? 0,
    maxZoom: row.max_zoom ?? 0,
    boundingBox: parseBoundingBox(row.bounding_box),
    metadata: toJsonObject(row.meta_data)
  } satisfies TimeseriesEntry;
}

/** Last write wins for a given `(area_id, month)`. */
export async function upsertTimeseriesEntry(client: PoolClient, entry: TimeseriesEntry): Promise<void> {
  await client.query(
    `INSERT INTO area_timeseries (
       area_id,
       month,
       mean_brightness,
       median_brightness,
       sum_brightness,
       lit_pixel_count,
       lit_percentage,
       tile_path_pattern,
       raster_path,
       min_zoom,
       max_zoom,
       bounding_box,
       meta_data
     ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12::jsonb, $13::jsonb)
     ON CONFLICT (area_id, month) DO UPDATE SET
       mean_brightness = EXCLUDED.mean_brightness,
       median_brightness = EXCLUDED.median_brightness,
       sum_brightness = EXCLUDED.sum_brightness,
       lit_pixel_count = EXCLUDED.lit_pixel_count,
       lit_percentage = EXCLUDED.lit_percentage,
       tile_path_pattern = EXCLUDED.tile_path_pattern,
       raster_path = EXCLUDED.raster_path,
       min_zoom = EXCLUDED.min_zoom,
       max_zoom = EXCLUDED.max_zoom,
       bounding_box = EXCLUDED.bounding_box,
       meta_data = EXCLUDED.meta_data`,
    [
      entry.areaId,
      entry.month,
      entry.meanBrightness,
      entry.medianBrightness,
      entry.sumBrightness,
      entry.litPixelCount,
      entry.litPercentage,
      entry.tilePathPattern,
      entry.rasterPath,
      entry.minZoom,
      entry.maxZoom,
      JSON.stringify(entry.boundingBox),
      JSON.stringify(entry.metadata)
    ]
  );
}

export async function listTimeseries(
  client: PoolClient,
  areaId: number,
  range: TimeseriesRange = {}
): Promise<TimeseriesEntry[]> {
  const params: unknown[] = [areaId];
  const conditions = ['area_id = $1'];
  if (range.from) {
    params.push(range.from);
    conditions.push(`month >= $${params.length}`);
  }
  if (range.to) {
    params.push(range.to);
    conditions.push(`month <= $${params.length}`);
  }
  const { rows } = await client.query<TimeseriesRow>(
    `SELECT * FROM area_timeseries WHERE ${conditions.join(' AND ')} ORDER BY month ASC`,
    params
  );
  return rows.map(mapRow);
}

export async function summarizeTimeseries(client: PoolClient): Promise<TimeseriesSummary> {
  const { rows } = await client.query<{ month_count: number; record_count: number; latest_month: string | null }>(
    `SELECT COUNT(DISTINCT month)::int AS month_count,
            COUNT(*)::int AS record_count,
            MAX(month) AS latest_month
       FROM area_timeseries`
  );
  const row = rows[0];
  return {
    monthCount: row?.month_count ?? 0,
    recordCount: row?.record_count ?? 0,
    latestMonth: row?.latest_month ?? null
  };
}
