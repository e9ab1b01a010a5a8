import type { PoolClient } from 'pg';
import { InternalSchedulerError } from '../errors';
import type { AreaRecord, JsonObject, PolygonGeometry } from '../jobs/types';
import { parsePolygon } from '../raster/geometry';
import { toJsonObject } from '../utils/json';

type AreaRow = {
  area_id: number;
  name: string;
  geometry: unknown;
  created_at: Date;
  meta_data: unknown;
};

const AREA_COLUMNS = `area_id, name, ST_AsGeoJSON(geom)::json AS geometry, created_at, meta_data`;

function mapRow(row: AreaRow): AreaRecord {
  let geometry: PolygonGeometry;
  try {
    geometry = parsePolygon(typeof row.geometry === 'string' ? JSON.parse(row.geometry) : row.geometry);
  } catch (err) {
    throw new InternalSchedulerError(`area ${row.area_id} has an unreadable geometry`, 'UNEXPECTED', { cause: err });
  }
  return {
    id: row.area_id,
    name: row.name,
    geometry,
    metadata: toJsonObject(row.meta_data),
    createdAt: row.created_at.toISOString()
  } satisfies AreaRecord;
}

export async function insertArea(
  client: PoolClient,
  input: { name: string; geometry: PolygonGeometry; metadata: JsonObject }
): Promise<AreaRecord> {
  const { rows } = await client.query<AreaRow>(
    `INSERT INTO areas (name, geom, meta_data)
     VALUES ($1, ST_SetSRID(ST_GeomFromGeoJSON($2), 4326), $3::jsonb)
     RETURNING ${AREA_COLUMNS}`,
    [input.name, JSON.stringify(input.geometry), JSON.stringify(input.metadata)]
  );
  return mapRow(rows[0]);
}

export async function getAreaById(client: PoolClient, areaId: number): Promise<AreaRecord | null> {
  const { rows } = await client.query<AreaRow>(`SELECT ${AREA_COLUMNS} FROM areas WHERE area_id = $1`, [areaId]);
  return rows.length > 0 ? mapRow(rows[0]) : null;
}

export async function listAreas(client: PoolClient): Promise<AreaRecord[]> {
  const { rows } = await client.query<AreaRow>(`SELECT ${AREA_COLUMNS} FROM areas ORDER BY area_id`);
  return rows.map(mapRow);
}

export async function countAreas(client: PoolClient): Promise<number> {
  const { rows } = await client.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM areas`);
  return rows[0]?.count ?? 0;
}
