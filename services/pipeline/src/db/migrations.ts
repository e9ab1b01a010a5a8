import type { PoolClient } from 'pg';
import { withConnection } from './client';

interface Migration {
  id: string;
  statements: string[];
}

const MIGRATION_TABLE = 'nightlight_schema_migrations';

const migrations: Migration[] = [
  {
    id: '001_pipeline_core_schema',
    statements: [
      `CREATE EXTENSION IF NOT EXISTS postgis;`,
      `CREATE EXTENSION IF NOT EXISTS pgcrypto;`,
      `CREATE TABLE IF NOT EXISTS areas (
         area_id SERIAL PRIMARY KEY,
         name TEXT NOT NULL UNIQUE,
         geom GEOMETRY(Polygon, 4326) NOT NULL,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         meta_data JSONB NOT NULL DEFAULT '{}'::jsonb
       );`,
      `CREATE INDEX IF NOT EXISTS idx_areas_geom
         ON areas USING GIST (geom);`,
      `CREATE TABLE IF NOT EXISTS area_timeseries (
         area_id INT NOT NULL REFERENCES areas(area_id) ON DELETE CASCADE,
         month DATE NOT NULL,
         mean_brightness DOUBLE PRECISION,
         median_brightness DOUBLE PRECISION,
         sum_brightness DOUBLE PRECISION,
         lit_pixel_count INT,
         lit_percentage DOUBLE PRECISION,
         tile_path_pattern TEXT,
         raster_path TEXT,
         min_zoom INT,
         max_zoom INT,
         bounding_box JSONB,
         meta_data JSONB NOT NULL DEFAULT '{}'::jsonb,
         PRIMARY KEY (area_id, month),
         CHECK (EXTRACT(DAY FROM month) = 1)
       );`,
      `CREATE INDEX IF NOT EXISTS idx_area_timeseries_month
         ON area_timeseries(month);`,
      `CREATE TABLE IF NOT EXISTS processing_jobs (
         job_id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
         area_id INT NOT NULL REFERENCES areas(area_id) ON DELETE CASCADE,
         job_type TEXT NOT NULL,
         status TEXT NOT NULL DEFAULT 'pending',
         start_date DATE,
         end_date DATE,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         error_message TEXT,
         meta_data JSONB NOT NULL DEFAULT '{}'::jsonb,
         CHECK (job_type IN ('earth_engine_export', 'etl_processing')),
         CHECK (status IN ('pending', 'running', 'completed', 'failed')),
         CHECK ((status = 'failed') = (error_message IS NOT NULL))
       );`,
      `CREATE INDEX IF NOT EXISTS idx_processing_jobs_area
         ON processing_jobs(area_id);`,
      `CREATE INDEX IF NOT EXISTS idx_processing_jobs_pending
         ON processing_jobs(created_at, job_id)
         WHERE status = 'pending';`,
      `CREATE INDEX IF NOT EXISTS idx_processing_jobs_status_updated
         ON processing_jobs(status, updated_at);`,
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_processing_jobs_etl_month
         ON processing_jobs(area_id, start_date)
         WHERE job_type = 'etl_processing' AND status <> 'failed';`,
      `CREATE OR REPLACE FUNCTION processing_jobs_touch_updated_at()
       RETURNS TRIGGER AS $$
       BEGIN
         NEW.updated_at = GREATEST(NOW(), OLD.updated_at + INTERVAL '1 millisecond');
         RETURN NEW;
       END;
       $$ LANGUAGE plpgsql;`,
      `DROP TRIGGER IF EXISTS processing_jobs_touch_updated_at ON processing_jobs;`,
      `CREATE TRIGGER processing_jobs_touch_updated_at
         BEFORE UPDATE ON processing_jobs
         FOR EACH ROW
         EXECUTE FUNCTION processing_jobs_touch_updated_at();`
    ]
  }
];

export async function runMigrations(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  const { rows } = await client.query<{ id: string }>(`SELECT id FROM ${MIGRATION_TABLE}`);
  const applied = new Set(rows.map((row) => row.id));

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }

    await client.query('BEGIN');
    try {
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await client.query(`INSERT INTO ${MIGRATION_TABLE} (id) VALUES ($1) ON CONFLICT DO NOTHING`, [
        migration.id
      ]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }
}

export async function runMigrationsWithConnection(): Promise<void> {
  await withConnection(async (client) => {
    await runMigrations(client);
  });
}

export function listMigrationIds(): string[] {
  return migrations.map((migration) => migration.id);
}
