import { Command } from 'commander';
import { loadServiceConfig } from '../config/serviceConfig';
import { closePool, getDatabase } from '../db/client';
import { listMigrationIds, runMigrationsWithConnection } from '../db/migrations';
import { ensureSchemaExists } from '../db/schema';
import { ValidationError } from '../errors';
import { PipelineService } from '../jobs/service';
import { PostgresAreaStore, PostgresJobStore, PostgresTimeseriesStore, type ProcessingJobFilter } from '../jobs/store';
import { isJobStatus, isJobType, type JsonObject } from '../jobs/types';
import { jsonObjectSchema } from '../utils/json';

export type CliContext = {
  service: PipelineService;
  migrate(): Promise<string[]>;
  close(): Promise<void>;
};

type CliDependencies = {
  contextFactory?: () => CliContext;
  print?: (text: string) => void;
};

function createContext(): CliContext {
  const config = loadServiceConfig();
  const db = getDatabase();
  const service = new PipelineService({
    areaStore: new PostgresAreaStore(db),
    jobStore: new PostgresJobStore(db),
    timeseriesStore: new PostgresTimeseriesStore(db),
    rastersBucket: config.storage.rastersBucket,
    tilesPublicUrl: config.storage.publicUrl
  });
  return {
    service,
    async migrate() {
      await ensureSchemaExists(config.database.schema);
      await runMigrationsWithConnection();
      return listMigrationIds();
    },
    close: closePool
  };
}

function parseInteger(value: string, label: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(`${label} must be a positive integer, got '${value}'`);
  }
  return Number.parseInt(trimmed, 10);
}

function parseJson(value: string, label: string): unknown {
  try {
    return JSON.parse(value);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`failed to parse ${label} JSON: ${reason}`);
  }
}

function parseMetadata(value: string | undefined): JsonObject | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = jsonObjectSchema.safeParse(parseJson(value, 'metadata'));
  if (!parsed.success) {
    throw new ValidationError('metadata must be a JSON object');
  }
  return parsed.data;
}

function buildJobFilter(options: { areaId?: string; status?: string; type?: string; limit?: string }): ProcessingJobFilter {
  const filter: ProcessingJobFilter = {};
  if (options.areaId !== undefined) {
    filter.areaId = parseInteger(options.areaId, 'area id');
  }
  if (options.status !== undefined) {
    if (!isJobStatus(options.status)) {
      throw new ValidationError(`unknown job status '${options.status}'`);
    }
    filter.status = options.status;
  }
  if (options.type !== undefined) {
    if (!isJobType(options.type)) {
      throw new ValidationError(`unknown job type '${options.type}'`, 'UNKNOWN_JOB_TYPE');
    }
    filter.jobType = options.type;
  }
  if (options.limit !== undefined) {
    filter.limit = parseInteger(options.limit, 'limit');
  }
  return filter;
}

export function createInterface(deps: CliDependencies = {}): Command {
  const contextFactory = deps.contextFactory ?? createContext;
  const print = deps.print ?? ((text: string) => console.log(text));

  async function withContext(fn: (context: CliContext) => Promise<unknown>): Promise<void> {
    const context = contextFactory();
    try {
      const result = await fn(context);
      print(JSON.stringify(result, null, 2));
    } finally {
      await context.close();
    }
  }

  const program = new Command();
  program.name('nightlight').description('Operator CLI for the nightlight processing pipeline');

  program
    .command('areas:create')
    .description('Register an area of interest')
    .argument('<name>', 'Unique area name')
    .requiredOption('--geometry <json>', 'GeoJSON Polygon with a single ring')
    .option('--metadata <json>', 'Optional metadata JSON object')
    .action(async (name: string, cmdOptions: { geometry: string; metadata?: string }) => {
      await withContext(({ service }) =>
        service.createArea({
          name,
          geometry: parseJson(cmdOptions.geometry, 'geometry'),
          metadata: parseMetadata(cmdOptions.metadata)
        })
      );
    });

  program
    .command('areas:list')
    .description('List registered areas')
    .action(async () => {
      await withContext(({ service }) => service.listAreas());
    });

  program
    .command('areas:get')
    .description('Print one area with its geometry')
    .argument('<areaId>', 'Area identifier')
    .action(async (areaId: string) => {
      const id = parseInteger(areaId, 'area id');
      await withContext(({ service }) => service.getArea(id));
    });

  program
    .command('jobs:export')
    .description('Queue an imagery export for an area and date range')
    .argument('<areaId>', 'Area identifier')
    .argument('<startDate>', 'First day covered (YYYY-MM-DD)')
    .option('--end-date <date>', 'Exclusive end date (YYYY-MM-DD); defaults to the end of the start month')
    .action(async (areaId: string, startDate: string, cmdOptions: { endDate?: string }) => {
      await withContext(({ service }) =>
        service.createExportJob({
          areaId: parseInteger(areaId, 'area id'),
          startDate,
          endDate: cmdOptions.endDate ?? null
        })
      );
    });

  program
    .command('jobs:etl')
    .description('Queue processing of a raster that is already in the rasters bucket')
    .argument('<areaId>', 'Area identifier')
    .argument('<month>', 'Month covered (YYYY-MM)')
    .argument('<rasterKey>', 'Object key in the rasters bucket')
    .action(async (areaId: string, month: string, rasterKey: string) => {
      await withContext(({ service }) =>
        service.createEtlJob({ areaId: parseInteger(areaId, 'area id'), month, rasterKey })
      );
    });

  program
    .command('jobs:list')
    .description('List processing jobs, newest first')
    .option('--area-id <id>', 'Only jobs for this area')
    .option('--status <status>', 'pending | running | completed | failed')
    .option('--type <type>', 'earth_engine_export | etl_processing')
    .option('--limit <n>', 'Maximum number of jobs', '50')
    .action(async (cmdOptions: { areaId?: string; status?: string; type?: string; limit?: string }) => {
      const filter = buildJobFilter(cmdOptions);
      await withContext(({ service }) => service.listJobs(filter));
    });

  program
    .command('jobs:resubmit')
    .description('Queue a new pending copy of a failed job')
    .argument('<jobId>', 'Failed job identifier')
    .action(async (jobId: string) => {
      await withContext(({ service }) => service.resubmitJob(jobId));
    });

  program
    .command('timeseries')
    .description('Print the monthly brightness series of an area')
    .argument('<areaId>', 'Area identifier')
    .option('--from <month>', 'First month (YYYY-MM)')
    .option('--to <month>', 'Last month (YYYY-MM)')
    .action(async (areaId: string, cmdOptions: { from?: string; to?: string }) => {
      const id = parseInteger(areaId, 'area id');
      await withContext(({ service }) => service.getTimeseries(id, { from: cmdOptions.from, to: cmdOptions.to }));
    });

  program
    .command('stats')
    .description('Print area, month and job counts')
    .action(async () => {
      await withContext(({ service }) => service.getStatistics());
    });

  program
    .command('migrate')
    .description('Create the schema and apply pending migrations')
    .action(async () => {
      await withContext(async (context) => ({ migrations: await context.migrate() }));
    });

  return program;
}
