export const JOB_TYPES = ['earth_engine_export', 'etl_processing'] as const;
export type JobType = (typeof JOB_TYPES)[number];

export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export type TerminalJobStatus = Extract<JobStatus, 'completed' | 'failed'>;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** GeoJSON polygon with a single outer ring in WGS84 `[lon, lat]` order. */
export type PolygonGeometry = {
  type: 'Polygon';
  coordinates: [number, number][][];
};

export type AreaRecord = {
  id: number;
  name: string;
  geometry: PolygonGeometry;
  metadata: JsonObject;
  createdAt: string;
};

/**
 * A row of `processing_jobs`. `jobType` is kept as stored; the dispatcher
 * narrows it to a {@link JobType} together with the metadata.
 */
export type ProcessingJobRecord = {
  id: string;
  areaId: number;
  jobType: string;
  status: JobStatus;
  startDate: string | null;
  endDate: string | null;
  createdAt: string;
  updatedAt: string;
  errorMessage: string | null;
  metadata: JsonObject;
};

export type JobOutcome =
  | { status: 'completed'; metadata: JsonObject }
  | { status: 'failed'; errorMessage: string; metadata?: JsonObject };

export type NewProcessingJob = {
  areaId: number;
  jobType: JobType;
  startDate?: string | null;
  endDate?: string | null;
  metadata?: JsonObject;
};

export type BoundingBox = {
  minx: number;
  miny: number;
  maxx: number;
  maxy: number;
};

export type TimeseriesEntry = {
  areaId: number;
  month: string;
  meanBrightness: number;
  medianBrightness: number;
  sumBrightness: number;
  litPixelCount: number;
  litPercentage: number;
  tilePathPattern: string;
  rasterPath: string;
  minZoom: number;
  maxZoom: number;
  boundingBox: BoundingBox;
  metadata: JsonObject;
};

export function isJobType(value: string): value is JobType {
  return JOB_TYPES.some((candidate) => candidate === value);
}

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((candidate) => candidate === value);
}
