import type { PolygonGeometry } from '../jobs/types';

export type MonthlyCompositeRequest = {
  geometry: PolygonGeometry;
  year: number;
  month: number;
  /** Aborted when the job running the export times out. */
  signal?: AbortSignal;
};

/** Source of monthly nightlight composites, returned as GeoTIFF bytes clipped to the polygon. */
export interface ImageryProvider {
  readonly source: string;
  fetchMonthlyComposite(request: MonthlyCompositeRequest): Promise<Buffer>;
}
