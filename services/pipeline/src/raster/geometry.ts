import { z } from 'zod';
import { ValidationError } from '../errors';
import type { BoundingBox, PolygonGeometry } from '../jobs/types';

const positionSchema = z
  .array(z.number().finite())
  .min(2, 'position needs longitude and latitude')
  .max(3, 'position has too many values')
  .superRefine((position, ctx) => {
    const [lon, lat] = position;
    if (lon < -180 || lon > 180) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `longitude ${lon} is outside [-180, 180]` });
    }
    if (lat < -90 || lat > 90) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `latitude ${lat} is outside [-90, 90]` });
    }
  })
  .transform((position): [number, number] => [position[0], position[1]]);

const ringSchema = z
  .array(positionSchema)
  .min(4, 'ring needs at least 4 positions')
  .superRefine((ring, ctx) => {
    const first = ring[0];
    const last = ring[ring.length - 1];
    if (first && last && (first[0] !== last[0] || first[1] !== last[1])) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'ring must be closed (first position equals last)' });
    }
  });

export const polygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(ringSchema).length(1, 'polygon must have exactly one ring')
});

export function parsePolygon(value: unknown): PolygonGeometry {
  const parsed = polygonSchema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`invalid polygon geometry: ${reason}`, 'INVALID_GEOMETRY');
  }
  return parsed.data;
}

export function outerRing(geometry: PolygonGeometry): [number, number][] {
  return geometry.coordinates[0] ?? [];
}

/** Even-odd ray casting against the outer ring. */
export function containsPoint(ring: readonly [number, number][], x: number, y: number): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i, i += 1) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    const crosses = yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi;
    if (crosses) {
      inside = !inside;
    }
  }
  return inside;
}

/** Whether the segment a-b passes through the open interior of `cell` (Liang-Barsky clip). */
function segmentEntersCell(
  [ax, ay]: readonly [number, number],
  [bx, by]: readonly [number, number],
  cell: BoundingBox
): boolean {
  const dx = bx - ax;
  const dy = by - ay;
  let t0 = 0;
  let t1 = 1;
  const clip = (p: number, q: number): boolean => {
    if (p === 0) {
      return q >= 0;
    }
    const r = q / p;
    if (p < 0) {
      if (r > t1) {
        return false;
      }
      t0 = Math.max(t0, r);
    } else {
      if (r < t0) {
        return false;
      }
      t1 = Math.min(t1, r);
    }
    return true;
  };
  if (!(clip(-dx, ax - cell.minx) && clip(dx, cell.maxx - ax) && clip(-dy, ay - cell.miny) && clip(dy, cell.maxy - ay))) {
    return false;
  }
  // The clipped piece lies in the closed cell; its midpoint is interior whenever any of it is.
  const t = (t0 + t1) / 2;
  const x = ax + t * dx;
  const y = ay + t * dy;
  return x > cell.minx && x < cell.maxx && y > cell.miny && y < cell.maxy;
}

/**
 * Whether the polygon interior overlaps the cell by a positive area: the cell
 * centre is inside, or some ring edge passes through the cell. Cells that only
 * share an edge or a corner with the ring do not count.
 */
export function cellIntersectsRing(ring: readonly [number, number][], cell: BoundingBox): boolean {
  if (containsPoint(ring, (cell.minx + cell.maxx) / 2, (cell.miny + cell.maxy) / 2)) {
    return true;
  }
  for (let i = 1; i < ring.length; i += 1) {
    if (segmentEntersCell(ring[i - 1], ring[i], cell)) {
      return true;
    }
  }
  return false;
}

export function ringBounds(ring: readonly [number, number][]): BoundingBox {
  let minx = Number.POSITIVE_INFINITY;
  let miny = Number.POSITIVE_INFINITY;
  let maxx = Number.NEGATIVE_INFINITY;
  let maxy = Number.NEGATIVE_INFINITY;
  for (const [x, y] of ring) {
    minx = Math.min(minx, x);
    miny = Math.min(miny, y);
    maxx = Math.max(maxx, x);
    maxy = Math.max(maxy, y);
  }
  return { minx, miny, maxx, maxy };
}
