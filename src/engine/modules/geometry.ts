/**
 * Geometry Primitives
 * Distance, length and projection utilities for paths and traces
 *
 * All distances are KILOMETRES. Positions are GeoJSON [lng, lat].
 *
 * Two distance modes are supported and must be used consistently for a
 * given network:
 * - geodesic: great-circle (haversine) distance via Turf.js
 * - planar: equirectangular projection about the local latitude, using the
 *   same earth radius so both modes agree closely at path scale
 *
 * Proximity tests (is this trace within tolerance of that path segment?)
 * always run in a local planar frame: at tolerance scale (tens of metres)
 * the difference between the two modes is far below GPS accuracy.
 */

import * as turf from "@turf/turf";
import type {
  BoundingBox,
  DistanceMode,
  PathGeometry,
  Position,
  TracePoint,
} from "../types.js";

/** Length of one degree of latitude (and of longitude at the equator) */
export const KM_PER_DEGREE = turf.radiansToLength(
  turf.degreesToRadians(1),
  "kilometers"
);

/** Cosine floor so longitude scaling stays finite near the poles */
const MIN_COS_LAT = 0.01;

export function cosLatitude(latDeg: number): number {
  return Math.max(MIN_COS_LAT, Math.cos(turf.degreesToRadians(latDeg)));
}

// ============================================
// Distance & Length
// ============================================

/**
 * Distance between two positions in km.
 *
 * Symmetric in both modes, so polyline length does not depend on direction.
 */
export function segmentLengthKm(
  a: Position,
  b: Position,
  mode: DistanceMode
): number {
  if (mode === "geodesic") {
    return turf.distance(a, b, { units: "kilometers" });
  }

  const cos = cosLatitude((a[1] + b[1]) / 2);
  const dx = (b[0] - a[0]) * KM_PER_DEGREE * cos;
  const dy = (b[1] - a[1]) * KM_PER_DEGREE;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Length of a polyline: sum of distances between consecutive positions.
 */
export function lineLengthKm(coords: Position[], mode: DistanceMode): number {
  let total = 0;
  for (let i = 1; i < coords.length; i++) {
    total += segmentLengthKm(coords[i - 1], coords[i], mode);
  }
  return total;
}

/** Parts of a path geometry as separate polylines */
export function geometryParts(geometry: PathGeometry): Position[][] {
  return geometry.type === "LineString"
    ? [geometry.coordinates]
    : geometry.coordinates;
}

/** Deep copy of a path geometry, so callers never share coordinate arrays */
export function cloneGeometry(geometry: PathGeometry): PathGeometry {
  return geometry.type === "LineString"
    ? { type: "LineString", coordinates: geometry.coordinates.map(copyPosition) }
    : {
        type: "MultiLineString",
        coordinates: geometry.coordinates.map((part) => part.map(copyPosition)),
      };
}

function copyPosition(position: Position): Position {
  return [position[0], position[1]];
}

/**
 * Length of a path geometry. For a MultiLineString the parts are summed;
 * the space between parts is not path and has no length.
 */
export function pathLengthKm(geometry: PathGeometry, mode: DistanceMode): number {
  return geometryParts(geometry).reduce(
    (sum, part) => sum + lineLengthKm(part, mode),
    0
  );
}

/**
 * Length of a GPS trace in km. Points are taken in recorded order; the jump
 * into a new recorded segment is not counted.
 */
export function traceDistanceKm(points: TracePoint[], mode: DistanceMode): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    if (points[i].segmentStart) continue;
    total += segmentLengthKm(toPosition(points[i - 1]), toPosition(points[i]), mode);
  }
  return total;
}

/**
 * Total climb in metres: sum of positive elevation deltas between
 * consecutive points that both carry an elevation.
 *
 * @returns null when the trace has no elevation data
 */
export function elevationGainM(points: TracePoint[]): number | null {
  let gain = 0;
  let seen = false;
  let previous: number | undefined;

  for (const point of points) {
    if (point.elevation === undefined || !Number.isFinite(point.elevation)) {
      continue;
    }
    seen = true;
    if (previous !== undefined && point.elevation > previous) {
      gain += point.elevation - previous;
    }
    previous = point.elevation;
  }

  return seen ? Math.round(gain * 10) / 10 : null;
}

export function toPosition(point: TracePoint): Position {
  return [point.lng, point.lat];
}

export function boundingBox(coords: Position[]): BoundingBox {
  let minLng = Infinity;
  let minLat = Infinity;
  let maxLng = -Infinity;
  let maxLat = -Infinity;

  for (const [lng, lat] of coords) {
    if (lng < minLng) minLng = lng;
    if (lat < minLat) minLat = lat;
    if (lng > maxLng) maxLng = lng;
    if (lat > maxLat) maxLat = lat;
  }

  return { minLng, minLat, maxLng, maxLat };
}

// ============================================
// Point-to-Segment
// ============================================

export interface SegmentProjection {
  /** Position of the closest point along the segment, 0 at a and 1 at b */
  t: number;
  /** The closest point itself */
  point: Position;
  /** Distance from the input point to the closest point */
  distanceKm: number;
}

/**
 * Project a point onto the FINITE segment a-b.
 *
 * The closest point is clamped to the segment ends; a point beyond b is
 * measured to b, not to the infinite line through a and b.
 */
export function projectOntoSegment(
  p: Position,
  a: Position,
  b: Position,
  mode: DistanceMode
): SegmentProjection {
  const cos = cosLatitude((a[1] + b[1]) / 2);
  const bx = (b[0] - a[0]) * cos;
  const by = b[1] - a[1];
  const px = (p[0] - a[0]) * cos;
  const py = p[1] - a[1];

  const lenSq = bx * bx + by * by;
  const t = lenSq === 0 ? 0 : clamp01((px * bx + py * by) / lenSq);
  const point: Position = [a[0] + t * (b[0] - a[0]), a[1] + t * (b[1] - a[1])];

  return { t, point, distanceKm: segmentLengthKm(p, point, mode) };
}

/**
 * Minimum distance from a point to the finite segment a-b, in km.
 */
export function pointToSegmentDistanceKm(
  p: Position,
  a: Position,
  b: Position,
  mode: DistanceMode
): number {
  return projectOntoSegment(p, a, b, mode).distanceKm;
}

// ============================================
// Segment-to-Segment Overlap
// ============================================

/** Closed range of a segment parameter */
export type ParamRange = [number, number];

export interface SegmentOverlap {
  /** Part of the trace segment p-q lying within tolerance of a-b */
  traceRange: ParamRange;
  /** That part projected onto a-b (0 at a, 1 at b), low end first */
  pathRange: ParamRange;
}

/**
 * Work out which stretch of path segment a-b the trace segment p-q rode.
 *
 * The region within `toleranceKm` of a-b is a capsule (a rectangle along
 * the segment with a half-disc at each end). Its intersection with p-q is
 * a single range of p-q because the capsule is convex. Projecting both ends
 * of that range onto a-b gives the stretch of the path that was ridden.
 *
 * A trace crossing the path at right angles projects to a single point and
 * yields a zero-length stretch.
 *
 * @returns null when no part of p-q comes within tolerance of a-b
 */
export function overlapOnSegment(
  p: Position,
  q: Position,
  a: Position,
  b: Position,
  toleranceKm: number
): SegmentOverlap | null {
  // Local planar frame in km with a at the origin
  const cos = cosLatitude((a[1] + b[1]) / 2);
  const toLocal = (pos: Position): [number, number] => [
    (pos[0] - a[0]) * KM_PER_DEGREE * cos,
    (pos[1] - a[1]) * KM_PER_DEGREE,
  ];

  const [px, py] = toLocal(p);
  const [qx, qy] = toLocal(q);
  const [bx, by] = toLocal(b);
  const dx = qx - px;
  const dy = qy - py;
  const len = Math.sqrt(bx * bx + by * by);

  const pieces: Array<ParamRange | null> = [
    discRange(px, py, dx, dy, 0, 0, toleranceKm),
    discRange(px, py, dx, dy, bx, by, toleranceKm),
  ];

  if (len > 0) {
    const ux = bx / len;
    const uy = by / len;
    // Along-segment and perpendicular coordinates of the moving point
    const along = linearRange(0, len, px * ux + py * uy, dx * ux + dy * uy);
    const across = linearRange(
      -toleranceKm,
      toleranceKm,
      -px * uy + py * ux,
      -dx * uy + dy * ux
    );
    pieces.push(intersectRanges(along, across));
  }

  let lo = Infinity;
  let hi = -Infinity;
  for (const piece of pieces) {
    if (!piece) continue;
    lo = Math.min(lo, piece[0]);
    hi = Math.max(hi, piece[1]);
  }

  lo = Math.max(lo, 0);
  hi = Math.min(hi, 1);
  if (lo > hi) return null;

  if (len === 0) {
    return { traceRange: [lo, hi], pathRange: [0, 0] };
  }

  const project = (v: number): number =>
    clamp01(((px + v * dx) * bx + (py + v * dy) * by) / (len * len));
  const t0 = project(lo);
  const t1 = project(hi);

  return {
    traceRange: [lo, hi],
    pathRange: t0 <= t1 ? [t0, t1] : [t1, t0],
  };
}

/**
 * Values of v for which c0 + v * c1 lies in [min, max].
 */
function linearRange(
  min: number,
  max: number,
  c0: number,
  c1: number
): ParamRange | null {
  if (c1 === 0) {
    return c0 >= min && c0 <= max ? [-Infinity, Infinity] : null;
  }
  const v1 = (min - c0) / c1;
  const v2 = (max - c0) / c1;
  return v1 <= v2 ? [v1, v2] : [v2, v1];
}

/**
 * Values of v for which (px + v*dx, py + v*dy) lies within radius of (cx, cy).
 */
function discRange(
  px: number,
  py: number,
  dx: number,
  dy: number,
  cx: number,
  cy: number,
  radius: number
): ParamRange | null {
  const ox = px - cx;
  const oy = py - cy;
  const a = dx * dx + dy * dy;
  const b = 2 * (dx * ox + dy * oy);
  const c = ox * ox + oy * oy - radius * radius;

  if (a === 0) {
    return c <= 0 ? [-Infinity, Infinity] : null;
  }

  const discriminant = b * b - 4 * a * c;
  if (discriminant < 0) return null;

  const root = Math.sqrt(discriminant);
  return [(-b - root) / (2 * a), (-b + root) / (2 * a)];
}

function intersectRanges(
  x: ParamRange | null,
  y: ParamRange | null
): ParamRange | null {
  if (!x || !y) return null;
  const lo = Math.max(x[0], y[0]);
  const hi = Math.min(x[1], y[1]);
  return lo <= hi ? [lo, hi] : null;
}

function clamp01(value: number): number {
  return value < 0 ? 0 : value > 1 ? 1 : value;
}

// ============================================
// Validation
// ============================================

/**
 * Check positions are usable coordinates.
 *
 * @returns Human-readable problems, empty when every position is valid
 */
export function validatePositions(coords: Position[], label = "Point"): string[] {
  const problems: string[] = [];

  coords.forEach((position, i) => {
    if (!Array.isArray(position) || position.length < 2) {
      problems.push(`${label} ${i} is not a [lng, lat] pair`);
      return;
    }
    const [lng, lat] = position;
    if (!Number.isFinite(lng) || !Number.isFinite(lat)) {
      problems.push(`${label} ${i} has non-numeric coordinates`);
    } else if (lat < -90 || lat > 90 || lng < -180 || lng > 180) {
      problems.push(`${label} ${i} is out of range (${lng}, ${lat})`);
    }
  });

  return problems;
}
