/**
 * Trace-to-network matcher.
 *
 * Walks a trace segment by segment. For each trace segment, the spatial
 * index supplies nearby path segments; the part of the trace segment that
 * lies within tolerance of a path segment is projected onto it and the
 * resulting stretch of path is recorded as ridden.
 *
 * Nothing is credited between the last fix of one recorded segment and the
 * first fix of the next, however close they are.
 *
 * Stretches are kept as arc-length intervals along each path and unioned,
 * so riding the same stretch twice (out-and-back, laps) adds nothing.
 */

import type {
  CoverageInterval,
  DistanceMode,
  RideContribution,
  TracePoint,
} from "../types.js";
import { overlapOnSegment, segmentLengthKm, toPosition } from "./geometry.js";
import type { PathSpatialIndex } from "./spatial-index.js";
import { intervalsLength, unionIntervals } from "./coverage-aggregator.js";

export interface MatchingOptions {
  toleranceKm: number;
  maxTraceGapKm: number;
  minContributionKm: number;
  distanceMode: DistanceMode;
}

/** A contribution before it is attributed to a stored ride */
export type PathMatch = Omit<RideContribution, "rideId">;

/** Hits shorter than this (km) are perpendicular crossings, not riding */
const MIN_HIT_KM = 1e-9;

/**
 * Match one trace against the indexed network.
 *
 * @returns One entry per path ridden, sorted by path id
 */
export function matchRide(
  points: TracePoint[],
  index: PathSpatialIndex,
  options: MatchingOptions
): PathMatch[] {
  if (points.length < 2) return [];

  const hits = new Map<string, CoverageInterval[]>();

  for (let i = 1; i < points.length; i++) {
    // The device stopped recording between these two fixes
    if (points[i].segmentStart) continue;

    const p = toPosition(points[i - 1]);
    const q = toPosition(points[i]);

    // Recording break: nothing between these two fixes is known to be ridden
    if (segmentLengthKm(p, q, options.distanceMode) > options.maxTraceGapKm) {
      continue;
    }

    for (const seg of index.segmentsNearSegment(p, q, options.toleranceKm)) {
      const overlap = overlapOnSegment(p, q, seg.start, seg.end, options.toleranceKm);
      if (!overlap) continue;

      const [t0, t1] = overlap.pathRange;
      const start = seg.offsetKm + t0 * seg.lengthKm;
      const end = seg.offsetKm + t1 * seg.lengthKm;
      if (end - start < MIN_HIT_KM) continue;

      let list = hits.get(seg.pathId);
      if (!list) {
        list = [];
        hits.set(seg.pathId, list);
      }
      list.push([start, end]);
    }
  }

  const matches: PathMatch[] = [];
  for (const [pathId, intervals] of hits) {
    const merged = unionIntervals(intervals);
    const coveredKm = intervalsLength(merged);
    if (coveredKm < options.minContributionKm) continue;
    matches.push({ pathId, intervals: merged, coveredKm });
  }

  return matches.sort((a, b) => (a.pathId < b.pathId ? -1 : a.pathId > b.pathId ? 1 : 0));
}
