/**
 * Coverage Aggregator
 *
 * Turns the per-ride contributions touching a path into that path's
 * coverage fields.
 *
 * Coverage is always the UNION of every live ride's intervals along the
 * path, never a sum: two rides over the same stretch count it once. A
 * path's coverage is therefore recomputed from the full set of its live
 * contributions rather than patched, which keeps deletion exact.
 *
 * Intervals are [startKm, endKm] along the path from its first vertex.
 */

import type {
  CoverageInterval,
  PathCoverage,
  PathRecord,
  RideRecord,
} from "../types.js";

/** Intervals closer than this (km, ~1mm) are treated as touching */
export const INTERVAL_EPSILON_KM = 1e-6;

/** Pre-clamp fractions within this of [0, 1] are float slop, not defects */
const FRACTION_SLOP = 1e-6;

export const EMPTY_COVERAGE: PathCoverage = {
  isRidden: false,
  coverageFraction: 0,
  riddenLengthKm: 0,
  lastRiddenDate: null,
  lastRideId: null,
};

// ============================================
// Interval Arithmetic
// ============================================

/**
 * Merge a new interval into a set of existing intervals.
 *
 * Overlapping or touching intervals are combined. The result is sorted by
 * start position and non-overlapping.
 *
 * @example
 * mergeIntervals([[0, 1.5]], [1.2, 3]) // [[0, 3]]
 * mergeIntervals([[0, 1]], [2, 3])     // [[0, 1], [2, 3]]
 */
export function mergeIntervals(
  existing: CoverageInterval[],
  newInterval: CoverageInterval
): CoverageInterval[] {
  return unionIntervals([...existing, newInterval]);
}

/**
 * Union of any number of intervals, sorted and non-overlapping.
 * Reversed intervals are normalised so start <= end.
 */
export function unionIntervals(intervals: CoverageInterval[]): CoverageInterval[] {
  const all = intervals
    .map(([a, b]): CoverageInterval => (a <= b ? [a, b] : [b, a]))
    .sort((x, y) => x[0] - y[0]);
  const merged: CoverageInterval[] = [];

  for (const interval of all) {
    const last = merged[merged.length - 1];

    if (last && interval[0] <= last[1] + INTERVAL_EPSILON_KM) {
      last[1] = Math.max(last[1], interval[1]);
    } else {
      merged.push([interval[0], interval[1]]);
    }
  }

  return merged;
}

/** Total length covered by already-merged intervals */
export function intervalsLength(intervals: CoverageInterval[]): number {
  return intervals.reduce((sum, [start, end]) => sum + (end - start), 0);
}

// ============================================
// Per-Path Coverage
// ============================================

/** Ride fields the aggregator needs to pick the last ridden date */
export type RideDating = Pick<RideRecord, "id" | "dateRecorded" | "uploadSeq">;

/**
 * Compute a path's coverage fields from every live contribution to it.
 *
 * - coverageFraction = |union of intervals| / path length, clamped to [0, 1]
 * - lastRiddenDate = latest known recording date among contributing rides;
 *   rides with no date are excluded from the comparison
 * - lastRideId = the ride holding that date; equal dates, and paths whose
 *   rides all lack a date, resolve to the most recent upload
 *
 * @param contributions - rideId -> that ride's merged intervals on this path
 * @param rides - Lookup for the contributing rides
 */
export function computePathCoverage(
  path: Pick<PathRecord, "id" | "lengthKm">,
  contributions: ReadonlyMap<string, CoverageInterval[]>,
  rides: ReadonlyMap<string, RideDating>
): PathCoverage {
  if (contributions.size === 0 || path.lengthKm <= 0) {
    return { ...EMPTY_COVERAGE };
  }

  const union = unionIntervals([...contributions.values()].flat());
  const coveredKm = intervalsLength(union);
  // A shortfall under the merge epsilon is float error at the path ends
  const rawFraction =
    Math.abs(path.lengthKm - coveredKm) < INTERVAL_EPSILON_KM
      ? 1
      : coveredKm / path.lengthKm;
  const coverageFraction = clampFraction(path.id, rawFraction);

  let latest: RideDating | null = null;
  for (const rideId of contributions.keys()) {
    const ride = rides.get(rideId);
    if (!ride) {
      console.error(
        `[Coverage] Path ${path.id} has a contribution from unknown ride ${rideId}`
      );
      continue;
    }
    if (!latest || isLater(ride, latest)) {
      latest = ride;
    }
  }

  return {
    isRidden: coverageFraction > 0,
    coverageFraction,
    riddenLengthKm: coverageFraction * path.lengthKm,
    lastRiddenDate: latest?.dateRecorded ?? null,
    lastRideId: latest?.id ?? null,
  };
}

/**
 * Whether `candidate` should replace `current` as the path's last ride.
 * A known date always beats an unknown one.
 */
function isLater(candidate: RideDating, current: RideDating): boolean {
  const a = candidate.dateRecorded?.getTime() ?? null;
  const b = current.dateRecorded?.getTime() ?? null;

  if (a !== null && b === null) return true;
  if (a === null && b !== null) return false;
  if (a !== null && b !== null && a !== b) return a > b;
  return candidate.uploadSeq > current.uploadSeq;
}

function clampFraction(pathId: string, fraction: number): number {
  if (!Number.isFinite(fraction)) {
    console.error(`[Coverage] Path ${pathId} coverage is not a number; reset to 0`);
    return 0;
  }
  if (fraction < -FRACTION_SLOP || fraction > 1 + FRACTION_SLOP) {
    console.error(
      `[Coverage] Path ${pathId} coverage ${fraction} outside [0, 1]; clamped`
    );
  }
  return Math.min(1, Math.max(0, fraction));
}

/** Compare two coverage records field by field */
export function sameCoverage(a: PathCoverage, b: PathCoverage): boolean {
  return (
    a.isRidden === b.isRidden &&
    a.coverageFraction === b.coverageFraction &&
    a.riddenLengthKm === b.riddenLengthKm &&
    a.lastRideId === b.lastRideId &&
    (a.lastRiddenDate?.getTime() ?? null) === (b.lastRiddenDate?.getTime() ?? null)
  );
}
