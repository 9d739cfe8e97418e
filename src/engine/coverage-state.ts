/**
 * Committed coverage state for one path network.
 *
 * Owned by a CoverageEngine and only ever changed through `apply()`, which
 * takes a CoverageUpdate computed against this state beforehand. Until
 * `apply()` runs, readers keep seeing the previous state in full.
 */

import type {
  CoverageInterval,
  PathCoverage,
  PathRecord,
  PathState,
  RideRecord,
} from "./types.js";
import { EMPTY_COVERAGE } from "./modules/coverage-aggregator.js";
import { cloneGeometry } from "./modules/geometry.js";
import type { PathSpatialIndex } from "./modules/spatial-index.js";

/** rideId -> that ride's merged intervals on one path */
export type PathContributions = Map<string, CoverageInterval[]>;

export interface CoverageUpdate {
  /** A new network: replaces paths, index and every contribution */
  network?: { paths: Map<string, PathRecord>; index: PathSpatialIndex };
  addedRide?: RideRecord;
  removedRideId?: string;
  /** Complete contribution set for each listed path; empty clears it */
  contributions: Map<string, PathContributions>;
  /** New coverage for each listed path */
  coverage: Map<string, PathCoverage>;
}

export class CoverageState {
  paths = new Map<string, PathRecord>();
  index: PathSpatialIndex | null = null;
  networkLoaded = false;

  readonly rides = new Map<string, RideRecord>();
  /** fingerprint -> rideId, live rides only */
  readonly fingerprints = new Map<string, string>();

  private coverage = new Map<string, PathCoverage>();
  /** pathId -> contributions from live rides */
  private contributions = new Map<string, PathContributions>();
  /** rideId -> paths it contributes to */
  private ridePaths = new Map<string, Set<string>>();
  private lastUploadSeq = 0;

  nextUploadSeq(): number {
    return this.lastUploadSeq + 1;
  }

  getCoverage(pathId: string): PathCoverage {
    return this.coverage.get(pathId) ?? EMPTY_COVERAGE;
  }

  getPathState(pathId: string): PathState | null {
    const path = this.paths.get(pathId);
    return path ? this.toPathState(path) : null;
  }

  allPathStates(): PathState[] {
    return [...this.paths.values()].map((path) => this.toPathState(path));
  }

  /** Committed geometry stays private; readers get their own copy */
  private toPathState(path: PathRecord): PathState {
    return {
      ...path,
      geometry: cloneGeometry(path.geometry),
      ...this.getCoverage(path.id),
    };
  }

  /** Copy of the live contributions to a path */
  contributionsFor(pathId: string): PathContributions {
    return new Map(this.contributions.get(pathId) ?? []);
  }

  pathsTouchedBy(rideId: string): string[] {
    return [...(this.ridePaths.get(rideId) ?? [])].sort();
  }

  apply(update: CoverageUpdate): void {
    if (update.network) {
      this.paths = update.network.paths;
      this.index = update.network.index;
      this.networkLoaded = true;
      this.coverage = new Map();
      this.contributions = new Map();
      this.ridePaths = new Map();
    }

    if (update.addedRide) {
      const ride = update.addedRide;
      this.rides.set(ride.id, ride);
      this.fingerprints.set(ride.fingerprint, ride.id);
      this.lastUploadSeq = Math.max(this.lastUploadSeq, ride.uploadSeq);
    }

    if (update.removedRideId) {
      const ride = this.rides.get(update.removedRideId);
      if (ride) {
        this.rides.delete(ride.id);
        this.fingerprints.delete(ride.fingerprint);
      }
    }

    for (const [pathId, next] of update.contributions) {
      for (const rideId of this.contributions.get(pathId)?.keys() ?? []) {
        this.ridePaths.get(rideId)?.delete(pathId);
      }

      if (next.size === 0) {
        this.contributions.delete(pathId);
        continue;
      }

      this.contributions.set(pathId, next);
      for (const rideId of next.keys()) {
        let touched = this.ridePaths.get(rideId);
        if (!touched) {
          touched = new Set();
          this.ridePaths.set(rideId, touched);
        }
        touched.add(pathId);
      }
    }

    if (update.removedRideId) {
      this.ridePaths.delete(update.removedRideId);
    }

    for (const [pathId, coverage] of update.coverage) {
      if (coverage.coverageFraction === 0 && coverage.lastRideId === null) {
        this.coverage.delete(pathId);
      } else {
        this.coverage.set(pathId, coverage);
      }
    }
  }
}
