/**
 * Coverage Store
 * Persistence collaborator for the coverage engine
 *
 * The engine owns all coverage logic; a store only has to durably keep
 * paths (static attributes plus their current coverage fields) and rides,
 * and hand them back on start-up.
 *
 * Each engine trigger produces exactly one CoverageChange. A store must
 * apply a change atomically: either all of it is persisted or none of it,
 * so the engine can commit its in-memory state only after `apply` resolves.
 *
 * Per-(ride, path) contributions are not stored. They are re-derived by
 * re-matching the live rides when the engine loads.
 */

import type {
  PathCoverage,
  PathRecord,
  PathState,
  RideRecord,
} from "../engine/types.js";

// ============================================
// Types
// ============================================

export interface CoverageSnapshot {
  paths: PathState[];
  rides: RideRecord[];
}

export interface CoverageChange {
  /** New paths; with `replace` they become the whole network */
  network?: { replace: boolean; paths: PathRecord[] };
  addedRide?: RideRecord;
  removedRideId?: string;
  /** Coverage fields for every path whose coverage changed */
  coverage: Array<{ pathId: string; coverage: PathCoverage }>;
}

export interface CoverageStore {
  /** Human-readable store kind for logs and /health */
  readonly kind: string;
  load(): Promise<CoverageSnapshot>;
  apply(change: CoverageChange): Promise<void>;
  close(): Promise<void>;
}

/**
 * Error thrown when persisting or loading fails.
 * The engine leaves its committed state untouched when apply() throws.
 */
export class CoverageStoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CoverageStoreError";
  }
}

// ============================================
// In-Memory Store
// ============================================

/**
 * Store kept in process memory.
 *
 * Used when no DATABASE_URL is configured, and by tests. State does not
 * survive a restart of the process, but does survive re-creating the
 * engine from the same store instance.
 */
export class MemoryCoverageStore implements CoverageStore {
  readonly kind = "memory";
  private paths = new Map<string, PathState>();
  private rides = new Map<string, RideRecord>();
  /** Number of changes applied, for tests and diagnostics */
  changeCount = 0;

  async load(): Promise<CoverageSnapshot> {
    return {
      paths: [...this.paths.values()].map((p) => ({ ...p })),
      rides: [...this.rides.values()].map((r) => ({ ...r, points: [...r.points] })),
    };
  }

  async apply(change: CoverageChange): Promise<void> {
    // Work on copies so a rejected change leaves the store untouched
    const paths = new Map(this.paths);
    const rides = new Map(this.rides);

    if (change.network) {
      if (change.network.replace) {
        paths.clear();
      }
      for (const path of change.network.paths) {
        paths.set(path.id, {
          ...path,
          isRidden: false,
          coverageFraction: 0,
          riddenLengthKm: 0,
          lastRiddenDate: null,
          lastRideId: null,
        });
      }
    }

    if (change.addedRide) {
      rides.set(change.addedRide.id, change.addedRide);
    }
    if (change.removedRideId) {
      rides.delete(change.removedRideId);
    }

    for (const { pathId, coverage } of change.coverage) {
      const path = paths.get(pathId);
      if (!path) {
        throw new CoverageStoreError(`Coverage update for unknown path ${pathId}`);
      }
      paths.set(pathId, { ...path, ...coverage });
    }

    this.paths = paths;
    this.rides = rides;
    this.changeCount++;
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
