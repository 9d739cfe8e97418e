/**
 * Coverage Engine
 * Recomputation controller for path coverage
 *
 * Orchestrates matching, aggregation and persistence on three triggers:
 *
 * 1. Ride added: validate, fingerprint, reject duplicates, match against
 *    the network, recompute coverage for the touched paths only
 * 2. Ride deleted: recompute the paths that ride had touched from the
 *    contributions of the remaining rides
 * 3. Network imported: build the new network and index, then re-match every
 *    live ride from scratch
 *
 * Every trigger runs under a single-writer lock and follows the same shape:
 * compute a CoverageUpdate from the committed state, persist it through the
 * store, then commit it. A failed store write leaves the committed state as
 * it was. Reads never wait for the lock and always see committed state.
 *
 * Matching is deterministic, so the cached per-(ride, path) contributions
 * equal what re-matching would produce. State after any sequence of
 * triggers equals matching every live ride against the network from empty.
 */

import { randomUUID } from "node:crypto";
import {
  CoverageStoreError,
  type CoverageChange,
  type CoverageStore,
} from "../services/coverage-store.service.js";
import { resolveCoverageConfig } from "./config.js";
import { CoverageLock } from "./coverage-lock.js";
import {
  CoverageState,
  type CoverageUpdate,
  type PathContributions,
} from "./coverage-state.js";
import {
  MalformedGeometryError,
  NetworkNotLoadedError,
  UnknownPathError,
  UnknownRideError,
} from "./errors.js";
import {
  EMPTY_COVERAGE,
  computePathCoverage,
  sameCoverage,
  type RideDating,
} from "./modules/coverage-aggregator.js";
import { computeRideFingerprint } from "./modules/fingerprint.js";
import {
  cloneGeometry,
  elevationGainM,
  geometryParts,
  pathLengthKm,
  traceDistanceKm,
  validatePositions,
} from "./modules/geometry.js";
import { matchRide, type MatchingOptions, type PathMatch } from "./modules/ride-matcher.js";
import { PathSpatialIndex } from "./modules/spatial-index.js";
import { buildStatistics } from "./modules/statistics.js";
import type {
  BatchRideOutcome,
  CoverageConfig,
  ImportNetworkOptions,
  NetworkImportResult,
  PathCoverage,
  PathFilters,
  PathInput,
  PathRecord,
  PathRejection,
  PathState,
  RideDeleteResult,
  RideInput,
  RideRecord,
  RideResult,
  RideSummary,
  StatsSummary,
  TracePoint,
} from "./types.js";
import { ERROR_CODES } from "../config/constants.js";

export class CoverageEngine {
  readonly config: CoverageConfig;
  private readonly state = new CoverageState();
  private readonly lock = new CoverageLock();

  constructor(
    private readonly store: CoverageStore,
    config: Partial<CoverageConfig> = {}
  ) {
    this.config = resolveCoverageConfig(config);
  }

  /**
   * Create an engine from everything the store holds.
   *
   * Contributions are not persisted, so every stored ride is re-matched.
   * Stored coverage that disagrees with the recomputed value is corrected
   * in the store.
   */
  static async load(
    store: CoverageStore,
    config: Partial<CoverageConfig> = {}
  ): Promise<CoverageEngine> {
    const engine = new CoverageEngine(store, config);
    await engine.restore();
    return engine;
  }

  // ============================================
  // Reads
  // ============================================

  isNetworkLoaded(): boolean {
    return this.state.networkLoaded;
  }

  /**
   * Paths with their coverage fields, optionally filtered.
   *
   * @throws NetworkNotLoadedError before the first network import
   */
  getPathState(filters: PathFilters = {}): PathState[] {
    this.requireNetwork();

    const areas = toFilterSet(filters.area);
    const types = toFilterSet(filters.pathType);

    return this.state
      .allPathStates()
      .filter((path) => {
        if (areas && !areas.has(path.area ?? "")) return false;
        if (types && !types.has(path.pathType ?? "")) return false;
        if (filters.ridden !== undefined && path.isRidden !== filters.ridden) {
          return false;
        }
        if (
          filters.minCoverage !== undefined &&
          path.coverageFraction < filters.minCoverage
        ) {
          return false;
        }
        return true;
      })
      .sort((a, b) => compareIds(a.id, b.id));
  }

  /**
   * @throws NetworkNotLoadedError before the first network import
   * @throws UnknownPathError when no path has this id
   */
  getPath(pathId: string): PathState {
    this.requireNetwork();
    const path = this.state.getPathState(pathId);
    if (!path) throw new UnknownPathError(pathId);
    return path;
  }

  /**
   * @throws NetworkNotLoadedError before the first network import
   */
  getStatistics(): StatsSummary {
    this.requireNetwork();
    return buildStatistics(this.state.allPathStates());
  }

  /** Distinct non-empty areas, sorted */
  listAreas(): string[] {
    return distinctSorted([...this.state.paths.values()].map((p) => p.area));
  }

  /** Distinct non-empty path types, sorted */
  listPathTypes(): string[] {
    return distinctSorted([...this.state.paths.values()].map((p) => p.pathType));
  }

  /** Live rides, most recent upload first */
  listRides(): RideSummary[] {
    return [...this.state.rides.values()]
      .sort((a, b) => b.uploadSeq - a.uploadSeq)
      .map(toRideSummary);
  }

  /**
   * @throws UnknownRideError when no live ride has this id
   */
  getRide(rideId: string): RideRecord {
    const ride = this.state.rides.get(rideId);
    if (!ride) throw new UnknownRideError(rideId);
    return ride;
  }

  /** Paths a live ride contributes coverage to */
  getRidePaths(rideId: string): string[] {
    if (!this.state.rides.has(rideId)) throw new UnknownRideError(rideId);
    return this.state.pathsTouchedBy(rideId);
  }

  get rideCount(): number {
    return this.state.rides.size;
  }

  get pathCount(): number {
    return this.state.paths.size;
  }

  get storeKind(): string {
    return this.store.kind;
  }

  // ============================================
  // Triggers
  // ============================================

  /**
   * Add one ride.
   *
   * Malformed geometry is reported as `rejected`, never thrown. A ride whose
   * fingerprint matches a live ride is reported as `duplicate` and leaves
   * every piece of state untouched.
   *
   * @throws CoverageStoreError when the store cannot persist the ride
   */
  async addRide(input: RideInput): Promise<RideResult> {
    return this.lock.runExclusive<RideResult>(async () => {
      let points: TracePoint[];
      try {
        points = normalizeTrace(input.points);
      } catch (error) {
        if (error instanceof MalformedGeometryError) {
          console.warn(`[Rides] Rejected ${input.filename}: ${error.message}`);
          return { status: "rejected", code: error.code, reason: error.message };
        }
        throw error;
      }

      const fingerprint = computeRideFingerprint(
        points,
        this.config.fingerprintPrecision
      );
      const existingRideId = this.state.fingerprints.get(fingerprint);
      if (existingRideId) {
        console.log(
          `[Rides] ${input.filename} duplicates ride ${existingRideId}, skipped`
        );
        return { status: "duplicate", existingRideId, fingerprint };
      }

      const ride = this.buildRide(input, points, fingerprint);
      const matches = this.state.index
        ? matchRide(points, this.state.index, this.matchingOptions())
        : [];

      const update = this.planAddRide(ride, matches);
      const pathsChanged = this.changedPaths(update);
      await this.persist(update, pathsChanged);
      this.state.apply(update);

      console.log(
        `[Rides] Added ${ride.filename} (${ride.id}): ${ride.distanceKm.toFixed(2)} km, ` +
          `${matches.length} paths touched, ${pathsChanged.length} changed`
      );
      return { status: "created", ride: toRideSummary(ride), pathsChanged };
    });
  }

  /**
   * Add rides one at a time, reporting an outcome per ride. A failure on one
   * ride is reported for that ride (STORE_ERROR when the store refused it,
   * INTERNAL_ERROR otherwise) and the batch carries on.
   */
  async addRides(inputs: RideInput[]): Promise<BatchRideOutcome[]> {
    const outcomes: BatchRideOutcome[] = [];

    for (const input of inputs) {
      try {
        const result = await this.addRide(input);
        outcomes.push({ ...result, filename: input.filename });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[Rides] Failed to add ${input.filename}:`, error);
        outcomes.push({
          status: "rejected",
          code:
            error instanceof CoverageStoreError
              ? ERROR_CODES.STORE_ERROR
              : ERROR_CODES.INTERNAL_ERROR,
          reason,
          filename: input.filename,
        });
      }
    }

    return outcomes;
  }

  /**
   * Delete a ride and recompute every path it had touched.
   *
   * @throws CoverageStoreError when the store cannot persist the deletion
   */
  async deleteRide(rideId: string): Promise<RideDeleteResult> {
    return this.lock.runExclusive<RideDeleteResult>(async () => {
      if (!this.state.rides.has(rideId)) {
        return { status: "not_found", rideId };
      }

      const update = this.planDeleteRide(rideId);
      const pathsChanged = this.changedPaths(update);
      await this.persist(update, pathsChanged);
      this.state.apply(update);

      console.log(
        `[Rides] Deleted ride ${rideId}: ${pathsChanged.length} paths changed`
      );
      return { status: "ok", rideId, pathsChanged };
    });
  }

  /**
   * Import a path network.
   *
   * Each path is validated on its own; bad paths are reported in `rejected`
   * and the rest are imported. With `replace` the new paths become the whole
   * network, otherwise they extend it and ids already present are rejected.
   * Every live ride is then re-matched against the resulting network.
   *
   * @throws CoverageStoreError when the store cannot persist the import
   */
  async importNetwork(
    inputs: PathInput[],
    options: ImportNetworkOptions = {}
  ): Promise<NetworkImportResult> {
    const replace = options.replace ?? false;

    return this.lock.runExclusive(async () => {
      const paths = replace
        ? new Map<string, PathRecord>()
        : new Map(this.state.paths);
      const added: PathRecord[] = [];
      const rejected: PathRejection[] = [];

      inputs.forEach((input, index) => {
        try {
          const record = this.buildPath(input);
          if (paths.has(record.id)) {
            rejected.push({
              index,
              sourceFid: record.sourceFid,
              code: ERROR_CODES.DUPLICATE_PATH,
              reason: `Path ${record.id} already exists in the network`,
            });
            return;
          }
          paths.set(record.id, record);
          added.push(record);
        } catch (error) {
          if (!(error instanceof MalformedGeometryError)) throw error;
          rejected.push({
            index,
            sourceFid: typeof input.sourceFid === "string" ? input.sourceFid : null,
            code: error.code,
            reason: error.message,
          });
        }
      });

      const index = new PathSpatialIndex(
        paths.values(),
        this.config.gridCellKm,
        this.config.distanceMode
      );
      const update = this.planNetwork(paths, index);
      const pathsChanged = this.changedPaths(update);

      // The store writes imported paths with empty coverage, so anything
      // else has to be sent even when it matches the committed value.
      const addedIds = new Set(added.map((path) => path.id));
      const storedCoverage = [...update.coverage]
        .filter(([pathId, coverage]) => {
          const baseline =
            replace || addedIds.has(pathId)
              ? EMPTY_COVERAGE
              : this.state.getCoverage(pathId);
          return !sameCoverage(coverage, baseline);
        })
        .map(([pathId, coverage]) => ({ pathId, coverage }));

      await this.persistChange({
        network: { replace, paths: added },
        coverage: storedCoverage,
      });
      this.state.apply(update);

      if (rejected.length > 0) {
        console.warn(`[Import] Rejected ${rejected.length} of ${inputs.length} paths`);
      }
      console.log(
        `[Import] ${replace ? "Replaced" : "Extended"} network: ${added.length} imported, ` +
          `${paths.size} total, ${this.state.rides.size} rides re-matched`
      );

      return {
        imported: added.length,
        rejected,
        totalPaths: paths.size,
        pathsChanged,
        ridesRematched: this.state.rides.size,
      };
    });
  }

  // ============================================
  // Planning
  // ============================================

  private planAddRide(ride: RideRecord, matches: PathMatch[]): CoverageUpdate {
    const rides = new Map<string, RideDating>(this.state.rides);
    rides.set(ride.id, ride);

    const contributions = new Map<string, PathContributions>();
    const coverage = new Map<string, PathCoverage>();

    for (const match of matches) {
      const path = this.state.paths.get(match.pathId);
      if (!path) continue;

      const next = this.state.contributionsFor(match.pathId);
      next.set(ride.id, match.intervals);
      contributions.set(match.pathId, next);
      coverage.set(match.pathId, computePathCoverage(path, next, rides));
    }

    return { addedRide: ride, contributions, coverage };
  }

  private planDeleteRide(rideId: string): CoverageUpdate {
    const rides = new Map<string, RideDating>(this.state.rides);
    rides.delete(rideId);

    const contributions = new Map<string, PathContributions>();
    const coverage = new Map<string, PathCoverage>();

    for (const pathId of this.state.pathsTouchedBy(rideId)) {
      const path = this.state.paths.get(pathId);
      if (!path) continue;

      const next = this.state.contributionsFor(pathId);
      next.delete(rideId);
      contributions.set(pathId, next);
      coverage.set(pathId, computePathCoverage(path, next, rides));
    }

    return { removedRideId: rideId, contributions, coverage };
  }

  /**
   * Re-match every live ride against a new network. Rides are independent
   * of each other; their matches are merged per path afterwards.
   */
  private planNetwork(
    paths: Map<string, PathRecord>,
    index: PathSpatialIndex
  ): CoverageUpdate {
    const options = this.matchingOptions();
    const contributions = new Map<string, PathContributions>();

    const rides = [...this.state.rides.values()].sort(
      (a, b) => a.uploadSeq - b.uploadSeq
    );
    for (const ride of rides) {
      for (const match of matchRide(ride.points, index, options)) {
        let byRide = contributions.get(match.pathId);
        if (!byRide) {
          byRide = new Map();
          contributions.set(match.pathId, byRide);
        }
        byRide.set(ride.id, match.intervals);
      }
    }

    const coverage = new Map<string, PathCoverage>();
    for (const path of paths.values()) {
      coverage.set(
        path.id,
        computePathCoverage(path, contributions.get(path.id) ?? new Map(), this.state.rides)
      );
    }

    return { network: { paths, index }, contributions, coverage };
  }

  /**
   * Paths whose coverage differs from the committed state, sorted by id.
   * A path new to the network counts as changed only if it gained coverage.
   */
  private changedPaths(update: CoverageUpdate): string[] {
    const changed: string[] = [];
    for (const [pathId, coverage] of update.coverage) {
      if (!sameCoverage(coverage, this.state.getCoverage(pathId))) {
        changed.push(pathId);
      }
    }
    return changed.sort(compareIds);
  }

  // ============================================
  // Persistence
  // ============================================

  private async persist(update: CoverageUpdate, pathsChanged: string[]): Promise<void> {
    await this.persistChange({
      addedRide: update.addedRide,
      removedRideId: update.removedRideId,
      coverage: pathsChanged.map((pathId) => ({
        pathId,
        coverage: update.coverage.get(pathId) ?? this.state.getCoverage(pathId),
      })),
    });
  }

  private async persistChange(change: CoverageChange): Promise<void> {
    try {
      await this.store.apply(change);
    } catch (error) {
      console.error(`[Store] Failed to persist change to ${this.store.kind} store:`, error);
      throw error;
    }
  }

  /**
   * Rebuild state from the store: network and index first, then rides in
   * upload order, then one full re-match.
   */
  private async restore(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const snapshot = await this.store.load();

      for (const ride of [...snapshot.rides].sort((a, b) => a.uploadSeq - b.uploadSeq)) {
        this.state.apply({
          addedRide: ride,
          contributions: new Map(),
          coverage: new Map(),
        });
      }

      if (snapshot.paths.length === 0) {
        console.log(
          `[Engine] Loaded ${snapshot.rides.length} rides from ${this.store.kind} store, no network yet`
        );
        return;
      }

      const paths = new Map<string, PathRecord>();
      const stored = new Map<string, PathCoverage>();
      for (const path of snapshot.paths) {
        const {
          isRidden,
          coverageFraction,
          riddenLengthKm,
          lastRiddenDate,
          lastRideId,
          ...record
        } = path;
        paths.set(record.id, { ...record, geometry: cloneGeometry(record.geometry) });
        stored.set(record.id, {
          isRidden,
          coverageFraction,
          riddenLengthKm,
          lastRiddenDate,
          lastRideId,
        });
      }

      const index = new PathSpatialIndex(
        paths.values(),
        this.config.gridCellKm,
        this.config.distanceMode
      );
      const update = this.planNetwork(paths, index);

      const corrections = [...update.coverage]
        .filter(([pathId, coverage]) => {
          const previous = stored.get(pathId);
          return !previous || !sameCoverage(previous, coverage);
        })
        .map(([pathId, coverage]) => ({ pathId, coverage }));

      if (corrections.length > 0) {
        console.warn(
          `[Engine] Stored coverage differed from recomputed for ${corrections.length} paths, correcting`
        );
        await this.persistChange({ coverage: corrections });
      }

      this.state.apply(update);
      console.log(
        `[Engine] Loaded ${paths.size} paths and ${snapshot.rides.length} rides from ${this.store.kind} store`
      );
    });
  }

  // ============================================
  // Validation & Construction
  // ============================================

  private matchingOptions(): MatchingOptions {
    return {
      toleranceKm: this.config.toleranceKm,
      maxTraceGapKm: this.config.maxTraceGapKm,
      minContributionKm: this.config.minContributionKm,
      distanceMode: this.config.distanceMode,
    };
  }

  private buildRide(
    input: RideInput,
    points: TracePoint[],
    fingerprint: string
  ): RideRecord {
    const firstTimestamp = points.find((p) => p.timestamp)?.timestamp ?? null;
    const dateRecorded = isValidDate(input.dateRecorded)
      ? input.dateRecorded
      : firstTimestamp;

    return {
      id: randomUUID(),
      fingerprint,
      filename: input.filename,
      name: input.name ?? null,
      dateRecorded,
      uploadedAt: new Date(),
      uploadSeq: this.state.nextUploadSeq(),
      distanceKm: traceDistanceKm(points, this.config.distanceMode),
      elevationGainM: elevationGainM(points),
      pointCount: points.length,
      points,
    };
  }

  /**
   * @throws MalformedGeometryError when the geometry is empty, has bad
   *         coordinates or has no length
   */
  private buildPath(input: PathInput): PathRecord {
    const sourceFid = typeof input.sourceFid === "string" ? input.sourceFid.trim() : "";
    if (sourceFid === "") {
      throw new MalformedGeometryError("Path has no source identifier");
    }

    const parts = geometryParts(input.geometry);
    if (parts.length === 0) {
      throw new MalformedGeometryError(`Path ${sourceFid} has no coordinates`);
    }
    for (const [i, part] of parts.entries()) {
      if (part.length < 2) {
        throw new MalformedGeometryError(
          `Path ${sourceFid} part ${i} has fewer than two positions`
        );
      }
      const problems = validatePositions(part, "Position");
      if (problems.length > 0) {
        throw new MalformedGeometryError(`Path ${sourceFid}: ${problems[0]}`);
      }
    }

    const geometry = cloneGeometry(input.geometry);
    const lengthKm = pathLengthKm(geometry, this.config.distanceMode);
    if (!(lengthKm > 0)) {
      throw new MalformedGeometryError(`Path ${sourceFid} has zero length`);
    }

    return {
      id: sourceFid,
      sourceFid,
      routeCode: input.routeCode ?? null,
      name: input.name ?? null,
      pathType: input.pathType ?? null,
      area: input.area ?? null,
      geometry,
      lengthKm,
    };
  }

  private requireNetwork(): void {
    if (!this.state.networkLoaded) throw new NetworkNotLoadedError();
  }
}

// ============================================
// Helpers
// ============================================

/**
 * Validate trace points and drop unusable timestamps.
 *
 * @throws MalformedGeometryError when there are no points or any point has
 *         non-finite or out-of-range coordinates
 */
function normalizeTrace(points: TracePoint[]): TracePoint[] {
  if (points.length === 0) {
    throw new MalformedGeometryError("Ride has no track points");
  }

  const problems = validatePositions(points.map((p) => [p.lng, p.lat]));
  if (problems.length > 0) {
    const more = problems.length > 1 ? ` (and ${problems.length - 1} more)` : "";
    throw new MalformedGeometryError(`${problems[0]}${more}`);
  }

  return points.map((p, i) => {
    const point: TracePoint = { lat: p.lat, lng: p.lng };
    if (p.elevation !== undefined && Number.isFinite(p.elevation)) {
      point.elevation = p.elevation;
    }
    if (isValidDate(p.timestamp)) {
      point.timestamp = p.timestamp;
    }
    if (p.segmentStart && i > 0) {
      point.segmentStart = true;
    }
    return point;
  });
}

function isValidDate(value: Date | null | undefined): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

function toRideSummary(ride: RideRecord): RideSummary {
  const { points: _points, ...summary } = ride;
  return summary;
}

function toFilterSet(value: string | string[] | undefined): Set<string> | null {
  if (value === undefined) return null;
  const values = Array.isArray(value) ? value : [value];
  return values.length > 0 ? new Set(values) : null;
}

function distinctSorted(values: Array<string | null>): string[] {
  const set = new Set<string>();
  for (const value of values) {
    if (value && value.trim() !== "") set.add(value);
  }
  return [...set].sort();
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
