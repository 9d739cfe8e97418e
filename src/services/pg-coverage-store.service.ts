/**
 * PostgreSQL Coverage Store
 * Durable CoverageStore backed by two tables: paths and rides
 *
 * TABLES:
 * -------
 * paths  - static path attributes, geometry (GeoJSON as JSONB) and the
 *          coverage fields last committed by the engine
 * rides  - ride metadata, fingerprint (unique) and trace points (JSONB)
 *
 * Every CoverageChange is written in one transaction. If any statement
 * fails the transaction is rolled back and a CoverageStoreError is thrown,
 * so the engine never commits state the database does not hold.
 */

import type pg from "pg";
import { getPool } from "../lib/pg.js";
import type {
  PathCoverage,
  PathGeometry,
  PathRecord,
  PathState,
  RideRecord,
  TracePoint,
} from "../engine/types.js";
import {
  CoverageStoreError,
  type CoverageChange,
  type CoverageSnapshot,
  type CoverageStore,
} from "./coverage-store.service.js";

// ============================================
// Schema
// ============================================

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS paths (
  id                 TEXT PRIMARY KEY,
  source_fid         TEXT NOT NULL,
  route_code         TEXT,
  name               TEXT,
  path_type          TEXT,
  area               TEXT,
  geometry           JSONB NOT NULL,
  length_km          DOUBLE PRECISION NOT NULL,
  is_ridden          BOOLEAN NOT NULL DEFAULT FALSE,
  coverage_fraction  DOUBLE PRECISION NOT NULL DEFAULT 0,
  ridden_length_km   DOUBLE PRECISION NOT NULL DEFAULT 0,
  last_ridden_date   TIMESTAMPTZ,
  last_ride_id       TEXT
);
CREATE INDEX IF NOT EXISTS paths_path_type_idx ON paths (path_type);
CREATE INDEX IF NOT EXISTS paths_area_idx ON paths (area);

CREATE TABLE IF NOT EXISTS rides (
  id                 TEXT PRIMARY KEY,
  fingerprint        TEXT NOT NULL UNIQUE,
  filename           TEXT NOT NULL,
  name               TEXT,
  date_recorded      TIMESTAMPTZ,
  uploaded_at        TIMESTAMPTZ NOT NULL,
  upload_seq         INTEGER NOT NULL,
  distance_km        DOUBLE PRECISION NOT NULL,
  elevation_gain_m   DOUBLE PRECISION,
  point_count        INTEGER NOT NULL,
  points             JSONB NOT NULL
);
`;

/** Rows per multi-row INSERT */
const BATCH_SIZE = 500;

const PATH_COLUMNS = [
  "id",
  "source_fid",
  "route_code",
  "name",
  "path_type",
  "area",
  "geometry",
  "length_km",
] as const;

// ============================================
// Row Types
// ============================================

interface PathRow {
  id: string;
  source_fid: string;
  route_code: string | null;
  name: string | null;
  path_type: string | null;
  area: string | null;
  geometry: PathGeometry;
  length_km: number;
  is_ridden: boolean;
  coverage_fraction: number;
  ridden_length_km: number;
  last_ridden_date: Date | null;
  last_ride_id: string | null;
}

interface RideRow {
  id: string;
  fingerprint: string;
  filename: string;
  name: string | null;
  date_recorded: Date | null;
  uploaded_at: Date;
  upload_seq: number;
  distance_km: number;
  elevation_gain_m: number | null;
  point_count: number;
  points: StoredPoint[];
}

/** Compact JSON form of a TracePoint */
interface StoredPoint {
  lat: number;
  lng: number;
  ele?: number;
  time?: string;
  /** Set on the first fix after a recording break */
  seg?: true;
}

// ============================================
// Store
// ============================================

export class PgCoverageStore implements CoverageStore {
  readonly kind = "postgres";
  private schemaReady: Promise<void> | null = null;

  constructor(private readonly pool: pg.Pool = getPool()) {}

  /**
   * Create tables and indexes if they do not exist yet. Runs once per store.
   */
  async ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.pool
        .query(SCHEMA_SQL)
        .then(() => undefined)
        .catch((error: unknown) => {
          this.schemaReady = null;
          throw new CoverageStoreError("Failed to create coverage tables", error);
        });
    }
    return this.schemaReady;
  }

  async load(): Promise<CoverageSnapshot> {
    await this.ensureSchema();

    try {
      const [paths, rides] = await Promise.all([
        this.pool.query<PathRow>("SELECT * FROM paths ORDER BY id"),
        this.pool.query<RideRow>("SELECT * FROM rides ORDER BY upload_seq"),
      ]);
      return {
        paths: paths.rows.map(rowToPath),
        rides: rides.rows.map(rowToRide),
      };
    } catch (error) {
      throw new CoverageStoreError("Failed to load coverage state", error);
    }
  }

  async apply(change: CoverageChange): Promise<void> {
    await this.ensureSchema();

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      if (change.network) {
        if (change.network.replace) {
          await client.query("DELETE FROM paths");
        }
        await insertPaths(client, change.network.paths);
      }

      if (change.addedRide) {
        await insertRide(client, change.addedRide);
      }

      if (change.removedRideId) {
        await client.query("DELETE FROM rides WHERE id = $1", [change.removedRideId]);
      }

      for (const { pathId, coverage } of change.coverage) {
        const result = await client.query(
          `UPDATE paths
              SET is_ridden = $2,
                  coverage_fraction = $3,
                  ridden_length_km = $4,
                  last_ridden_date = $5,
                  last_ride_id = $6
            WHERE id = $1`,
          coverageParams(pathId, coverage)
        );
        if (result.rowCount === 0) {
          throw new CoverageStoreError(`Coverage update for unknown path ${pathId}`);
        }
      }

      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK").catch((rollbackError: unknown) => {
        console.error("[Store] Rollback failed:", rollbackError);
      });
      if (error instanceof CoverageStoreError) throw error;
      throw new CoverageStoreError("Failed to persist coverage change", error);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

// ============================================
// Writes
// ============================================

/**
 * Insert paths in batches. An existing row with the same id is replaced and
 * its coverage reset; the engine sends the new coverage in the same change.
 */
async function insertPaths(client: pg.PoolClient, paths: PathRecord[]): Promise<void> {
  for (let i = 0; i < paths.length; i += BATCH_SIZE) {
    const batch = paths.slice(i, i + BATCH_SIZE);
    const values: unknown[] = [];
    const rows = batch.map((path, rowIndex) => {
      values.push(
        path.id,
        path.sourceFid,
        path.routeCode,
        path.name,
        path.pathType,
        path.area,
        JSON.stringify(path.geometry),
        path.lengthKm
      );
      const base = rowIndex * PATH_COLUMNS.length;
      return `(${PATH_COLUMNS.map((_, c) => `$${base + c + 1}`).join(", ")})`;
    });

    await client.query(
      `INSERT INTO paths (${PATH_COLUMNS.join(", ")})
       VALUES ${rows.join(", ")}
       ON CONFLICT (id) DO UPDATE SET
         source_fid = EXCLUDED.source_fid,
         route_code = EXCLUDED.route_code,
         name = EXCLUDED.name,
         path_type = EXCLUDED.path_type,
         area = EXCLUDED.area,
         geometry = EXCLUDED.geometry,
         length_km = EXCLUDED.length_km,
         is_ridden = FALSE,
         coverage_fraction = 0,
         ridden_length_km = 0,
         last_ridden_date = NULL,
         last_ride_id = NULL`,
      values
    );
  }
}

async function insertRide(client: pg.PoolClient, ride: RideRecord): Promise<void> {
  await client.query(
    `INSERT INTO rides (
       id, fingerprint, filename, name, date_recorded, uploaded_at,
       upload_seq, distance_km, elevation_gain_m, point_count, points
     ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
    [
      ride.id,
      ride.fingerprint,
      ride.filename,
      ride.name,
      ride.dateRecorded,
      ride.uploadedAt,
      ride.uploadSeq,
      ride.distanceKm,
      ride.elevationGainM,
      ride.pointCount,
      JSON.stringify(ride.points.map(toStoredPoint)),
    ]
  );
}

function coverageParams(pathId: string, coverage: PathCoverage): unknown[] {
  return [
    pathId,
    coverage.isRidden,
    coverage.coverageFraction,
    coverage.riddenLengthKm,
    coverage.lastRiddenDate,
    coverage.lastRideId,
  ];
}

// ============================================
// Row Mapping
// ============================================

function rowToPath(row: PathRow): PathState {
  return {
    id: row.id,
    sourceFid: row.source_fid,
    routeCode: row.route_code,
    name: row.name,
    pathType: row.path_type,
    area: row.area,
    geometry: row.geometry,
    lengthKm: row.length_km,
    isRidden: row.is_ridden,
    coverageFraction: row.coverage_fraction,
    riddenLengthKm: row.ridden_length_km,
    lastRiddenDate: row.last_ridden_date,
    lastRideId: row.last_ride_id,
  };
}

function rowToRide(row: RideRow): RideRecord {
  return {
    id: row.id,
    fingerprint: row.fingerprint,
    filename: row.filename,
    name: row.name,
    dateRecorded: row.date_recorded,
    uploadedAt: row.uploaded_at,
    uploadSeq: row.upload_seq,
    distanceKm: row.distance_km,
    elevationGainM: row.elevation_gain_m,
    pointCount: row.point_count,
    points: row.points.map(fromStoredPoint),
  };
}

function toStoredPoint(point: TracePoint): StoredPoint {
  const stored: StoredPoint = { lat: point.lat, lng: point.lng };
  if (point.elevation !== undefined) stored.ele = point.elevation;
  if (point.timestamp) stored.time = point.timestamp.toISOString();
  if (point.segmentStart) stored.seg = true;
  return stored;
}

function fromStoredPoint(stored: StoredPoint): TracePoint {
  const point: TracePoint = { lat: stored.lat, lng: stored.lng };
  if (stored.ele !== undefined) point.elevation = stored.ele;
  if (stored.time) point.timestamp = new Date(stored.time);
  if (stored.seg) point.segmentStart = true;
  return point;
}
