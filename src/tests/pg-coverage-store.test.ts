/**
 * PostgreSQL Coverage Store Tests
 * Runs the store against a stubbed pg pool: no database is involved.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { PathRecord, RideRecord } from "../engine/types.js";

interface QueryResult {
  rows: unknown[];
  rowCount: number;
}

const mockPoolQuery = vi.fn(
  async (_sql: string, _params?: unknown[]): Promise<QueryResult> => ({ rows: [], rowCount: 0 })
);
const mockClientQuery = vi.fn(
  async (_sql: string, _params?: unknown[]): Promise<QueryResult> => ({ rows: [], rowCount: 1 })
);
const mockRelease = vi.fn();
const mockEnd = vi.fn(async () => undefined);

// Mock the pool before importing the store
vi.mock("../lib/pg.js", () => ({
  hasDatabase: () => true,
  getPool: () => ({
    query: (sql: string, params?: unknown[]) => mockPoolQuery(sql, params),
    connect: async () => ({
      query: (sql: string, params?: unknown[]) => mockClientQuery(sql, params),
      release: () => mockRelease(),
    }),
    end: () => mockEnd(),
  }),
}));

const { PgCoverageStore, SCHEMA_SQL } = await import(
  "../services/pg-coverage-store.service.js"
);
const { CoverageStoreError } = await import("../services/coverage-store.service.js");

const PATH: PathRecord = {
  id: "P1",
  sourceFid: "P1",
  routeCode: "BR 1",
  name: "Drove Lane",
  pathType: "Bridleway",
  area: "Testshire",
  geometry: { type: "LineString", coordinates: [[-1.5, 51], [-1.5, 51.01]] },
  lengthKm: 1.112,
};

const RIDE: RideRecord = {
  id: "ride-1",
  fingerprint: "abc",
  filename: "morning.gpx",
  name: "Morning",
  dateRecorded: new Date("2026-03-01T09:00:00Z"),
  uploadedAt: new Date("2026-03-02T10:00:00Z"),
  uploadSeq: 1,
  distanceKm: 1.1,
  elevationGainM: null,
  pointCount: 2,
  points: [
    { lat: 51, lng: -1.5, timestamp: new Date("2026-03-01T09:00:00Z") },
    { lat: 51.01, lng: -1.5, elevation: 90, segmentStart: true },
  ],
};

const COVERAGE = {
  isRidden: true,
  coverageFraction: 1,
  riddenLengthKm: 1.112,
  lastRiddenDate: new Date("2026-03-01T09:00:00Z"),
  lastRideId: "ride-1",
};

/** First three words of each statement sent on the transaction client */
function clientStatements(): string[] {
  return mockClientQuery.mock.calls.map(([sql]) =>
    sql.trim().split(/\s+/).slice(0, 3).join(" ")
  );
}

describe("PgCoverageStore", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "error").mockImplementation(() => {});
    mockPoolQuery.mockImplementation(async () => ({ rows: [], rowCount: 0 }));
    mockClientQuery.mockImplementation(async () => ({ rows: [], rowCount: 1 }));
  });

  describe("load", () => {
    it("maps rows to paths and rides", async () => {
      mockPoolQuery.mockImplementation(async (sql: string) => {
        if (sql.includes("FROM paths")) {
          return {
            rowCount: 1,
            rows: [
              {
                id: "P1",
                source_fid: "P1",
                route_code: null,
                name: "Drove Lane",
                path_type: "Bridleway",
                area: null,
                geometry: PATH.geometry,
                length_km: 1.112,
                is_ridden: true,
                coverage_fraction: 0.5,
                ridden_length_km: 0.556,
                last_ridden_date: null,
                last_ride_id: "ride-1",
              },
            ],
          };
        }
        if (sql.includes("FROM rides")) {
          return {
            rowCount: 1,
            rows: [
              {
                id: "ride-1",
                fingerprint: "abc",
                filename: "morning.gpx",
                name: null,
                date_recorded: null,
                uploaded_at: new Date("2026-03-02T10:00:00Z"),
                upload_seq: 3,
                distance_km: 1.1,
                elevation_gain_m: 12,
                point_count: 2,
                points: [
                  { lat: 51, lng: -1.5, ele: 80, time: "2026-03-01T09:00:00.000Z" },
                  { lat: 51.01, lng: -1.5, seg: true },
                ],
              },
            ],
          };
        }
        return { rows: [], rowCount: 0 };
      });

      const snapshot = await new PgCoverageStore().load();

      expect(snapshot.paths).toEqual([
        {
          id: "P1",
          sourceFid: "P1",
          routeCode: null,
          name: "Drove Lane",
          pathType: "Bridleway",
          area: null,
          geometry: PATH.geometry,
          lengthKm: 1.112,
          isRidden: true,
          coverageFraction: 0.5,
          riddenLengthKm: 0.556,
          lastRiddenDate: null,
          lastRideId: "ride-1",
        },
      ]);
      expect(snapshot.rides[0].uploadSeq).toBe(3);
      expect(snapshot.rides[0].elevationGainM).toBe(12);
      expect(snapshot.rides[0].points).toEqual([
        { lat: 51, lng: -1.5, elevation: 80, timestamp: new Date("2026-03-01T09:00:00.000Z") },
        { lat: 51.01, lng: -1.5, segmentStart: true },
      ]);
    });

    it("creates the schema once per store", async () => {
      const store = new PgCoverageStore();
      await store.load();
      await store.load();

      const schemaCalls = mockPoolQuery.mock.calls.filter(([sql]) => sql === SCHEMA_SQL);
      expect(schemaCalls).toHaveLength(1);
    });

    it("wraps query failures", async () => {
      mockPoolQuery.mockImplementation(async (sql: string) => {
        if (sql.startsWith("SELECT")) throw new Error("connection reset");
        return { rows: [], rowCount: 0 };
      });

      await expect(new PgCoverageStore().load()).rejects.toThrow(
        "Failed to load coverage state"
      );
    });
  });

  describe("apply", () => {
    it("writes a change in one transaction", async () => {
      await new PgCoverageStore().apply({
        network: { replace: false, paths: [PATH] },
        addedRide: RIDE,
        coverage: [{ pathId: "P1", coverage: COVERAGE }],
      });

      expect(clientStatements()).toEqual([
        "BEGIN",
        "INSERT INTO paths",
        "INSERT INTO rides",
        "UPDATE paths SET",
        "COMMIT",
      ]);
      expect(mockRelease).toHaveBeenCalledTimes(1);

      const [, rideParams] = mockClientQuery.mock.calls[2];
      expect(rideParams?.[10]).toBe(
        JSON.stringify([
          { lat: 51, lng: -1.5, time: "2026-03-01T09:00:00.000Z" },
          { lat: 51.01, lng: -1.5, ele: 90, seg: true },
        ])
      );

      const [, updateParams] = mockClientQuery.mock.calls[3];
      expect(updateParams).toEqual([
        "P1",
        true,
        1,
        1.112,
        COVERAGE.lastRiddenDate,
        "ride-1",
      ]);
    });

    it("clears the paths table when replacing the network", async () => {
      await new PgCoverageStore().apply({
        network: { replace: true, paths: [PATH] },
        coverage: [],
      });

      expect(clientStatements()).toEqual([
        "BEGIN",
        "DELETE FROM paths",
        "INSERT INTO paths",
        "COMMIT",
      ]);
    });

    it("deletes a removed ride", async () => {
      await new PgCoverageStore().apply({ removedRideId: "ride-1", coverage: [] });

      expect(mockClientQuery.mock.calls[1]).toEqual([
        "DELETE FROM rides WHERE id = $1",
        ["ride-1"],
      ]);
    });

    it("rolls back when a coverage row is missing", async () => {
      mockClientQuery.mockImplementation(async (sql: string) => ({
        rows: [],
        rowCount: sql.trim().startsWith("UPDATE") ? 0 : 1,
      }));

      await expect(
        new PgCoverageStore().apply({ coverage: [{ pathId: "P9", coverage: COVERAGE }] })
      ).rejects.toThrow("Coverage update for unknown path P9");

      expect(clientStatements()).toEqual(["BEGIN", "UPDATE paths SET", "ROLLBACK"]);
      expect(mockRelease).toHaveBeenCalledTimes(1);
    });

    it("wraps database errors", async () => {
      const failure = new Error("duplicate key value violates unique constraint");
      mockClientQuery.mockImplementation(async (sql: string) => {
        if (sql.includes("INSERT INTO rides")) throw failure;
        return { rows: [], rowCount: 1 };
      });

      const error = await new PgCoverageStore()
        .apply({ addedRide: RIDE, coverage: [] })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CoverageStoreError);
      expect(error).toMatchObject({
        message: "Failed to persist coverage change",
        cause: failure,
      });
      expect(clientStatements().at(-1)).toBe("ROLLBACK");
      expect(mockRelease).toHaveBeenCalledTimes(1);
    });
  });

  it("ends the pool on close", async () => {
    await new PgCoverageStore().close();
    expect(mockEnd).toHaveBeenCalledTimes(1);
  });
});
