/**
 * HTTP API: the Express app over an in-memory engine
 */
import { describe, it, expect, vi, beforeEach } from "vitest";
import request from "supertest";
import type { Application } from "express";
import { createApp } from "../app.js";
import { CoverageEngine } from "../engine/coverage-engine.js";
import type { PathInput } from "../engine/types.js";
import { MemoryCoverageStore } from "../services/coverage-store.service.js";
import {
  meridianLine,
  meridianPath,
  meridianTrace,
  toFeatureCollection,
  toGpx,
} from "./fixtures.js";

const P1 = meridianPath("P1", 0, 1);
const P2 = meridianPath("P2", 1, 2);
const P3: PathInput = {
  sourceFid: "P3",
  pathType: "Footpath",
  area: "Southshire",
  geometry: { type: "LineString", coordinates: meridianLine(0, 1, 0.25, 5) },
};

const MARCH_1 = new Date("2026-03-01T09:00:00Z");
const MARCH_5 = new Date("2026-03-05T09:00:00Z");

const gpxA = () => Buffer.from(toGpx(meridianTrace(0.2, 0.7, { start: MARCH_1 }), "Ride A"));
const gpxB = () => Buffer.from(toGpx(meridianTrace(1.2, 1.8, { start: MARCH_5 }), "Ride B"));

let app: Application;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  app = createApp(await CoverageEngine.load(new MemoryCoverageStore()));
});

async function importNetwork(): Promise<void> {
  await request(app)
    .post("/api/network/import")
    .send(toFeatureCollection([P1, P2, P3]))
    .expect(200);
}

async function uploadRideA(): Promise<string> {
  const res = await request(app).post("/api/rides").attach("gpx", gpxA(), "a.gpx").expect(200);
  return res.body.results[0].ride.id;
}

describe("GET /health", () => {
  it("reports an empty engine", async () => {
    const res = await request(app).get("/health").expect(200);
    expect(res.body).toEqual({
      status: "ok",
      network_loaded: false,
      paths: 0,
      rides: 0,
      store: "memory",
    });
  });
});

describe("before a network is imported", () => {
  it("returns 503 for paths and stats", async () => {
    const paths = await request(app).get("/api/paths").expect(503);
    expect(paths.body).toEqual({
      success: false,
      error: "No path network has been imported yet",
      code: "NETWORK_NOT_LOADED",
    });

    const stats = await request(app).get("/api/stats").expect(503);
    expect(stats.body.code).toBe("NETWORK_NOT_LOADED");
  });
});

describe("POST /api/network/import", () => {
  it("imports a FeatureCollection sent as the JSON body", async () => {
    const res = await request(app)
      .post("/api/network/import")
      .send(toFeatureCollection([P1, P2, P3]))
      .expect(200);

    expect(res.body).toEqual({
      success: true,
      imported: 3,
      total_paths: 3,
      rides_rematched: 0,
      paths_changed: [],
      rejected: [],
    });
  });

  it("replaces the network from an uploaded file", async () => {
    await importNetwork();

    const res = await request(app)
      .post("/api/network/import?replace=true")
      .attach("network", Buffer.from(JSON.stringify(toFeatureCollection([P2]))), "network.geojson")
      .expect(200);

    expect(res.body.imported).toBe(1);
    expect(res.body.total_paths).toBe(1);

    const paths = await request(app).get("/api/paths").expect(200);
    expect(paths.body.features.map((f: { id: string }) => f.id)).toEqual(["P2"]);
  });

  it("reports rejected features with their index", async () => {
    const collection = toFeatureCollection([P1]);
    collection.features.push({ type: "Feature", properties: { source_fid: "pt" }, geometry: { type: "Point", coordinates: [-1.5, 51] } });

    const res = await request(app).post("/api/network/import").send(collection).expect(200);

    expect(res.body.imported).toBe(1);
    expect(res.body.rejected).toHaveLength(1);
    expect(res.body.rejected[0]).toMatchObject({
      index: 1,
      source_fid: "pt",
      code: "MALFORMED_GEOMETRY",
    });
  });

  it("rejects a file that is not JSON", async () => {
    const res = await request(app)
      .post("/api/network/import")
      .attach("network", Buffer.from("{nope"), "network.json")
      .expect(400);

    expect(res.body).toEqual({
      success: false,
      error: "Network file is not valid JSON",
      code: "NETWORK_PARSE_ERROR",
    });
  });

  it("rejects a file with the wrong extension", async () => {
    const res = await request(app)
      .post("/api/network/import")
      .attach("network", Buffer.from("{}"), "network.csv")
      .expect(400);

    expect(res.body.code).toBe("NETWORK_PARSE_ERROR");
  });

  it("rejects JSON that is not a FeatureCollection", async () => {
    const res = await request(app)
      .post("/api/network/import")
      .send({ type: "Feature", geometry: null })
      .expect(400);

    expect(res.body.error).toBe(
      "Network must be a GeoJSON FeatureCollection with a features array"
    );
  });

  it("requires a network", async () => {
    const res = await request(app).post("/api/network/import").expect(400);
    expect(res.body.code).toBe("NETWORK_FILE_REQUIRED");
  });

  it("answers 400 for a malformed JSON body", async () => {
    const res = await request(app)
      .post("/api/network/import")
      .set("Content-Type", "application/json")
      .send("{bad")
      .expect(400);

    expect(res.body).toEqual({
      success: false,
      error: "Request body is not valid JSON",
      code: "VALIDATION_ERROR",
    });
  });
});

describe("POST /api/rides", () => {
  beforeEach(importNetwork);

  it("requires at least one file", async () => {
    const res = await request(app).post("/api/rides").expect(400);
    expect(res.body.code).toBe("GPX_FILE_REQUIRED");
  });

  it("rejects files that are not .gpx", async () => {
    const res = await request(app)
      .post("/api/rides")
      .attach("gpx", Buffer.from("hello"), "notes.txt")
      .expect(400);

    expect(res.body).toEqual({
      success: false,
      error: "Only .gpx files are allowed",
      code: "GPX_INVALID_FORMAT",
    });
  });

  it("reports one outcome per file in upload order", async () => {
    const res = await request(app)
      .post("/api/rides")
      .attach("gpx", gpxA(), "a.gpx")
      .attach("gpx", Buffer.from("<kml></kml>"), "broken.gpx")
      .attach("gpx", gpxB(), "b.gpx")
      .expect(200);

    expect(res.body.created).toBe(2);
    expect(res.body.duplicates).toBe(0);
    expect(res.body.rejected).toBe(1);
    expect(res.body.results.map((r: { filename: string }) => r.filename)).toEqual([
      "a.gpx",
      "broken.gpx",
      "b.gpx",
    ]);
    expect(res.body.results[0]).toMatchObject({
      status: "created",
      paths_changed: ["P1"],
      ride: { filename: "a.gpx", name: "Ride A", date_recorded: "2026-03-01T09:00:00.000Z", point_count: 11 },
    });
    expect(res.body.results[1]).toEqual({
      filename: "broken.gpx",
      status: "rejected",
      code: "GPX_PARSE_ERROR",
      reason: "Invalid GPX file: root element is not <gpx>",
    });
    expect(res.body.results[2].paths_changed).toEqual(["P2"]);
  });

  it("reports a re-upload as a duplicate", async () => {
    const rideId = await uploadRideA();

    const res = await request(app).post("/api/rides").attach("gpx", gpxA(), "copy.gpx").expect(200);

    expect(res.body.duplicates).toBe(1);
    expect(res.body.results[0]).toEqual({
      filename: "copy.gpx",
      status: "duplicate",
      existing_ride_id: rideId,
    });
  });
});

describe("GET /api/paths", () => {
  beforeEach(async () => {
    await importNetwork();
    await uploadRideA();
  });

  it("returns every path as a GeoJSON feature", async () => {
    const res = await request(app).get("/api/paths").expect(200);

    expect(res.body.type).toBe("FeatureCollection");
    expect(res.body.features.map((f: { id: string }) => f.id)).toEqual(["P1", "P2", "P3"]);

    const p1 = res.body.features[0].properties;
    expect(p1.is_ridden).toBe(true);
    expect(p1.coverage_fraction).toBeCloseTo(0.5, 2);
    expect(p1.last_ridden_date).toBe("2026-03-01T09:00:00.000Z");
  });

  it("filters by ridden, type, area and coverage", async () => {
    const ids = async (query: string): Promise<string[]> => {
      const res = await request(app).get(`/api/paths?${query}`).expect(200);
      return res.body.features.map((f: { id: string }) => f.id);
    };

    expect(await ids("ridden=true")).toEqual(["P1"]);
    expect(await ids("ridden=false")).toEqual(["P2", "P3"]);
    expect(await ids("path_type=Footpath")).toEqual(["P3"]);
    expect(await ids("area=Testshire&area=Southshire")).toEqual(["P1", "P2", "P3"]);
    expect(await ids("min_coverage=0.4")).toEqual(["P1"]);
  });

  it("rejects invalid filters", async () => {
    const ridden = await request(app).get("/api/paths?ridden=maybe").expect(400);
    expect(ridden.body.error).toBe("Invalid 'ridden' parameter (must be true or false)");

    const coverage = await request(app).get("/api/paths?min_coverage=2").expect(400);
    expect(coverage.body.code).toBe("VALIDATION_ERROR");
  });

  it("returns one path by id", async () => {
    const res = await request(app).get("/api/paths/P3").expect(200);

    expect(res.body.properties.path_type).toBe("Footpath");
    expect(res.body.properties.area).toBe("Southshire");
    expect(res.body.properties.length_km).toBeCloseTo(1, 3);
    expect(res.body.properties.is_ridden).toBe(false);
  });

  it("returns 404 for an unknown path", async () => {
    const res = await request(app).get("/api/paths/NOPE").expect(404);
    expect(res.body).toEqual({
      success: false,
      error: "Path not found: NOPE",
      code: "PATH_NOT_FOUND",
    });
  });
});

describe("GET /api/stats, /api/areas, /api/path-types", () => {
  beforeEach(async () => {
    await importNetwork();
    await uploadRideA();
  });

  it("summarises the network", async () => {
    const res = await request(app).get("/api/stats").expect(200);

    expect(res.body.total_paths).toBe(3);
    expect(res.body.ridden_paths).toBe(1);
    expect(res.body.not_ridden_paths).toBe(2);
    expect(Object.keys(res.body.by_type).sort()).toEqual(["Bridleway", "Footpath"]);
    expect(res.body.by_area.Testshire.count).toBe(2);
    expect(res.body.by_area.Southshire.ridden_count).toBe(0);
  });

  it("lists areas and path types", async () => {
    const areas = await request(app).get("/api/areas").expect(200);
    expect(areas.body).toEqual({ areas: ["Southshire", "Testshire"] });

    const types = await request(app).get("/api/path-types").expect(200);
    expect(types.body).toEqual({ path_types: ["Bridleway", "Footpath"] });
  });
});

describe("rides", () => {
  beforeEach(importNetwork);

  it("lists rides with the latest upload first", async () => {
    await uploadRideA();
    await request(app).post("/api/rides").attach("gpx", gpxB(), "b.gpx").expect(200);

    const res = await request(app).get("/api/rides").expect(200);

    expect(res.body.total).toBe(2);
    expect(res.body.rides.map((r: { filename: string }) => r.filename)).toEqual(["b.gpx", "a.gpx"]);
  });

  it("returns a ride with its paths and track", async () => {
    const rideId = await uploadRideA();

    const res = await request(app).get(`/api/rides/${rideId}`).expect(200);

    expect(res.body.ride.id).toBe(rideId);
    expect(res.body.ride.paths).toEqual(["P1"]);
    expect(res.body.ride.geometry.type).toBe("LineString");
    expect(res.body.ride.geometry.coordinates).toHaveLength(11);
  });

  it("returns 404 for an unknown ride", async () => {
    const res = await request(app).get("/api/rides/missing").expect(404);
    expect(res.body.code).toBe("RIDE_NOT_FOUND");
  });

  it("deletes a ride and clears its coverage", async () => {
    const rideId = await uploadRideA();

    const res = await request(app).delete(`/api/rides/${rideId}`).expect(200);
    expect(res.body).toEqual({
      success: true,
      message: "Ride deleted",
      ride_id: rideId,
      paths_changed: ["P1"],
    });

    const p1 = await request(app).get("/api/paths/P1").expect(200);
    expect(p1.body.properties.is_ridden).toBe(false);

    const again = await request(app).delete(`/api/rides/${rideId}`).expect(404);
    expect(again.body.error).toBe(`Ride not found: ${rideId}`);
  });
});

describe("other routes", () => {
  it("describes the API at the root", async () => {
    const res = await request(app).get("/").expect(200);
    expect(res.body.message).toBe("Welcome to Bridleway Log API");
    expect(res.body.endpoints.paths).toBe("/api/paths");
  });

  it("serves the OpenAPI document", async () => {
    const res = await request(app).get("/docs/openapi.json").expect(200);
    expect(res.body.info.title).toBe("Bridleway Log API");
  });

  it("returns 404 for unknown routes", async () => {
    const res = await request(app).get("/api/nothing").expect(404);
    expect(res.body).toEqual({
      success: false,
      error: "Route not found: /api/nothing",
      code: "NOT_FOUND",
    });
  });
});
