/**
 * Geometry Tests
 * Distances, lengths and the trace/path overlap primitive
 */

import { describe, it, expect } from "vitest";
import {
  elevationGainM,
  lineLengthKm,
  overlapOnSegment,
  pathLengthKm,
  projectOntoSegment,
  segmentLengthKm,
  validatePositions,
} from "../engine/modules/geometry.js";
import { meridianLine, pos } from "./fixtures.js";

describe("segmentLengthKm", () => {
  it("measures 1km along a meridian in geodesic mode", () => {
    expect(segmentLengthKm(pos(0), pos(1), "geodesic")).toBeCloseTo(1, 6);
  });

  it("agrees with geodesic mode in planar mode", () => {
    expect(segmentLengthKm(pos(0), pos(1), "planar")).toBeCloseTo(1, 6);
  });

  it("is symmetric", () => {
    const a = pos(0, 0.3);
    const b = pos(0.8, -0.2);
    expect(segmentLengthKm(a, b, "geodesic")).toBe(segmentLengthKm(b, a, "geodesic"));
    expect(segmentLengthKm(a, b, "planar")).toBe(segmentLengthKm(b, a, "planar"));
  });
});

describe("pathLengthKm", () => {
  it("sums the segments of a LineString", () => {
    const line = meridianLine(0, 1.5, 0.1);
    expect(lineLengthKm(line, "geodesic")).toBeCloseTo(1.5, 6);
  });

  it("does not count the space between MultiLineString parts", () => {
    const length = pathLengthKm(
      {
        type: "MultiLineString",
        coordinates: [meridianLine(0, 0.4), meridianLine(0.6, 1.0)],
      },
      "geodesic"
    );
    expect(length).toBeCloseTo(0.8, 6);
  });
});

describe("elevationGainM", () => {
  it("sums positive deltas only", () => {
    const points = [100, 105, 103, 110].map((elevation) => ({ lat: 0, lng: 0, elevation }));
    expect(elevationGainM(points)).toBe(12);
  });

  it("skips points without elevation", () => {
    expect(
      elevationGainM([
        { lat: 0, lng: 0, elevation: 100 },
        { lat: 0, lng: 0 },
        { lat: 0, lng: 0, elevation: 104 },
      ])
    ).toBe(4);
  });

  it("returns null when the trace has no elevation data", () => {
    expect(elevationGainM([{ lat: 0, lng: 0 }, { lat: 1, lng: 1 }])).toBeNull();
  });
});

describe("projectOntoSegment", () => {
  it("clamps to the segment end", () => {
    const projection = projectOntoSegment(pos(1.5), pos(0), pos(1), "geodesic");
    expect(projection.t).toBe(1);
    expect(projection.distanceKm).toBeCloseTo(0.5, 6);
  });

  it("measures the perpendicular offset alongside the segment", () => {
    const projection = projectOntoSegment(pos(0.5, 0.02), pos(0), pos(1), "geodesic");
    expect(projection.t).toBeCloseTo(0.5, 4);
    expect(projection.distanceKm).toBeCloseTo(0.02, 5);
  });
});

describe("overlapOnSegment", () => {
  const a = pos(0);
  const b = pos(1);

  it("returns the ridden stretch for a trace along the path", () => {
    const overlap = overlapOnSegment(pos(0.2), pos(0.6), a, b, 0.025);

    expect(overlap).not.toBeNull();
    expect(overlap?.traceRange[0]).toBe(0);
    expect(overlap?.traceRange[1]).toBe(1);
    expect(overlap?.pathRange[0]).toBeCloseTo(0.2, 6);
    expect(overlap?.pathRange[1]).toBeCloseTo(0.6, 6);
  });

  it("orders the path range low end first for a southbound trace", () => {
    const overlap = overlapOnSegment(pos(0.6), pos(0.2), a, b, 0.025);
    expect(overlap?.pathRange[0]).toBeCloseTo(0.2, 6);
    expect(overlap?.pathRange[1]).toBeCloseTo(0.6, 6);
  });

  it("clips a trace running past the end of the path", () => {
    const overlap = overlapOnSegment(pos(0.8), pos(1.3), a, b, 0.025);
    expect(overlap?.pathRange[0]).toBeCloseTo(0.8, 6);
    expect(overlap?.pathRange[1]).toBe(1);
  });

  it("returns null for a parallel trace outside tolerance", () => {
    expect(overlapOnSegment(pos(0.2, 0.03), pos(0.6, 0.03), a, b, 0.025)).toBeNull();
  });

  it("accepts a parallel trace inside tolerance", () => {
    const overlap = overlapOnSegment(pos(0.2, 0.02), pos(0.6, 0.02), a, b, 0.025);
    expect(overlap?.pathRange[0]).toBeCloseTo(0.2, 4);
    expect(overlap?.pathRange[1]).toBeCloseTo(0.6, 4);
  });

  it("projects a perpendicular crossing to a single point", () => {
    const overlap = overlapOnSegment(pos(0.5, -0.1), pos(0.5, 0.1), a, b, 0.025);

    expect(overlap).not.toBeNull();
    expect(overlap?.pathRange[0]).toBeCloseTo(0.5, 6);
    expect(overlap?.pathRange[1]).toBe(overlap?.pathRange[0]);
  });

  it("handles a zero-length path segment", () => {
    const overlap = overlapOnSegment(pos(0.49), pos(0.51), pos(0.5), pos(0.5), 0.025);
    expect(overlap?.pathRange).toEqual([0, 0]);
  });
});

describe("validatePositions", () => {
  it("reports non-numeric and out-of-range positions", () => {
    expect(
      validatePositions([
        [0, 0],
        [NaN, 1],
        [200, 0],
      ])
    ).toEqual(["Point 1 has non-numeric coordinates", "Point 2 is out of range (200, 0)"]);
  });

  it("uses the given label", () => {
    expect(validatePositions([[0, 91]], "Position")).toEqual([
      "Position 0 is out of range (0, 91)",
    ]);
  });

  it("returns nothing for valid positions", () => {
    expect(validatePositions(meridianLine(0, 1))).toEqual([]);
  });
});
