import { describe, it, expect } from "vitest";
import type { PathState } from "../engine/types.js";
import { toPathFeature } from "../utils/serializers.js";
import { meridianPath, toPathRecord } from "./fixtures.js";

function longPath(riddenKm: number): PathState {
  const lengthKm = 600;
  const coverageFraction = riddenKm / lengthKm;
  return {
    ...toPathRecord(meridianPath("LONG", 0, 1)),
    lengthKm,
    isRidden: coverageFraction > 0,
    coverageFraction,
    riddenLengthKm: riddenKm,
    lastRiddenDate: null,
    lastRideId: riddenKm > 0 ? "ride-1" : null,
  };
}

describe("toPathFeature", () => {
  it("never sends a ridden path with a zero fraction", () => {
    const { properties } = toPathFeature(longPath(0.025));

    expect(properties.is_ridden).toBe(true);
    expect(properties.coverage_fraction).toBe(0.0001);
    expect(properties.ridden_length_km).toBe(0.025);
  });

  it("rounds the fraction to 4 decimals", () => {
    expect(toPathFeature(longPath(200)).properties.coverage_fraction).toBe(0.3333);
  });

  it("sends 0 for a path not ridden", () => {
    const { properties } = toPathFeature(longPath(0));

    expect(properties.is_ridden).toBe(false);
    expect(properties.coverage_fraction).toBe(0);
  });
});
