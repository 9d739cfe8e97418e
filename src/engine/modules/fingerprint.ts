/**
 * Ride content fingerprint for duplicate detection.
 *
 * SHA-256 over the start time and every position rounded to a fixed number
 * of decimals, with a marker at each recorded segment break. The filename, track name and elevations do not take part, so
 * the same recording exported twice under different names still collides,
 * while two genuinely different rides along the same route do not (their
 * point sequences and start times differ).
 */

import { createHash } from "node:crypto";
import type { TracePoint } from "../types.js";

/** Placeholder for a trace whose points carry no usable timestamp */
const NO_START_TIME = "-";

export function computeRideFingerprint(
  points: TracePoint[],
  precision: number
): string {
  const hash = createHash("sha256");

  const start = points.find(
    (p) => p.timestamp !== undefined && !Number.isNaN(p.timestamp.getTime())
  );
  hash.update(start?.timestamp ? start.timestamp.toISOString() : NO_START_TIME);
  hash.update("|");

  for (const point of points) {
    if (point.segmentStart) hash.update("/");
    hash.update(`${point.lng.toFixed(precision)},${point.lat.toFixed(precision)};`);
  }

  return hash.digest("hex");
}
