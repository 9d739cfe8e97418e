/**
 * Statistics roll-up.
 *
 * A single pass over current path state. Nothing is cached, so the totals
 * can never drift from the paths they describe.
 */

import { UNKNOWN_GROUP } from "../../config/constants.js";
import type { PathState, StatsBucket, StatsSummary } from "../types.js";

type StatsInput = Pick<
  PathState,
  "pathType" | "area" | "lengthKm" | "isRidden" | "riddenLengthKm"
>;

function emptyBucket(): StatsBucket {
  return {
    count: 0,
    lengthKm: 0,
    riddenCount: 0,
    riddenLengthKm: 0,
    notRiddenCount: 0,
    notRiddenLengthKm: 0,
  };
}

function addToBucket(bucket: StatsBucket, path: StatsInput): void {
  bucket.count++;
  bucket.lengthKm += path.lengthKm;
  bucket.riddenLengthKm += path.riddenLengthKm;
  bucket.notRiddenLengthKm += path.lengthKm - path.riddenLengthKm;
  if (path.isRidden) {
    bucket.riddenCount++;
  } else {
    bucket.notRiddenCount++;
  }
}

function addToGroup(
  groups: Map<string, StatsBucket>,
  label: string,
  path: StatsInput
): void {
  let bucket = groups.get(label);
  if (!bucket) {
    bucket = emptyBucket();
    groups.set(label, bucket);
  }
  addToBucket(bucket, path);
}

function roundKm(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function roundBucket(bucket: StatsBucket): StatsBucket {
  return {
    ...bucket,
    lengthKm: roundKm(bucket.lengthKm),
    riddenLengthKm: roundKm(bucket.riddenLengthKm),
    notRiddenLengthKm: roundKm(bucket.notRiddenLengthKm),
  };
}

function groupLabel(value: string | null): string {
  return value && value.trim() !== "" ? value : UNKNOWN_GROUP;
}

/**
 * Network-wide and grouped totals.
 *
 * Ridden length is length-weighted: a path half ridden contributes half its
 * length to riddenLengthKm and the other half to notRiddenLengthKm, while
 * counting once in riddenCount. Lengths are rounded to metres and
 * percentRidden to two decimals.
 */
export function buildStatistics(paths: Iterable<StatsInput>): StatsSummary {
  const total = emptyBucket();
  const byType = new Map<string, StatsBucket>();
  const byArea = new Map<string, StatsBucket>();

  for (const path of paths) {
    addToBucket(total, path);

    addToGroup(byType, groupLabel(path.pathType), path);
    addToGroup(byArea, groupLabel(path.area), path);
  }

  const percentRidden =
    total.lengthKm > 0
      ? Math.round((total.riddenLengthKm / total.lengthKm) * 10000) / 100
      : 0;

  return {
    ...roundBucket(total),
    percentRidden,
    byType: toSortedRecord(byType),
    byArea: toSortedRecord(byArea),
  };
}

function toSortedRecord(groups: Map<string, StatsBucket>): Record<string, StatsBucket> {
  const record: Record<string, StatsBucket> = {};
  for (const label of [...groups.keys()].sort()) {
    const bucket = groups.get(label);
    if (bucket) record[label] = roundBucket(bucket);
  }
  return record;
}
