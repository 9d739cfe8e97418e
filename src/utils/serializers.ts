/**
 * Engine values -> HTTP response shapes (see types/api.types.ts).
 *
 * Lengths are rounded to metres and fractions to four decimals on the way
 * out; the engine keeps full precision.
 */

import type {
  BatchRideOutcome,
  NetworkImportResult,
  PathState,
  RideRecord,
  RideSummary,
  StatsBucket,
  StatsSummary,
} from "../engine/types.js";
import type {
  NetworkImportResponse,
  PathFeature,
  PathFeatureCollection,
  RideDetailResponse,
  RideOutcomeResponse,
  RideResponse,
  StatsBucketResponse,
  StatsResponse,
} from "../types/api.types.js";

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function isoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

/** Smallest fraction sent for a ridden path, so it never reads as 0 */
const MIN_RIDDEN_FRACTION = 0.0001;

function wireFraction(path: PathState): number {
  const fraction = round(path.coverageFraction, 4);
  return path.isRidden ? Math.max(fraction, MIN_RIDDEN_FRACTION) : fraction;
}

export function toPathFeature(path: PathState): PathFeature {
  return {
    type: "Feature",
    id: path.id,
    geometry: path.geometry,
    properties: {
      id: path.id,
      source_fid: path.sourceFid,
      route_code: path.routeCode,
      name: path.name,
      path_type: path.pathType,
      area: path.area,
      length_km: round(path.lengthKm, 3),
      is_ridden: path.isRidden,
      coverage_fraction: wireFraction(path),
      ridden_length_km: round(path.riddenLengthKm, 3),
      last_ridden_date: isoOrNull(path.lastRiddenDate),
      last_ride_id: path.lastRideId,
    },
  };
}

export function toPathFeatureCollection(paths: PathState[]): PathFeatureCollection {
  return { type: "FeatureCollection", features: paths.map(toPathFeature) };
}

function toBucketResponse(bucket: StatsBucket): StatsBucketResponse {
  return {
    count: bucket.count,
    length_km: bucket.lengthKm,
    ridden_count: bucket.riddenCount,
    ridden_length_km: bucket.riddenLengthKm,
    not_ridden_count: bucket.notRiddenCount,
    not_ridden_length_km: bucket.notRiddenLengthKm,
  };
}

function mapBuckets(
  groups: Record<string, StatsBucket>
): Record<string, StatsBucketResponse> {
  return Object.fromEntries(
    Object.entries(groups).map(([label, bucket]) => [label, toBucketResponse(bucket)])
  );
}

export function toStatsResponse(stats: StatsSummary): StatsResponse {
  return {
    total_paths: stats.count,
    total_length_km: stats.lengthKm,
    ridden_paths: stats.riddenCount,
    ridden_length_km: stats.riddenLengthKm,
    not_ridden_paths: stats.notRiddenCount,
    not_ridden_length_km: stats.notRiddenLengthKm,
    percent_ridden: stats.percentRidden,
    by_type: mapBuckets(stats.byType),
    by_area: mapBuckets(stats.byArea),
  };
}

export function toRideResponse(ride: RideSummary): RideResponse {
  return {
    id: ride.id,
    filename: ride.filename,
    name: ride.name,
    date_recorded: isoOrNull(ride.dateRecorded),
    uploaded_at: ride.uploadedAt.toISOString(),
    distance_km: round(ride.distanceKm, 3),
    elevation_gain_m: ride.elevationGainM,
    point_count: ride.pointCount,
    fingerprint: ride.fingerprint,
  };
}

export function toRideDetailResponse(ride: RideRecord, paths: string[]): RideDetailResponse {
  return {
    ...toRideResponse(ride),
    paths,
    geometry: {
      type: "LineString",
      coordinates: ride.points.map((p): [number, number] => [p.lng, p.lat]),
    },
  };
}

export function toRideOutcomeResponse(outcome: BatchRideOutcome): RideOutcomeResponse {
  switch (outcome.status) {
    case "created":
      return {
        filename: outcome.filename,
        status: "created",
        ride: toRideResponse(outcome.ride),
        paths_changed: outcome.pathsChanged,
      };
    case "duplicate":
      return {
        filename: outcome.filename,
        status: "duplicate",
        existing_ride_id: outcome.existingRideId,
      };
    case "rejected":
      return {
        filename: outcome.filename,
        status: "rejected",
        code: outcome.code,
        reason: outcome.reason,
      };
  }
}

export function toNetworkImportResponse(result: NetworkImportResult): NetworkImportResponse {
  return {
    imported: result.imported,
    total_paths: result.totalPaths,
    rides_rematched: result.ridesRematched,
    paths_changed: result.pathsChanged,
    rejected: result.rejected.map((r) => ({
      index: r.index,
      source_fid: r.sourceFid,
      code: r.code,
      reason: r.reason,
    })),
  };
}
