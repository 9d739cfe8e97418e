/**
 * HTTP response shapes
 *
 * Path, stats and lookup responses keep the snake_case wire format the map
 * frontend reads. Ride and network endpoints wrap their payload in the
 * `{ success, ... }` envelope used for every mutation and error.
 */

import type { PathGeometry } from "../engine/types.js";

// ============================================
// Generic Envelope
// ============================================

export interface ApiErrorResponse {
  success: false;
  error: string;
  code: string;
  details?: unknown;
}

// ============================================
// Paths
// ============================================

export interface PathProperties {
  id: string;
  source_fid: string;
  route_code: string | null;
  name: string | null;
  path_type: string | null;
  area: string | null;
  length_km: number;
  is_ridden: boolean;
  coverage_fraction: number;
  ridden_length_km: number;
  last_ridden_date: string | null;
  last_ride_id: string | null;
}

export interface PathFeature {
  type: "Feature";
  id: string;
  geometry: PathGeometry;
  properties: PathProperties;
}

export interface PathFeatureCollection {
  type: "FeatureCollection";
  features: PathFeature[];
}

// ============================================
// Statistics
// ============================================

export interface StatsBucketResponse {
  count: number;
  length_km: number;
  ridden_count: number;
  ridden_length_km: number;
  not_ridden_count: number;
  not_ridden_length_km: number;
}

export interface StatsResponse {
  total_paths: number;
  total_length_km: number;
  ridden_paths: number;
  ridden_length_km: number;
  not_ridden_paths: number;
  not_ridden_length_km: number;
  percent_ridden: number;
  by_type: Record<string, StatsBucketResponse>;
  by_area: Record<string, StatsBucketResponse>;
}

// ============================================
// Rides
// ============================================

export interface RideResponse {
  id: string;
  filename: string;
  name: string | null;
  date_recorded: string | null;
  uploaded_at: string;
  distance_km: number;
  elevation_gain_m: number | null;
  point_count: number;
  fingerprint: string;
}

export interface RideDetailResponse extends RideResponse {
  paths: string[];
  geometry: { type: "LineString"; coordinates: Array<[number, number]> };
}

export type RideOutcomeResponse =
  | { filename: string; status: "created"; ride: RideResponse; paths_changed: string[] }
  | { filename: string; status: "duplicate"; existing_ride_id: string }
  | { filename: string; status: "rejected"; code: string; reason: string };

// ============================================
// Network Import
// ============================================

export interface NetworkImportResponse {
  imported: number;
  total_paths: number;
  rides_rematched: number;
  paths_changed: string[];
  rejected: Array<{
    index: number;
    source_fid: string | null;
    code: string;
    reason: string;
  }>;
}
