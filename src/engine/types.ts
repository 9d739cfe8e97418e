/**
 * Coverage Engine Type Definitions
 *
 * Paths are the reference network, rides are uploaded traces.
 * Coverage is derived state: recomputed from live rides, never edited.
 */

// ============================================
// Geometry Types
// ============================================

/** GeoJSON position: [longitude, latitude] */
export type Position = [number, number];

/** GeoJSON LineString */
export interface GeoJsonLineString {
  type: "LineString";
  coordinates: Position[];
}

/** GeoJSON MultiLineString (a path surveyed as several connected pieces) */
export interface GeoJsonMultiLineString {
  type: "MultiLineString";
  coordinates: Position[][];
}

export type PathGeometry = GeoJsonLineString | GeoJsonMultiLineString;

/** Single GPS fix from a trace */
export interface TracePoint {
  lat: number;
  lng: number;
  elevation?: number;
  timestamp?: Date;
  /** First fix of a recorded segment that follows a break (a new <trkseg>) */
  segmentStart?: boolean;
}

/** How distances between positions are measured */
export type DistanceMode = "geodesic" | "planar";

export interface BoundingBox {
  minLng: number;
  minLat: number;
  maxLng: number;
  maxLat: number;
}

// ============================================
// Path Types
// ============================================

/** Known rights-of-way classes; any other string is accepted as-is */
export type PathType =
  | "Footpath"
  | "Bridleway"
  | "Restricted Byway"
  | "BOAT"
  | (string & {});

/** A path as handed over by the import/parsing layer */
export interface PathInput {
  sourceFid: string;
  routeCode?: string | null;
  name?: string | null;
  pathType?: PathType | null;
  area?: string | null;
  geometry: PathGeometry;
}

/** Static path attributes, immutable once imported */
export interface PathRecord {
  id: string;
  sourceFid: string;
  routeCode: string | null;
  name: string | null;
  pathType: PathType | null;
  area: string | null;
  geometry: PathGeometry;
  lengthKm: number;
}

/** Coverage fields owned by the engine */
export interface PathCoverage {
  isRidden: boolean;
  /** 0.0 - 1.0 */
  coverageFraction: number;
  riddenLengthKm: number;
  lastRiddenDate: Date | null;
  /** Ride that set lastRiddenDate (latest upload when no ride has a date) */
  lastRideId: string | null;
}

export type PathState = PathRecord & PathCoverage;

export interface PathFilters {
  area?: string | string[];
  pathType?: string | string[];
  ridden?: boolean;
  /** Minimum coverage fraction, inclusive */
  minCoverage?: number;
}

// ============================================
// Ride Types
// ============================================

/** A decoded trace as handed over by the GPX layer */
export interface RideInput {
  filename: string;
  name?: string | null;
  /** Falls back to the first point timestamp when absent */
  dateRecorded?: Date | null;
  points: TracePoint[];
}

export interface RideRecord {
  id: string;
  fingerprint: string;
  filename: string;
  name: string | null;
  dateRecorded: Date | null;
  uploadedAt: Date;
  /** Monotonic upload order, breaks ties between equal dates */
  uploadSeq: number;
  distanceKm: number;
  elevationGainM: number | null;
  pointCount: number;
  points: TracePoint[];
}

export type RideSummary = Omit<RideRecord, "points">;

// ============================================
// Matching & Coverage Types
// ============================================

/** [startKm, endKm] measured along a path from its first vertex */
export type CoverageInterval = [number, number];

/** What one ride covered of one path, intervals already merged */
export interface RideContribution {
  rideId: string;
  pathId: string;
  intervals: CoverageInterval[];
  coveredKm: number;
}

export interface CoverageConfig {
  toleranceKm: number;
  maxTraceGapKm: number;
  minContributionKm: number;
  gridCellKm: number;
  distanceMode: DistanceMode;
  fingerprintPrecision: number;
}

// ============================================
// Statistics Types
// ============================================

export interface StatsBucket {
  count: number;
  lengthKm: number;
  riddenCount: number;
  riddenLengthKm: number;
  notRiddenCount: number;
  notRiddenLengthKm: number;
}

export interface StatsSummary extends StatsBucket {
  /** riddenLengthKm / lengthKm * 100 */
  percentRidden: number;
  byType: Record<string, StatsBucket>;
  byArea: Record<string, StatsBucket>;
}

// ============================================
// Operation Results
// ============================================

export type RideResult =
  | { status: "created"; ride: RideSummary; pathsChanged: string[] }
  | { status: "duplicate"; existingRideId: string; fingerprint: string }
  | { status: "rejected"; code: string; reason: string };

export type BatchRideOutcome = RideResult & { filename: string };

export type RideDeleteResult =
  | { status: "ok"; rideId: string; pathsChanged: string[] }
  | { status: "not_found"; rideId: string };

export interface PathRejection {
  index: number;
  sourceFid: string | null;
  code: string;
  reason: string;
}

export interface NetworkImportResult {
  imported: number;
  rejected: PathRejection[];
  totalPaths: number;
  pathsChanged: string[];
  ridesRematched: number;
}

export interface ImportNetworkOptions {
  /** Drop the existing network (and all coverage) before importing */
  replace?: boolean;
}
