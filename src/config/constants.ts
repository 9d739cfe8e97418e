/**
 * Application Constants
 * Centralized configuration values
 */

// ============================================
// API Configuration
// ============================================

export const API = {
  VERSION: "v1",
  PREFIX: "/api",
} as const;

// ============================================
// Frontend URL (for CORS)
// ============================================

export const FRONTEND_URL = process.env.FRONTEND_URL ?? "http://localhost:5173";

// ============================================
// Error Codes
// ============================================

export const ERROR_CODES = {
  // General errors
  INTERNAL_ERROR: "INTERNAL_ERROR",
  NOT_FOUND: "NOT_FOUND",
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // GPX errors
  GPX_PARSE_ERROR: "GPX_PARSE_ERROR",
  GPX_INVALID_FORMAT: "GPX_INVALID_FORMAT",
  GPX_FILE_TOO_LARGE: "GPX_FILE_TOO_LARGE",
  GPX_FILE_REQUIRED: "GPX_FILE_REQUIRED",

  // Network import errors
  NETWORK_PARSE_ERROR: "NETWORK_PARSE_ERROR",
  NETWORK_FILE_REQUIRED: "NETWORK_FILE_REQUIRED",
  NETWORK_FILE_TOO_LARGE: "NETWORK_FILE_TOO_LARGE",
  NETWORK_NOT_LOADED: "NETWORK_NOT_LOADED",
  DUPLICATE_PATH: "DUPLICATE_PATH",

  // Coverage engine errors
  MALFORMED_GEOMETRY: "MALFORMED_GEOMETRY",
  PATH_NOT_FOUND: "PATH_NOT_FOUND",
  RIDE_NOT_FOUND: "RIDE_NOT_FOUND",
  RIDE_DUPLICATE: "RIDE_DUPLICATE",

  // Persistence errors
  STORE_ERROR: "STORE_ERROR",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// ============================================
// Environment Variable Helpers
// ============================================

/**
 * Get required environment variable or throw
 */
export function getEnvVar(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default
 */
export function getEnvVarOptional(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}

/**
 * Get optional numeric environment variable with default.
 * Throws when the variable is set but is not a finite number.
 */
export function getEnvNumber(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return defaultValue;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return value;
}

// ============================================
// Coverage Matching Constants
// ============================================

/**
 * Defaults for the coverage engine. All distances are kilometres.
 *
 * Each value can be overridden with the matching COVERAGE_* environment
 * variable (see engine/config.ts).
 */
export const COVERAGE = {
  /**
   * Maximum perpendicular offset between a trace and a path for the trace to
   * count as riding that path. Covers GPS drift (5-15m) plus survey error in
   * the rights-of-way data.
   */
  TOLERANCE_KM: 0.025,

  /**
   * Consecutive trace points further apart than this are a recording break
   * (signal loss, paused device). Nothing is credited across a break.
   */
  MAX_TRACE_GAP_KM: 0.2,

  /** A ride covering less than this of a path is treated as noise for that path */
  MIN_CONTRIBUTION_KM: 0.02,

  /** Spatial index grid cell size */
  GRID_CELL_KM: 0.1,

  /** "geodesic" (great-circle) or "planar" (local equirectangular) */
  DISTANCE_MODE: "geodesic",

  /** Decimal places of lat/lng used when fingerprinting a trace (~0.1m) */
  FINGERPRINT_PRECISION: 6,
} as const;

// ============================================
// Path Network
// ============================================

/**
 * Rights-of-way classes in the reference network. Imports may carry other
 * values; these are the ones the map legend knows about.
 */
export const PATH_TYPES = [
  "Footpath",
  "Bridleway",
  "Restricted Byway",
  "BOAT",
] as const;

/** Group label for paths with no type or area */
export const UNKNOWN_GROUP = "Unknown";

export const NETWORK_IMPORT = {
  MAX_FILE_SIZE_BYTES: 50 * 1024 * 1024,
  ALLOWED_EXTENSIONS: [".geojson", ".json"],
} as const;

// ============================================
// GPX Upload
// ============================================

export const GPX_UPLOAD = {
  MAX_FILE_SIZE_BYTES: 10 * 1024 * 1024,
  MIN_POINTS: 2,
  /** Maximum files accepted by a single batch upload */
  MAX_FILES: 20,
} as const;
