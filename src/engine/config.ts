/**
 * Coverage Engine Configuration
 *
 * Defaults come from COVERAGE in config/constants.ts and can be overridden
 * per deployment through COVERAGE_* environment variables, or per engine
 * instance (tests pass explicit values to exercise boundaries).
 */

import { COVERAGE, getEnvNumber, getEnvVarOptional } from "../config/constants.js";
import type { CoverageConfig, DistanceMode } from "./types.js";

export const DEFAULT_COVERAGE_CONFIG: CoverageConfig = {
  toleranceKm: COVERAGE.TOLERANCE_KM,
  maxTraceGapKm: COVERAGE.MAX_TRACE_GAP_KM,
  minContributionKm: COVERAGE.MIN_CONTRIBUTION_KM,
  gridCellKm: COVERAGE.GRID_CELL_KM,
  distanceMode: COVERAGE.DISTANCE_MODE,
  fingerprintPrecision: COVERAGE.FINGERPRINT_PRECISION,
};

function parseDistanceMode(value: string): DistanceMode {
  if (value === "geodesic" || value === "planar") return value;
  throw new Error(
    `COVERAGE_DISTANCE_MODE must be "geodesic" or "planar", got "${value}"`
  );
}

/**
 * Merge overrides onto the defaults and check the result is usable.
 *
 * @throws Error when a distance is not positive or the precision is out of range
 */
export function resolveCoverageConfig(
  overrides: Partial<CoverageConfig> = {}
): CoverageConfig {
  const config: CoverageConfig = { ...DEFAULT_COVERAGE_CONFIG, ...overrides };

  if (!(config.toleranceKm > 0)) {
    throw new Error("toleranceKm must be greater than 0");
  }
  if (!(config.maxTraceGapKm > 0)) {
    throw new Error("maxTraceGapKm must be greater than 0");
  }
  if (!(config.minContributionKm >= 0)) {
    throw new Error("minContributionKm must not be negative");
  }
  if (!(config.gridCellKm > 0)) {
    throw new Error("gridCellKm must be greater than 0");
  }
  if (
    !Number.isInteger(config.fingerprintPrecision) ||
    config.fingerprintPrecision < 0 ||
    config.fingerprintPrecision > 12
  ) {
    throw new Error("fingerprintPrecision must be an integer between 0 and 12");
  }

  return config;
}

/**
 * Build the engine configuration from COVERAGE_* environment variables.
 */
export function loadCoverageConfig(): CoverageConfig {
  return resolveCoverageConfig({
    toleranceKm: getEnvNumber("COVERAGE_TOLERANCE_KM", COVERAGE.TOLERANCE_KM),
    maxTraceGapKm: getEnvNumber(
      "COVERAGE_MAX_TRACE_GAP_KM",
      COVERAGE.MAX_TRACE_GAP_KM
    ),
    minContributionKm: getEnvNumber(
      "COVERAGE_MIN_CONTRIBUTION_KM",
      COVERAGE.MIN_CONTRIBUTION_KM
    ),
    gridCellKm: getEnvNumber("COVERAGE_GRID_CELL_KM", COVERAGE.GRID_CELL_KM),
    distanceMode: parseDistanceMode(
      getEnvVarOptional("COVERAGE_DISTANCE_MODE", COVERAGE.DISTANCE_MODE)
    ),
  });
}
