/**
 * Coverage engine public surface.
 */

export { CoverageEngine } from "./coverage-engine.js";
export { loadCoverageConfig, resolveCoverageConfig, DEFAULT_COVERAGE_CONFIG } from "./config.js";
export {
  CoverageEngineError,
  MalformedGeometryError,
  NetworkNotLoadedError,
  UnknownPathError,
  UnknownRideError,
} from "./errors.js";
export { buildStatistics } from "./modules/statistics.js";
export type * from "./types.js";
