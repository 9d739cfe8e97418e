/**
 * Coverage engine errors.
 *
 * Each carries the ERROR_CODES value the HTTP layer reports, so routes can
 * map them with a single instanceof check.
 */

import { ERROR_CODES, type ErrorCode } from "../config/constants.js";

export class CoverageEngineError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = "CoverageEngineError";
  }
}

/**
 * Empty, degenerate or non-numeric coordinates.
 * Rejects the single offending ride or path, never a whole batch.
 */
export class MalformedGeometryError extends CoverageEngineError {
  constructor(message: string) {
    super(message, ERROR_CODES.MALFORMED_GEOMETRY);
    this.name = "MalformedGeometryError";
  }
}

export class UnknownPathError extends CoverageEngineError {
  constructor(public readonly pathId: string) {
    super(`Path not found: ${pathId}`, ERROR_CODES.PATH_NOT_FOUND);
    this.name = "UnknownPathError";
  }
}

export class UnknownRideError extends CoverageEngineError {
  constructor(public readonly rideId: string) {
    super(`Ride not found: ${rideId}`, ERROR_CODES.RIDE_NOT_FOUND);
    this.name = "UnknownRideError";
  }
}

/** Path or statistics query before any network has been imported */
export class NetworkNotLoadedError extends CoverageEngineError {
  constructor() {
    super(
      "No path network has been imported yet",
      ERROR_CODES.NETWORK_NOT_LOADED
    );
    this.name = "NetworkNotLoadedError";
  }
}
