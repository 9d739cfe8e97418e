/**
 * Error -> HTTP response mapping shared by the route modules.
 *
 * | Error                    | Status | Code                 |
 * |--------------------------|--------|----------------------|
 * | NetworkNotLoadedError    | 503    | NETWORK_NOT_LOADED   |
 * | UnknownPathError         | 404    | PATH_NOT_FOUND       |
 * | UnknownRideError         | 404    | RIDE_NOT_FOUND       |
 * | MalformedGeometryError   | 400    | MALFORMED_GEOMETRY   |
 * | GpxParseError            | 400    | GPX_PARSE_ERROR      |
 * | NetworkParseError        | 400    | NETWORK_PARSE_ERROR  |
 * | CoverageStoreError       | 500    | STORE_ERROR          |
 * | anything else            | 500    | INTERNAL_ERROR       |
 */

import type { Response } from "express";
import { ERROR_CODES } from "../config/constants.js";
import {
  MalformedGeometryError,
  NetworkNotLoadedError,
  UnknownPathError,
  UnknownRideError,
} from "../engine/index.js";
import { CoverageStoreError } from "../services/coverage-store.service.js";
import { GpxParseError } from "../services/gpx.service.js";
import { NetworkParseError } from "../services/network-import.service.js";

export function sendError(
  res: Response,
  status: number,
  error: string,
  code: string
): void {
  res.status(status).json({ success: false, error, code });
}

/**
 * Send the response for an error thrown by a route handler.
 *
 * @param tag - Log prefix, e.g. "Rides"
 * @param action - What the handler was doing, for the log line
 */
export function handleRouteError(
  res: Response,
  error: unknown,
  tag: string,
  action: string
): void {
  if (error instanceof NetworkNotLoadedError) {
    sendError(res, 503, error.message, error.code);
    return;
  }
  if (error instanceof UnknownPathError || error instanceof UnknownRideError) {
    sendError(res, 404, error.message, error.code);
    return;
  }
  if (error instanceof MalformedGeometryError) {
    sendError(res, 400, error.message, error.code);
    return;
  }
  if (error instanceof GpxParseError) {
    sendError(res, 400, error.message, ERROR_CODES.GPX_PARSE_ERROR);
    return;
  }
  if (error instanceof NetworkParseError) {
    sendError(res, 400, error.message, ERROR_CODES.NETWORK_PARSE_ERROR);
    return;
  }
  if (error instanceof CoverageStoreError) {
    console.error(`[${tag}] ${action} failed in store:`, error);
    sendError(res, 500, "Failed to save changes", ERROR_CODES.STORE_ERROR);
    return;
  }

  console.error(`[${tag}] ${action} error:`, error);
  sendError(res, 500, "Internal server error", ERROR_CODES.INTERNAL_ERROR);
}
