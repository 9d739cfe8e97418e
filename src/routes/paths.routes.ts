/**
 * Paths API Endpoints
 * Read-only access to the path network with coverage
 *
 * ENDPOINTS OVERVIEW:
 * -------------------
 *
 * | Method | Path         | Description                                 |
 * |--------|--------------|---------------------------------------------|
 * | GET    | /paths       | GeoJSON FeatureCollection, filterable       |
 * | GET    | /paths/:id   | One path as a GeoJSON Feature               |
 * | GET    | /path-types  | Distinct path types in the network          |
 *
 * Responses reflect the last committed recomputation; they never wait for
 * an upload or import in progress.
 */

import { Router, Request, Response } from "express";
import { ERROR_CODES } from "../config/constants.js";
import type { CoverageEngine, PathFilters } from "../engine/index.js";
import { toPathFeature, toPathFeatureCollection } from "../utils/serializers.js";
import { handleRouteError, sendError } from "../utils/route-errors.js";

/**
 * Read a query parameter given once or repeated (?area=A&area=B).
 * Empty strings are ignored.
 */
export function queryList(value: unknown): string[] | undefined {
  const raw: unknown[] = Array.isArray(value) ? value : value === undefined ? [] : [value];
  const list = raw.filter((v): v is string => typeof v === "string" && v !== "");
  return list.length > 0 ? list : undefined;
}

/**
 * Parse path filters from the query string.
 *
 * @returns The filters, or an error message for an invalid value
 */
export function parsePathFilters(
  query: Request["query"]
): { filters: PathFilters } | { error: string } {
  const filters: PathFilters = {
    area: queryList(query.area),
    pathType: queryList(query.path_type),
  };

  if (query.ridden !== undefined) {
    if (query.ridden !== "true" && query.ridden !== "false") {
      return { error: "Invalid 'ridden' parameter (must be true or false)" };
    }
    filters.ridden = query.ridden === "true";
  }

  if (query.min_coverage !== undefined) {
    const minCoverage =
      typeof query.min_coverage === "string" ? Number(query.min_coverage) : NaN;
    if (!Number.isFinite(minCoverage) || minCoverage < 0 || minCoverage > 1) {
      return { error: "Invalid 'min_coverage' parameter (must be 0-1)" };
    }
    filters.minCoverage = minCoverage;
  }

  return { filters };
}

export function createPathsRouter(engine: CoverageEngine): Router {
  const router = Router();

  /**
   * @openapi
   * /paths:
   *   get:
   *     summary: List paths with coverage
   *     description: |
   *       Returns the path network as a GeoJSON FeatureCollection. Each feature
   *       carries its static attributes plus coverage (is_ridden,
   *       coverage_fraction, ridden_length_km, last_ridden_date).
   *     tags: [Paths]
   *     parameters:
   *       - in: query
   *         name: area
   *         schema:
   *           type: array
   *           items:
   *             type: string
   *         style: form
   *         explode: true
   *         description: Only paths in these areas (repeat for several)
   *       - in: query
   *         name: path_type
   *         schema:
   *           type: array
   *           items:
   *             type: string
   *         style: form
   *         explode: true
   *         description: Only paths of these types (repeat for several)
   *       - in: query
   *         name: ridden
   *         schema:
   *           type: boolean
   *       - in: query
   *         name: min_coverage
   *         schema:
   *           type: number
   *           minimum: 0
   *           maximum: 1
   *     responses:
   *       200:
   *         description: GeoJSON FeatureCollection
   *       400:
   *         description: Invalid filter value
   *       503:
   *         description: No network imported yet
   */
  router.get("/paths", (req: Request, res: Response) => {
    const parsed = parsePathFilters(req.query);
    if ("error" in parsed) {
      sendError(res, 400, parsed.error, ERROR_CODES.VALIDATION_ERROR);
      return;
    }

    try {
      res.status(200).json(toPathFeatureCollection(engine.getPathState(parsed.filters)));
    } catch (error) {
      handleRouteError(res, error, "Paths", "List");
    }
  });

  /**
   * @openapi
   * /paths/{id}:
   *   get:
   *     summary: Get one path
   *     tags: [Paths]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *         description: Path id (the source_fid it was imported with)
   *     responses:
   *       200:
   *         description: GeoJSON Feature
   *       404:
   *         description: Path not found
   *       503:
   *         description: No network imported yet
   */
  router.get("/paths/:id", (req: Request, res: Response) => {
    try {
      res.status(200).json(toPathFeature(engine.getPath(req.params.id)));
    } catch (error) {
      handleRouteError(res, error, "Paths", "Get detail");
    }
  });

  /**
   * @openapi
   * /path-types:
   *   get:
   *     summary: Distinct path types
   *     tags: [Paths]
   *     responses:
   *       200:
   *         description: Sorted path types
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 path_types:
   *                   type: array
   *                   items:
   *                     type: string
   */
  router.get("/path-types", (req: Request, res: Response) => {
    res.status(200).json({ path_types: engine.listPathTypes() });
  });

  return router;
}
