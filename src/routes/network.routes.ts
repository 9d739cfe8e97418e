/**
 * Network API Endpoints
 * Import the reference path network
 *
 * | Method | Path             | Description                                   |
 * |--------|------------------|-----------------------------------------------|
 * | POST   | /network/import  | Import GeoJSON (file field "network" or body) |
 *
 * `?replace=true` drops the current network (and all coverage) and imports
 * the new one. Without it the new paths extend the network and paths whose
 * id already exists are rejected. Every stored ride is re-matched either way.
 */

import { Router, Request, Response } from "express";
import { ERROR_CODES } from "../config/constants.js";
import type { CoverageEngine } from "../engine/index.js";
import { uploadNetwork, handleMulterError } from "../middleware/upload.middleware.js";
import {
  decodeNetworkBuffer,
  importNetworkGeoJson,
} from "../services/network-import.service.js";
import { toNetworkImportResponse } from "../utils/serializers.js";
import { handleRouteError, sendError } from "../utils/route-errors.js";

/**
 * The request's GeoJSON: an uploaded file takes precedence over a JSON body.
 *
 * @throws NetworkParseError if the uploaded file is not valid JSON
 */
function requestGeoJson(req: Request): unknown {
  if (req.file) {
    return decodeNetworkBuffer(req.file.buffer);
  }
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && Object.keys(body).length > 0) {
    return body;
  }
  return undefined;
}

export function createNetworkRouter(engine: CoverageEngine): Router {
  const router = Router();

  /**
   * @openapi
   * /network/import:
   *   post:
   *     summary: Import the path network
   *     description: |
   *       Accepts a GeoJSON FeatureCollection of LineString / MultiLineString
   *       features, either as a multipart file in the "network" field or as
   *       an application/json body. Features that cannot be imported are
   *       listed in `rejected` with their index; the rest are imported.
   *     tags: [Network]
   *     parameters:
   *       - in: query
   *         name: replace
   *         schema:
   *           type: boolean
   *           default: false
   *         description: Replace the whole network instead of extending it
   *     requestBody:
   *       required: true
   *       content:
   *         multipart/form-data:
   *           schema:
   *             type: object
   *             properties:
   *               network:
   *                 type: string
   *                 format: binary
   *         application/json:
   *           schema:
   *             type: object
   *     responses:
   *       200:
   *         description: Import summary
   *       400:
   *         description: No network supplied or not a FeatureCollection
   */
  router.post(
    "/import",
    uploadNetwork.single("network"),
    handleMulterError,
    async (req: Request, res: Response) => {
      const replace = req.query.replace === "true";

      try {
        const geoJson = requestGeoJson(req);
        if (geoJson === undefined) {
          sendError(
            res,
            400,
            "No network provided. Upload a GeoJSON file in the 'network' field or send it as the JSON body.",
            ERROR_CODES.NETWORK_FILE_REQUIRED
          );
          return;
        }

        const result = await importNetworkGeoJson(engine, geoJson, { replace });
        res.status(200).json({ success: true, ...toNetworkImportResponse(result) });
      } catch (error) {
        handleRouteError(res, error, "Import", "Import");
      }
    }
  );

  return router;
}
