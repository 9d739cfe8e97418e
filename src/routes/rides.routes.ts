/**
 * Rides API Endpoints
 * Upload, list and delete ridden GPS traces
 *
 * ENDPOINTS OVERVIEW:
 * -------------------
 *
 * | Method | Path        | Description                                  |
 * |--------|-------------|----------------------------------------------|
 * | POST   | /rides      | Upload one or more GPX files (field "gpx")   |
 * | GET    | /rides      | List rides, most recent upload first         |
 * | GET    | /rides/:id  | Ride detail with track and paths it covered  |
 * | DELETE | /rides/:id  | Delete a ride and recompute its paths        |
 *
 * UPLOAD OUTCOMES:
 * ----------------
 * Every file in an upload gets its own outcome; one bad file never fails
 * the batch:
 * - created:   stored and matched; paths_changed lists affected paths
 * - duplicate: same content as a ride already stored, nothing changed
 * - rejected:  unreadable GPX or malformed coordinates
 */

import { Router, Request, Response } from "express";
import { ERROR_CODES, GPX_UPLOAD } from "../config/constants.js";
import type { BatchRideOutcome, CoverageEngine, RideInput } from "../engine/index.js";
import { uploadGpx, handleMulterError } from "../middleware/upload.middleware.js";
import { GpxParseError, gpxToRideInput } from "../services/gpx.service.js";
import {
  toRideDetailResponse,
  toRideOutcomeResponse,
  toRideResponse,
} from "../utils/serializers.js";
import { handleRouteError, sendError } from "../utils/route-errors.js";

function uploadedFiles(req: Request): Express.Multer.File[] {
  if (Array.isArray(req.files)) return req.files;
  return req.file ? [req.file] : [];
}

export function createRidesRouter(engine: CoverageEngine): Router {
  const router = Router();

  /**
   * @openapi
   * /rides:
   *   post:
   *     summary: Upload GPX rides
   *     description: |
   *       Upload up to 20 GPX files in the "gpx" field. Each file is decoded,
   *       checked for duplicates by content fingerprint, and matched against
   *       the path network. The response reports an outcome per file.
   *     tags: [Rides]
   *     requestBody:
   *       required: true
   *       content:
   *         multipart/form-data:
   *           schema:
   *             type: object
   *             properties:
   *               gpx:
   *                 type: array
   *                 items:
   *                   type: string
   *                   format: binary
   *     responses:
   *       200:
   *         description: Per-file outcomes
   *       400:
   *         description: No files, wrong file type or file too large
   */
  router.post(
    "/",
    uploadGpx.array("gpx", GPX_UPLOAD.MAX_FILES),
    handleMulterError,
    async (req: Request, res: Response) => {
      const files = uploadedFiles(req);
      if (files.length === 0) {
        sendError(
          res,
          400,
          "No GPX file provided. Upload files in the 'gpx' field.",
          ERROR_CODES.GPX_FILE_REQUIRED
        );
        return;
      }

      try {
        // One slot per uploaded file so outcomes come back in upload order
        const outcomes: Array<BatchRideOutcome | null> = files.map(() => null);
        const inputs: RideInput[] = [];
        const slots: number[] = [];

        files.forEach((file, slot) => {
          try {
            inputs.push(gpxToRideInput(file.originalname, file.buffer));
            slots.push(slot);
          } catch (error) {
            if (!(error instanceof GpxParseError)) throw error;
            outcomes[slot] = {
              filename: file.originalname,
              status: "rejected",
              code: ERROR_CODES.GPX_PARSE_ERROR,
              reason: error.message,
            };
          }
        });

        const added = await engine.addRides(inputs);
        added.forEach((outcome, i) => {
          outcomes[slots[i]] = outcome;
        });
        const results = outcomes.filter((o): o is BatchRideOutcome => o !== null);

        res.status(200).json({
          success: true,
          created: results.filter((o) => o.status === "created").length,
          duplicates: results.filter((o) => o.status === "duplicate").length,
          rejected: results.filter((o) => o.status === "rejected").length,
          results: results.map(toRideOutcomeResponse),
        });
      } catch (error) {
        handleRouteError(res, error, "Rides", "Upload");
      }
    }
  );

  /**
   * @openapi
   * /rides:
   *   get:
   *     summary: List rides
   *     tags: [Rides]
   *     responses:
   *       200:
   *         description: Rides, most recent upload first
   */
  router.get("/", (req: Request, res: Response) => {
    const rides = engine.listRides();
    res.status(200).json({
      success: true,
      total: rides.length,
      rides: rides.map(toRideResponse),
    });
  });

  /**
   * @openapi
   * /rides/{id}:
   *   get:
   *     summary: Get ride detail
   *     description: Ride metadata, its track as a GeoJSON LineString and the ids of the paths it covers.
   *     tags: [Rides]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Ride detail
   *       404:
   *         description: Ride not found
   */
  router.get("/:id", (req: Request, res: Response) => {
    try {
      const ride = engine.getRide(req.params.id);
      res.status(200).json({
        success: true,
        ride: toRideDetailResponse(ride, engine.getRidePaths(ride.id)),
      });
    } catch (error) {
      handleRouteError(res, error, "Rides", "Get detail");
    }
  });

  /**
   * @openapi
   * /rides/{id}:
   *   delete:
   *     summary: Delete a ride
   *     description: |
   *       Removes the ride and recomputes coverage for every path it touched
   *       from the remaining rides. Stretches also covered by another ride
   *       stay covered.
   *     tags: [Rides]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Ride deleted
   *       404:
   *         description: Ride not found
   */
  router.delete("/:id", async (req: Request, res: Response) => {
    try {
      const result = await engine.deleteRide(req.params.id);
      if (result.status === "not_found") {
        sendError(res, 404, `Ride not found: ${result.rideId}`, ERROR_CODES.RIDE_NOT_FOUND);
        return;
      }
      res.status(200).json({
        success: true,
        message: "Ride deleted",
        ride_id: result.rideId,
        paths_changed: result.pathsChanged,
      });
    } catch (error) {
      handleRouteError(res, error, "Rides", "Delete");
    }
  });

  return router;
}
