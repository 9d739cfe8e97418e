/**
 * Statistics API Endpoints
 *
 * | Method | Path    | Description                                   |
 * |--------|---------|-----------------------------------------------|
 * | GET    | /stats  | Network totals, by path type and by area      |
 * | GET    | /areas  | Distinct areas in the network                 |
 */

import { Router, Request, Response } from "express";
import type { CoverageEngine } from "../engine/index.js";
import { toStatsResponse } from "../utils/serializers.js";
import { handleRouteError } from "../utils/route-errors.js";

export function createStatsRouter(engine: CoverageEngine): Router {
  const router = Router();

  /**
   * @openapi
   * /stats:
   *   get:
   *     summary: Network coverage statistics
   *     description: |
   *       Totals over the current path state. Ridden length is length-weighted:
   *       a path ridden halfway adds half its length to ridden_length_km.
   *       Paths with no type or area are grouped under "Unknown".
   *     tags: [Stats]
   *     responses:
   *       200:
   *         description: Statistics
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/StatsResponse'
   *       503:
   *         description: No network imported yet
   */
  router.get("/stats", (req: Request, res: Response) => {
    try {
      res.status(200).json(toStatsResponse(engine.getStatistics()));
    } catch (error) {
      handleRouteError(res, error, "Stats", "Stats");
    }
  });

  /**
   * @openapi
   * /areas:
   *   get:
   *     summary: Distinct areas
   *     tags: [Stats]
   *     responses:
   *       200:
   *         description: Sorted area names
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 areas:
   *                   type: array
   *                   items:
   *                     type: string
   */
  router.get("/areas", (req: Request, res: Response) => {
    res.status(200).json({ areas: engine.listAreas() });
  });

  return router;
}
