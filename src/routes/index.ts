/**
 * Route Aggregator
 * Combines all route modules and mounts them under /api
 *
 * ROUTE MODULES:
 * --------------
 * | Module  | Path                    | Description                         |
 * |---------|-------------------------|-------------------------------------|
 * | paths   | /paths, /path-types     | Path network with coverage          |
 * | stats   | /stats, /areas          | Coverage statistics                 |
 * | rides   | /rides                  | GPX upload, listing and deletion    |
 * | network | /network                | Path network import                 |
 */

import { Router } from "express";
import type { CoverageEngine } from "../engine/index.js";
import { createPathsRouter } from "./paths.routes.js";
import { createStatsRouter } from "./stats.routes.js";
import { createRidesRouter } from "./rides.routes.js";
import { createNetworkRouter } from "./network.routes.js";

export function createApiRouter(engine: CoverageEngine): Router {
  const router = Router();

  // Mount route modules
  router.use("/", createPathsRouter(engine));
  router.use("/", createStatsRouter(engine));
  router.use("/rides", createRidesRouter(engine));
  router.use("/network", createNetworkRouter(engine));

  return router;
}
