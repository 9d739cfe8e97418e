/**
 * Express application
 * Built around an engine so tests can run it without a server or database.
 */

import express, { Application, NextFunction, Request, Response } from "express";
import cors from "cors";
import { createApiRouter } from "./routes/index.js";
import docsRoutes from "./routes/docs.routes.js";
import { API, ERROR_CODES, FRONTEND_URL } from "./config/constants.js";
import type { CoverageEngine } from "./engine/index.js";
import { sendError } from "./utils/route-errors.js";

export function createApp(engine: CoverageEngine): Application {
  const app: Application = express();

  // Middleware
  app.use(
    cors({
      origin: FRONTEND_URL,
      credentials: true,
    })
  );
  app.use(express.json({ limit: "50mb" }));
  app.use(express.urlencoded({ extended: true }));

  // Documentation Routes (mounted before API for /docs prefix)
  app.use("/docs", docsRoutes);

  // API Routes
  app.use(API.PREFIX, createApiRouter(engine));

  // Health check route
  app.get("/health", (req: Request, res: Response) => {
    res.json({
      status: "ok",
      network_loaded: engine.isNetworkLoaded(),
      paths: engine.pathCount,
      rides: engine.rideCount,
      store: engine.storeKind,
    });
  });

  // Root route
  app.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Welcome to Bridleway Log API",
      version: "1.0.0",
      documentation: "/docs",
      endpoints: {
        health: "/health",
        docs: "/docs",
        api: "/docs/api",
        paths: `${API.PREFIX}/paths`,
        stats: `${API.PREFIX}/stats`,
        rides: `${API.PREFIX}/rides`,
        networkImport: `${API.PREFIX}/network/import`,
      },
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    sendError(res, 404, `Route not found: ${req.path}`, ERROR_CODES.NOT_FOUND);
  });

  // Body parser and other middleware errors
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendError(res, 400, "Request body is not valid JSON", ERROR_CODES.VALIDATION_ERROR);
      return;
    }
    console.error("[Server] Unhandled error:", error);
    sendError(res, 500, "Internal server error", ERROR_CODES.INTERNAL_ERROR);
  });

  return app;
}
