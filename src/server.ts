// Load environment variables FIRST (before any other imports that might need them)
import "dotenv/config";

import { createApp } from "./app.js";
import { CoverageEngine, loadCoverageConfig } from "./engine/index.js";
import { createCoverageStore } from "./lib/store.js";
import { getEnvNumber } from "./config/constants.js";

const PORT = getEnvNumber("PORT", 3000);

async function main(): Promise<void> {
  const store = createCoverageStore("Server");
  const engine = await CoverageEngine.load(store, loadCoverageConfig());
  const app = createApp(engine);

  const server = app.listen(PORT, () => {
    console.log("[Server] Bridleway Log API is running");
    console.log(`[Server] Port: ${PORT}`);
    console.log(`[Server] Environment: ${process.env.NODE_ENV ?? "development"}`);
    console.log(`[Server] Store: ${store.kind}`);
    console.log(`[Server] URL: http://localhost:${PORT}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error("[Server] Error during shutdown:", error);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("[Server] Failed to start:", error);
  process.exit(1);
});
