/**
 * Import a rights-of-way GeoJSON file into the path network.
 *
 * Every stored ride is re-matched against the resulting network.
 *
 * Usage (from project root):
 *   npx tsx src/scripts/import-network.ts <file.geojson> [--replace]
 *   npm run import:network -- <file.geojson> [--replace]
 *
 * Without --replace the file extends the current network; paths whose id is
 * already present are rejected. With --replace it becomes the whole network.
 *
 * Uses DATABASE_URL from .env when set. Without it the import only runs
 * against an in-memory store, which is useful to validate a file.
 */

import "dotenv/config";

import fs from "fs";
import { CoverageEngine, loadCoverageConfig } from "../engine/index.js";
import { createCoverageStore } from "../lib/store.js";
import {
  decodeNetworkBuffer,
  importNetworkGeoJson,
} from "../services/network-import.service.js";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const replace = args.includes("--replace");
  const file = args.find((arg) => !arg.startsWith("--"));

  if (!file) {
    console.error("Usage: import-network <file.geojson> [--replace]");
    process.exit(1);
  }

  const store = createCoverageStore("Import");
  try {
    const engine = await CoverageEngine.load(store, loadCoverageConfig());
    const json = decodeNetworkBuffer(fs.readFileSync(file));

    console.log(`[Import] Importing ${file}${replace ? " (replace)" : ""}...`);
    const result = await importNetworkGeoJson(engine, json, { replace });

    for (const rejection of result.rejected) {
      console.warn(
        `[Import] Feature ${rejection.index} (${rejection.sourceFid ?? "no id"}): ${rejection.reason}`
      );
    }
    console.log(
      `[Import] Done. ${result.imported} imported, ${result.rejected.length} rejected, ` +
        `${result.totalPaths} paths in network, ${result.pathsChanged.length} with changed coverage, ` +
        `${result.ridesRematched} rides re-matched.`
    );
  } finally {
    await store.close();
  }
}

main()
  .then(() => process.exit(0))
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
