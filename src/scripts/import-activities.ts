/**
 * Upload every GPX file in a folder as a ride.
 *
 * Reads *.gpx and gzipped *.gpx.gz files (as found in a fitness-platform
 * bulk export's activities folder). Files are added in name order, so
 * re-running over the same folder only reports duplicates.
 *
 * Usage (from project root):
 *   npx tsx src/scripts/import-activities.ts <folder>
 *   npm run import:activities -- <folder>
 *
 * Requires: DATABASE_URL in .env (otherwise nothing is kept)
 */

import "dotenv/config";

import fs from "fs";
import path from "path";
import { gunzipSync } from "zlib";
import { CoverageEngine, loadCoverageConfig, type RideInput } from "../engine/index.js";
import { createCoverageStore } from "../lib/store.js";
import { GpxParseError, gpxToRideInput } from "../services/gpx.service.js";

const GPX_EXTENSIONS = [".gpx", ".gpx.gz"];

function isGpxFile(name: string): boolean {
  const lower = name.toLowerCase();
  return GPX_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

function readGpx(filePath: string): Buffer {
  const raw = fs.readFileSync(filePath);
  return filePath.toLowerCase().endsWith(".gz") ? gunzipSync(raw) : raw;
}

function isZlibError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "errno" in error;
}

async function main(): Promise<void> {
  const folder = process.argv[2]?.trim();
  if (!folder) {
    console.error("Usage: import-activities <folder>");
    process.exit(1);
  }

  const files = fs.readdirSync(folder).filter(isGpxFile).sort();
  console.log(`[Import] Found ${files.length} GPX files in ${folder}`);

  const store = createCoverageStore("Import");
  try {
    const engine = await CoverageEngine.load(store, loadCoverageConfig());
    if (!engine.isNetworkLoaded()) {
      console.warn("[Import] No network imported yet; rides are stored and matched on import");
    }

    const inputs: RideInput[] = [];
    let unreadable = 0;
    for (const file of files) {
      try {
        inputs.push(gpxToRideInput(file, readGpx(path.join(folder, file))));
      } catch (error) {
        // A corrupt .gz fails in zlib before the GPX is ever parsed
        if (error instanceof GpxParseError || isZlibError(error)) {
          unreadable++;
          console.warn(`[Import] Skipped ${file}: ${error.message}`);
          continue;
        }
        throw error;
      }
    }

    const outcomes = await engine.addRides(inputs);
    for (const outcome of outcomes) {
      if (outcome.status === "rejected") {
        console.warn(`[Import] Rejected ${outcome.filename}: ${outcome.reason}`);
      }
    }

    const count = (status: string) => outcomes.filter((o) => o.status === status).length;
    console.log(
      `[Import] Done. ${count("created")} created, ${count("duplicate")} duplicates, ` +
        `${count("rejected") + unreadable} rejected.`
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
