/**
 * Store selection shared by the server and the scripts.
 * PostgreSQL when DATABASE_URL is set, process memory otherwise.
 */

import { hasDatabase } from "./pg.js";
import {
  MemoryCoverageStore,
  type CoverageStore,
} from "../services/coverage-store.service.js";
import { PgCoverageStore } from "../services/pg-coverage-store.service.js";

export function createCoverageStore(tag: string): CoverageStore {
  if (hasDatabase()) {
    return new PgCoverageStore();
  }
  console.warn(`[${tag}] DATABASE_URL not set, using in-memory store (state is lost on exit)`);
  return new MemoryCoverageStore();
}
