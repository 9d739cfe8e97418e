/**
 * PostgreSQL Pool Singleton
 * Ensures a single connection pool across the application
 * Uses lazy initialization so DATABASE_URL is read after dotenv has loaded
 */

import pg from "pg";

const { Pool } = pg;

let pool: pg.Pool | null = null;

/**
 * Whether a database is configured for this process.
 */
export function hasDatabase(): boolean {
  return Boolean(process.env.DATABASE_URL);
}

/**
 * Get or create the pool singleton
 *
 * @throws Error if DATABASE_URL is not set
 */
export function getPool(): pg.Pool {
  if (pool) {
    return pool;
  }

  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("DATABASE_URL environment variable is not set");
  }

  pool = new Pool({
    connectionString: databaseUrl,
    // Hosted Postgres (Supabase and similar) requires SSL
    ssl: databaseUrl.includes("supabase") ? { rejectUnauthorized: false } : undefined,
  });

  pool.on("error", (error) => {
    console.error("[Store] Idle PostgreSQL client error:", error.message);
  });

  return pool;
}
