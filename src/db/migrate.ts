import path from "node:path";
import { fileURLToPath } from "node:url";
import { drizzle } from "drizzle-orm/node-postgres";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import type { Pool } from "pg";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// __dirname = <root>/dist/db  OR  <root>/src/db
export const MIGRATIONS_FOLDER = path.resolve(__dirname, "../../drizzle/migrations");

/**
 * Apply all pending Drizzle migrations. The ledger lives in
 * drizzle.__drizzle_migrations, outside the public schema.
 */
export async function runMigrations(pool: Pool): Promise<void> {
  await migrate(drizzle(pool), { migrationsFolder: MIGRATIONS_FOLDER });
}
