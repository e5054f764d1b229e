/**
 * Drizzle-kit generates migrations from schema diffs. After changing src/db/schema/,
 * run `npm run db:generate` and review the generated SQL before committing.
 * Triggers and functions go in custom migrations (`npm run db:generate -- --custom`).
 */
import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: [
    "./src/db/schema/credential-keys.ts",
    "./src/db/schema/instance-credentials.ts",
    "./src/db/schema/instance-events.ts",
    "./src/db/schema/instances.ts",
    "./src/db/schema/runtime-policies.ts",
  ],
  out: "./drizzle/migrations",
  dialect: "postgresql",
  dbCredentials: { url: process.env.DATABASE_URL || "postgres://localhost:5432/instances" },
});
