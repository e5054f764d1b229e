import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { migrate } from "drizzle-orm/pglite/migrator";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MIGRATIONS_FOLDER } from "./migrate.js";
import * as schema from "./schema/index.js";

describe("drizzle migrations", () => {
  let pool: PGlite;

  beforeEach(() => {
    pool = new PGlite();
  });

  afterEach(async () => {
    await pool.close();
  });

  async function applyAll(): Promise<void> {
    await migrate(drizzle(pool, { schema }), { migrationsFolder: MIGRATIONS_FOLDER });
  }

  async function ledgerSize(): Promise<number> {
    const result = await pool.query<{ n: number }>("SELECT count(*)::int AS n FROM drizzle.__drizzle_migrations");
    return result.rows[0]?.n ?? -1;
  }

  it("creates every table in a fresh database", async () => {
    await applyAll();

    const tables = await pool.query<{ tablename: string }>(
      "SELECT tablename FROM pg_tables WHERE schemaname = 'public' ORDER BY tablename",
    );
    expect(tables.rows.map((r) => r.tablename)).toEqual([
      "credential_keys",
      "instance_credentials",
      "instance_events",
      "instances",
      "runtime_policies",
    ]);
    expect(await ledgerSize()).toBe(2);
  });

  it("applies nothing on a second run", async () => {
    await applyAll();
    await applyAll();
    expect(await ledgerSize()).toBe(2);
  });

  it("installs the append-only trigger on instance_events", async () => {
    await applyAll();
    await pool.query(
      "INSERT INTO instance_events (id, action, timestamp) VALUES ('evt-1', 'instance.created', 1000)",
    );

    await expect(pool.query("UPDATE instance_events SET action = 'x' WHERE id = 'evt-1'")).rejects.toThrow(
      "instance_events is append-only (UPDATE rejected)",
    );
    await expect(pool.query("DELETE FROM instance_events WHERE id = 'evt-1'")).rejects.toThrow(
      "instance_events is append-only (DELETE rejected)",
    );
  });
});
