import type { PGlite } from "@electric-sql/pglite";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import type { DrizzleDb } from "../db/index.js";
import { captureMessage } from "../observability/sentry.js";
import { createTestDb, seedInstance, truncateAllTables } from "../test/db.js";
import { buildLifecycle, type LifecycleHarness } from "../test/lifecycle.js";
import { ExpiryReaper } from "./expiry-reaper.js";
import { ProvisionerRejectedError } from "./provisioner.js";

vi.mock("../observability/sentry.js", () => ({
  initSentry: vi.fn(),
  captureError: vi.fn(),
  captureMessage: vi.fn(),
}));

let pool: PGlite;
let db: DrizzleDb;

beforeAll(async () => {
  ({ db, pool } = await createTestDb());
});

afterAll(async () => {
  await pool.close();
});

describe("ExpiryReaper", () => {
  let h: LifecycleHarness;
  let reaper: ExpiryReaper;

  beforeEach(async () => {
    await truncateAllTables(pool);
    h = await buildLifecycle(db);
    reaper = new ExpiryReaper(h.lifecycle, { intervalMs: 10, batchSize: 2 });
  });

  afterEach(async () => {
    await reaper.stop();
    vi.restoreAllMocks();
    vi.mocked(captureMessage).mockClear();
  });

  async function status(id: string): Promise<string | undefined> {
    return (await h.lifecycle.getInstance(id))?.status;
  }

  it("stops overdue instances and leaves the rest running", async () => {
    const overdue = await h.lifecycle.create("user-1", "web-101");
    h.clock.advance(500);
    const fresh = await h.lifecycle.create("user-2", "web-101");
    h.clock.advance(400);

    const result = await reaper.sweep();

    expect(result).toEqual({ examined: 1, expired: 1, skipped: 0, failed: 0, abandoned: 0 });
    expect(await status(overdue.instance.id)).toBe("terminated");
    expect(await status(fresh.instance.id)).toBe("running");
    expect(captureMessage).not.toHaveBeenCalled();
  });

  it("keeps going across batches when one instance fails", async () => {
    const ids: string[] = [];
    for (const principal of ["user-1", "user-2", "user-3"]) {
      ids.push((await h.lifecycle.create(principal, "web-101")).instance.id);
    }
    const bad = ids[1];
    h.provisioner.stop.mockImplementation(async (handle) => {
      if (handle === `ctr-${bad}`) throw new ProvisionerRejectedError("refused");
    });
    h.clock.advance(900);

    const result = await reaper.sweep();

    expect(result).toEqual({ examined: 3, expired: 2, skipped: 0, failed: 1, abandoned: 0 });
    expect(await status(ids[0] ?? "")).toBe("terminated");
    expect(await status(bad ?? "")).toBe("running");
    expect(await status(ids[2] ?? "")).toBe("terminated");
    expect(captureMessage).toHaveBeenCalledWith("Expiry sweep failed for 1 of 3 overdue instances", "warning");
  });

  it("counts an expire that throws as failed", async () => {
    await h.lifecycle.create("user-1", "web-101");
    h.clock.advance(900);
    vi.spyOn(h.lifecycle, "expire").mockRejectedValueOnce(new Error("boom"));

    const result = await reaper.sweep();

    expect(result.failed).toBe(1);
    expect(result.expired).toBe(0);
  });

  it("skips an instance extended between listing and expiry", async () => {
    const { instance } = await h.lifecycle.create("user-1", "web-101");
    h.clock.advance(900);
    const list = h.lifecycle.listExpiredIds.bind(h.lifecycle);
    vi.spyOn(h.lifecycle, "listExpiredIds").mockImplementation(async (limit) => {
      const ids = await list(limit);
      await h.lifecycle.extend(instance.id, { type: "principal", principalId: "user-1" });
      return ids;
    });

    const result = await reaper.sweep();

    expect(result).toEqual({ examined: 1, expired: 0, skipped: 1, failed: 0, abandoned: 0 });
    expect(await status(instance.id)).toBe("running");
    expect(h.provisioner.stop).not.toHaveBeenCalled();
  });

  it("fails provisioning rows abandoned past the threshold", async () => {
    await seedInstance(db, { id: "stuck", status: "provisioning", createdAt: 999_000, workloadHandle: null });

    const result = await reaper.sweep();

    expect(result.abandoned).toBe(1);
    expect(await status("stuck")).toBe("failed");
  });

  it("shares one pass between overlapping sweep calls", async () => {
    await h.lifecycle.create("user-1", "web-101");
    h.clock.advance(900);

    const [first, second] = await Promise.all([reaper.sweep(), reaper.sweep()]);

    expect(first).toEqual(second);
    expect(first.expired).toBe(1);
    expect(h.provisioner.stop).toHaveBeenCalledTimes(1);
  });

  it("sweeps on its interval until stopped", async () => {
    const { instance } = await h.lifecycle.create("user-1", "web-101");
    h.clock.advance(900);

    reaper.start();
    expect(reaper.isRunning()).toBe(true);

    await vi.waitFor(async () => expect(await status(instance.id)).toBe("terminated"), { timeout: 5000 });

    await reaper.stop();
    expect(reaper.isRunning()).toBe(false);
  });

  it("ignores a second start", () => {
    reaper.start();
    reaper.start();
    expect(reaper.isRunning()).toBe(true);
  });
});
