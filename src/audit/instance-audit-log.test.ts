import type { PGlite } from "@electric-sql/pglite";
import { eq } from "drizzle-orm";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import type { DrizzleDb } from "../db/index.js";
import { instanceEvents } from "../db/schema/index.js";
import { createTestDb, truncateAllTables } from "../test/db.js";
import { DrizzleInstanceEventRepository, type IInstanceEventRepository } from "./audit-log-repository.js";
import { BufferedAuditSink, InstanceAuditLog } from "./instance-audit-log.js";

vi.mock("../observability/sentry.js", () => ({ captureError: vi.fn() }));

import { captureError } from "../observability/sentry.js";

let pool: PGlite;
let db: DrizzleDb;

beforeAll(async () => {
  ({ db, pool } = await createTestDb());
});

afterAll(async () => {
  await pool.close();
});

describe("InstanceAuditLog", () => {
  let now: number;
  let audit: InstanceAuditLog;

  beforeEach(async () => {
    await truncateAllTables(pool);
    vi.clearAllMocks();
    now = 1_700_000_000_000;
    audit = new InstanceAuditLog(new DrizzleInstanceEventRepository(db), () => now);
  });

  async function seed(): Promise<void> {
    await audit.record({ action: "instance.created", principalId: "alice", instanceId: "i-1", challengeId: "web" });
    now += 1000;
    await audit.record({ action: "flag.issued", principalId: "alice", instanceId: "i-1", challengeId: "web" });
    now += 1000;
    await audit.record({
      action: "instance.extended",
      principalId: "alice",
      instanceId: "i-1",
      challengeId: "web",
      details: { oldExpiresAt: 100, newExpiresAt: 200, extensionNumber: 1 },
    });
    now += 1000;
    await audit.record({ action: "instance.created", principalId: "bob", instanceId: "i-2", challengeId: "pwn" });
    now += 1000;
    await audit.record({ action: "instance.stopped_auto", principalId: null, instanceId: "i-2", challengeId: "pwn" });
  }

  it("records an event with JSON details and a timestamp", async () => {
    await audit.record({
      action: "instance.extended",
      principalId: "alice",
      instanceId: "i-1",
      challengeId: "web",
      details: { extensionNumber: 1 },
    });

    const { entries, total } = await audit.query();
    expect(total).toBe(1);
    expect(entries[0]).toMatchObject({
      principal_id: "alice",
      instance_id: "i-1",
      challenge_id: "web",
      action: "instance.extended",
      timestamp: 1_700_000_000_000,
      details: '{"extensionNumber":1}',
    });
  });

  it("stores null ids for system events", async () => {
    await audit.record({ action: "flag.key_rotated", details: { keyId: 2 } });
    const { entries } = await audit.query();
    expect(entries[0]).toMatchObject({
      principal_id: null,
      instance_id: null,
      challenge_id: null,
      details: '{"keyId":2}',
    });
  });

  it("returns newest first by default and chronological with order asc", async () => {
    await seed();

    const desc = await audit.query({ instanceId: "i-1" });
    expect(desc.entries.map((e) => e.action)).toEqual(["instance.extended", "flag.issued", "instance.created"]);

    const asc = await audit.query({ instanceId: "i-1", order: "asc" });
    expect(asc.entries.map((e) => e.action)).toEqual(["instance.created", "flag.issued", "instance.extended"]);
  });

  it("orders events in the same millisecond by insertion", async () => {
    await audit.record({ action: "instance.created", instanceId: "i-9" });
    await audit.record({ action: "flag.issued", instanceId: "i-9" });
    const { entries } = await audit.query({ instanceId: "i-9", order: "asc" });
    expect(entries.map((e) => e.action)).toEqual(["instance.created", "flag.issued"]);
  });

  it("filters by principal, challenge and action wildcard", async () => {
    await seed();

    expect((await audit.query({ principalId: "bob" })).total).toBe(1);
    expect((await audit.query({ challengeId: "pwn" })).total).toBe(2);
    expect((await audit.query({ action: "instance.created" })).total).toBe(2);

    const instanceActions = await audit.query({ action: "instance.*" });
    expect(instanceActions.total).toBe(4);
    expect(instanceActions.entries.every((e) => e.action.startsWith("instance."))).toBe(true);
  });

  it("filters by inclusive time range", async () => {
    await seed();
    const { entries } = await audit.query({ since: 1_700_000_001_000, until: 1_700_000_003_000, order: "asc" });
    expect(entries.map((e) => e.action)).toEqual(["flag.issued", "instance.extended", "instance.created"]);
  });

  it("applies limit and offset and reports the unpaged total", async () => {
    await seed();
    const page = await audit.query({ limit: 2, offset: 1 });
    expect(page.total).toBe(5);
    expect(page.entries.map((e) => e.action)).toEqual(["instance.created", "instance.extended"]);
  });

  it("caps limit at 250", async () => {
    for (let i = 0; i < 260; i++) {
      await audit.record({ action: "flag.validated", instanceId: "i-bulk" });
    }
    const { entries, total } = await audit.query({ instanceId: "i-bulk", limit: 10_000 });
    expect(total).toBe(260);
    expect(entries).toHaveLength(250);
  });

  it("rejects updates and deletes at the storage layer", async () => {
    await seed();
    await expect(db.update(instanceEvents).set({ action: "tampered" })).rejects.toThrow(/append-only/);
    await expect(db.delete(instanceEvents).where(eq(instanceEvents.instanceId, "i-1"))).rejects.toThrow(
      /append-only/,
    );
    expect((await audit.query()).total).toBe(5);
  });

  it("never throws when the write fails, and reports the failure", async () => {
    const failing: IInstanceEventRepository = {
      insert: vi.fn().mockRejectedValue(new Error("disk full")),
      query: vi.fn().mockResolvedValue([]),
      count: vi.fn().mockResolvedValue(0),
      all: vi.fn().mockResolvedValue([]),
    };
    const log = new InstanceAuditLog(failing);

    await expect(log.record({ action: "instance.created", instanceId: "i-1" })).resolves.toBeUndefined();
    expect(captureError).toHaveBeenCalledWith(expect.any(Error), {
      instanceId: "i-1",
      operation: "audit.record",
      extra: { action: "instance.created" },
    });
  });

  it("exports CSV with escaped details", async () => {
    await audit.record({
      action: "instance.extended",
      principalId: "alice",
      instanceId: "i-1",
      challengeId: "web",
      details: { extensionNumber: 1 },
    });
    const csv = await audit.exportCsv();
    const [header, line] = csv.split("\n");
    expect(header).toBe("id,timestamp,action,principal_id,instance_id,challenge_id,details");
    expect(line).toMatch(/^[0-9a-f-]{36},1700000000000,instance\.extended,alice,i-1,web,"\{""extensionNumber"":1\}"$/);
  });
});

describe("BufferedAuditSink", () => {
  it("holds events until flushed, then forwards them in order", async () => {
    const recorded: string[] = [];
    const target = { record: vi.fn(async (e: { action: string }) => void recorded.push(e.action)) };
    const buffer = new BufferedAuditSink();

    await buffer.record({ action: "flag.issued", instanceId: "i-1" });
    await buffer.record({ action: "flag.validated", instanceId: "i-1" });
    expect(target.record).not.toHaveBeenCalled();

    await buffer.flushTo(target);
    expect(recorded).toEqual(["flag.issued", "flag.validated"]);

    await buffer.flushTo(target);
    expect(target.record).toHaveBeenCalledTimes(2);
  });
});
