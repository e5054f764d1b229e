import type { SQL } from "drizzle-orm";
import { and, asc, count, desc, eq, gte, like, lte } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { instanceEvents } from "../db/schema/index.js";
import type { InstanceEventFilters, InstanceEventRow } from "./events.js";

/** Repository interface for the instance audit trail. Append and read only. */
export interface IInstanceEventRepository {
  insert(row: InstanceEventRow): Promise<void>;
  /** Entries matching filters, paged by limit/offset. */
  query(filters: InstanceEventFilters): Promise<InstanceEventRow[]>;
  count(filters: Omit<InstanceEventFilters, "limit" | "offset" | "order">): Promise<number>;
  /** Every entry matching filters, unpaged (CSV export). */
  all(filters: Omit<InstanceEventFilters, "limit" | "offset">): Promise<InstanceEventRow[]>;
}

export const MAX_LIMIT = 250;
export const DEFAULT_LIMIT = 50;

/** Build Drizzle WHERE conditions from filters. */
function buildConditions(filters: Omit<InstanceEventFilters, "limit" | "offset" | "order">): SQL | undefined {
  const conditions: SQL[] = [];

  if (filters.principalId) {
    conditions.push(eq(instanceEvents.principalId, filters.principalId));
  }

  if (filters.challengeId) {
    conditions.push(eq(instanceEvents.challengeId, filters.challengeId));
  }

  if (filters.instanceId) {
    conditions.push(eq(instanceEvents.instanceId, filters.instanceId));
  }

  if (filters.action) {
    if (filters.action.endsWith(".*")) {
      const prefix = filters.action.slice(0, -1); // "flag."
      conditions.push(like(instanceEvents.action, `${prefix}%`));
    } else {
      conditions.push(eq(instanceEvents.action, filters.action));
    }
  }

  if (filters.since != null) {
    conditions.push(gte(instanceEvents.timestamp, filters.since));
  }

  if (filters.until != null) {
    conditions.push(lte(instanceEvents.timestamp, filters.until));
  }

  return conditions.length > 0 ? and(...conditions) : undefined;
}

function ordering(order: "asc" | "desc" | undefined): SQL[] {
  return order === "asc"
    ? [asc(instanceEvents.timestamp), asc(instanceEvents.seq)]
    : [desc(instanceEvents.timestamp), desc(instanceEvents.seq)];
}

/** Map a Drizzle row to a snake_case InstanceEventRow. */
function toRow(r: typeof instanceEvents.$inferSelect): InstanceEventRow {
  return {
    id: r.id,
    principal_id: r.principalId,
    instance_id: r.instanceId,
    challenge_id: r.challengeId,
    action: r.action,
    timestamp: r.timestamp,
    details: r.details,
  };
}

export class DrizzleInstanceEventRepository implements IInstanceEventRepository {
  constructor(private readonly db: DrizzleDb) {}

  async insert(row: InstanceEventRow): Promise<void> {
    await this.db.insert(instanceEvents).values({
      id: row.id,
      principalId: row.principal_id,
      instanceId: row.instance_id,
      challengeId: row.challenge_id,
      action: row.action,
      timestamp: row.timestamp,
      details: row.details,
    });
  }

  async query(filters: InstanceEventFilters): Promise<InstanceEventRow[]> {
    const limit = Math.min(Math.max(1, filters.limit ?? DEFAULT_LIMIT), MAX_LIMIT);
    const offset = Math.max(0, filters.offset ?? 0);

    const rows = await this.db
      .select()
      .from(instanceEvents)
      .where(buildConditions(filters))
      .orderBy(...ordering(filters.order))
      .limit(limit)
      .offset(offset);

    return rows.map(toRow);
  }

  async count(filters: Omit<InstanceEventFilters, "limit" | "offset" | "order">): Promise<number> {
    const result = (await this.db.select({ count: count() }).from(instanceEvents).where(buildConditions(filters)))[0];
    return result?.count ?? 0;
  }

  async all(filters: Omit<InstanceEventFilters, "limit" | "offset">): Promise<InstanceEventRow[]> {
    const rows = await this.db
      .select()
      .from(instanceEvents)
      .where(buildConditions(filters))
      .orderBy(...ordering(filters.order));
    return rows.map(toRow);
  }
}
