import { asc, eq, inArray } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { runtimePolicies } from "../db/schema/index.js";
import type { RuntimePolicy } from "./policy-schema.js";

export type PolicyRow = typeof runtimePolicies.$inferSelect;

/** Repository interface for stored runtime policies (overrides and the '*' default). */
export interface IPolicyRepository {
  /** Rows for the given keys; missing keys are simply absent. */
  getMany(challengeIds: string[]): Promise<PolicyRow[]>;
  upsert(challengeId: string, policy: RuntimePolicy, updatedBy: string | null, now: number): Promise<void>;
  /** Returns true if a row was removed. */
  delete(challengeId: string): Promise<boolean>;
  list(): Promise<PolicyRow[]>;
}

export class DrizzlePolicyRepository implements IPolicyRepository {
  constructor(private readonly db: DrizzleDb) {}

  async getMany(challengeIds: string[]): Promise<PolicyRow[]> {
    if (challengeIds.length === 0) return [];
    return this.db.select().from(runtimePolicies).where(inArray(runtimePolicies.challengeId, challengeIds));
  }

  async upsert(challengeId: string, policy: RuntimePolicy, updatedBy: string | null, now: number): Promise<void> {
    await this.db
      .insert(runtimePolicies)
      .values({ challengeId, ...policy, updatedBy, updatedAt: now })
      .onConflictDoUpdate({
        target: runtimePolicies.challengeId,
        set: { ...policy, updatedBy, updatedAt: now },
      });
  }

  async delete(challengeId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(runtimePolicies)
      .where(eq(runtimePolicies.challengeId, challengeId))
      .returning({ challengeId: runtimePolicies.challengeId });
    return deleted.length > 0;
  }

  async list(): Promise<PolicyRow[]> {
    return this.db.select().from(runtimePolicies).orderBy(asc(runtimePolicies.challengeId));
  }
}
