import { sql } from "drizzle-orm";
import { bigint, check, index, integer, pgTable, text, uniqueIndex } from "drizzle-orm/pg-core";

/**
 * One provisioned challenge workload per row.
 *
 * Status transitions are owned by the lifecycle manager and always happen
 * under a row lock (see DrizzleInstanceRepository.withInstanceLock).
 */
export const instances = pgTable(
  "instances",
  {
    /** UUID, never reused */
    id: text("id").primaryKey(),
    /** Owning user or team; opaque to this service */
    principalId: text("principal_id").notNull(),
    challengeId: text("challenge_id").notNull(),
    /** provisioning | running | terminated | failed */
    status: text("status").notNull(),
    /** Unix epoch seconds */
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    /** Unix epoch seconds; absolute deadline */
    expiresAt: bigint("expires_at", { mode: "number" }).notNull(),
    extensionCount: integer("extension_count").notNull().default(0),
    lastExtendedAt: bigint("last_extended_at", { mode: "number" }),
    /** Provisioner handle, set once the workload is running */
    workloadHandle: text("workload_handle"),
    terminatedAt: bigint("terminated_at", { mode: "number" }),
    /** manual | auto */
    terminationReason: text("termination_reason"),
    failureReason: text("failure_reason"),
  },
  (t) => [
    uniqueIndex("uq_instances_active_owner")
      .on(t.principalId, t.challengeId)
      .where(sql`${t.status} in ('provisioning', 'running')`),
    index("idx_instances_status_expires").on(t.status, t.expiresAt),
    index("idx_instances_principal").on(t.principalId),
    check("chk_instances_extension_count", sql`${t.extensionCount} >= 0`),
    check("chk_instances_expires_after_created", sql`${t.expiresAt} >= ${t.createdAt}`),
  ],
);
