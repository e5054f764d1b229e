import { bigint, bigserial, index, pgTable, text } from "drizzle-orm/pg-core";

/**
 * Append-only lifecycle and credential audit trail.
 * No foreign keys: events outlive the instances and principals they mention.
 * A trigger (see migrations) rejects UPDATE and DELETE.
 */
export const instanceEvents = pgTable(
  "instance_events",
  {
    id: text("id").primaryKey(),
    /** Insertion order; breaks ties between events in the same millisecond */
    seq: bigserial("seq", { mode: "number" }).notNull(),
    /** NULL for system-initiated events */
    principalId: text("principal_id"),
    /** NULL when creation failed before an instance existed */
    instanceId: text("instance_id"),
    challengeId: text("challenge_id"),
    action: text("action").notNull(),
    /** Unix epoch milliseconds */
    timestamp: bigint("timestamp", { mode: "number" }).notNull(),
    /** JSON object */
    details: text("details").notNull().default("{}"),
  },
  (t) => [
    index("idx_instance_events_principal_time").on(t.principalId, t.timestamp),
    index("idx_instance_events_challenge_time").on(t.challengeId, t.timestamp),
    index("idx_instance_events_instance_time").on(t.instanceId, t.timestamp),
    index("idx_instance_events_action_time").on(t.action, t.timestamp),
  ],
);
