import { bigint, integer, pgTable, text } from "drizzle-orm/pg-core";

/** Per-challenge runtime policy overrides. challenge_id '*' is the global default. */
export const runtimePolicies = pgTable("runtime_policies", {
  challengeId: text("challenge_id").primaryKey(),
  baseRuntimeSeconds: integer("base_runtime_s").notNull(),
  extensionIncrementSeconds: integer("extension_increment_s").notNull(),
  maxExtensions: integer("max_extensions").notNull(),
  maxLifetimeSeconds: integer("max_lifetime_s").notNull(),
  updatedBy: text("updated_by"),
  /** Unix epoch milliseconds */
  updatedAt: bigint("updated_at", { mode: "number" }).notNull(),
});
