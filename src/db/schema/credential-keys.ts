import { bigint, integer, pgTable } from "drizzle-orm/pg-core";

/**
 * Key ring bookkeeping. Key material is derived from the master secret and
 * never stored; this table only records which key ids exist and which one is
 * current (the single row with retired_at IS NULL).
 */
export const credentialKeys = pgTable("credential_keys", {
  keyId: integer("key_id").primaryKey(),
  /** Unix epoch milliseconds */
  activatedAt: bigint("activated_at", { mode: "number" }).notNull(),
  retiredAt: bigint("retired_at", { mode: "number" }),
});
