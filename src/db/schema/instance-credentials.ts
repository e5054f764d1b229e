import { bigint, index, integer, pgTable, text } from "drizzle-orm/pg-core";

/**
 * Encrypted flag bound 1:1 to an instance. The primary key on instance_id is
 * the binding: a second insert for the same instance fails.
 */
export const instanceCredentials = pgTable(
  "instance_credentials",
  {
    instanceId: text("instance_id").primaryKey(),
    /** JSON-serialized EncryptedPayload (AES-256-GCM, hex fields) */
    ciphertext: text("ciphertext").notNull(),
    /** credential_keys.key_id that produced the ciphertext */
    keyId: integer("key_id").notNull(),
    /** Unix epoch milliseconds */
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
  },
  (t) => [index("idx_instance_credentials_key").on(t.keyId)],
);
