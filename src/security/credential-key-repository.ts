import { asc, eq, isNull } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { credentialKeys } from "../db/schema/index.js";

export interface CredentialKeyRecord {
  keyId: number;
  /** Epoch ms */
  activatedAt: number;
  /** Epoch ms; null for the current key */
  retiredAt: number | null;
}

/** Repository interface for key ring bookkeeping. Never sees key material. */
export interface ICredentialKeyRepository {
  /** All keys, oldest first. */
  list(): Promise<CredentialKeyRecord[]>;
  /** Create key 1 as current when the ring is empty. No-op otherwise. */
  ensureInitial(now: number): Promise<void>;
  /** Retire the current key and activate the next id, atomically. Returns the new current key. */
  rotate(now: number): Promise<CredentialKeyRecord>;
}

export class DrizzleCredentialKeyRepository implements ICredentialKeyRepository {
  constructor(private readonly db: DrizzleDb) {}

  async list(): Promise<CredentialKeyRecord[]> {
    return this.db.select().from(credentialKeys).orderBy(asc(credentialKeys.keyId));
  }

  async ensureInitial(now: number): Promise<void> {
    const existing = await this.db.select({ keyId: credentialKeys.keyId }).from(credentialKeys).limit(1);
    if (existing.length > 0) return;
    await this.db.insert(credentialKeys).values({ keyId: 1, activatedAt: now, retiredAt: null }).onConflictDoNothing();
  }

  async rotate(now: number): Promise<CredentialKeyRecord> {
    return this.db.transaction(async (tx) => {
      const current = (await tx.select().from(credentialKeys).where(isNull(credentialKeys.retiredAt)).for("update"))[0];
      if (!current) {
        throw new Error("Credential key ring has no current key (concurrent rotation or uninitialized ring)");
      }
      await tx.update(credentialKeys).set({ retiredAt: now }).where(eq(credentialKeys.keyId, current.keyId));
      const next: CredentialKeyRecord = { keyId: current.keyId + 1, activatedAt: now, retiredAt: null };
      await tx.insert(credentialKeys).values(next);
      return next;
    });
  }
}
