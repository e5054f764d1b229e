import { and, eq, isNull, ne } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { credentialKeys, instanceCredentials } from "../db/schema/index.js";

export interface CredentialRow {
  instanceId: string;
  /** Serialized EncryptedPayload */
  ciphertext: string;
  keyId: number;
  /** Epoch ms */
  createdAt: number;
}

/** Repository interface for instance-bound encrypted flags. */
export interface ICredentialRepository {
  /** Insert a binding. Returns false when the instance already has one. */
  insert(row: CredentialRow): Promise<boolean>;
  get(instanceId: string): Promise<CredentialRow | null>;
  /** Returns true if a row was removed. */
  delete(instanceId: string): Promise<boolean>;
  /** Rows encrypted under any key other than `keyId`. */
  listNotUnderKey(keyId: number, limit: number): Promise<CredentialRow[]>;
  /** Replace the ciphertext only if the row is still under `expectedKeyId`. */
  replaceCiphertext(instanceId: string, expectedKeyId: number, ciphertext: string, keyId: number): Promise<boolean>;
  /** Id of the key ring's current key as stored, or null for an empty ring. */
  currentKeyId(): Promise<number | null>;
}

export class DrizzleCredentialRepository implements ICredentialRepository {
  constructor(private readonly db: DrizzleDb) {}

  async insert(row: CredentialRow): Promise<boolean> {
    const inserted = await this.db
      .insert(instanceCredentials)
      .values(row)
      .onConflictDoNothing({ target: instanceCredentials.instanceId })
      .returning({ instanceId: instanceCredentials.instanceId });
    return inserted.length > 0;
  }

  async get(instanceId: string): Promise<CredentialRow | null> {
    const rows = await this.db
      .select()
      .from(instanceCredentials)
      .where(eq(instanceCredentials.instanceId, instanceId))
      .limit(1);
    return rows[0] ?? null;
  }

  async delete(instanceId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(instanceCredentials)
      .where(eq(instanceCredentials.instanceId, instanceId))
      .returning({ instanceId: instanceCredentials.instanceId });
    return deleted.length > 0;
  }

  async listNotUnderKey(keyId: number, limit: number): Promise<CredentialRow[]> {
    return this.db.select().from(instanceCredentials).where(ne(instanceCredentials.keyId, keyId)).limit(limit);
  }

  async replaceCiphertext(
    instanceId: string,
    expectedKeyId: number,
    ciphertext: string,
    keyId: number,
  ): Promise<boolean> {
    const updated = await this.db
      .update(instanceCredentials)
      .set({ ciphertext, keyId })
      .where(and(eq(instanceCredentials.instanceId, instanceId), eq(instanceCredentials.keyId, expectedKeyId)))
      .returning({ instanceId: instanceCredentials.instanceId });
    return updated.length > 0;
  }

  async currentKeyId(): Promise<number | null> {
    const rows = await this.db
      .select({ keyId: credentialKeys.keyId })
      .from(credentialKeys)
      .where(isNull(credentialKeys.retiredAt))
      .limit(1);
    return rows[0]?.keyId ?? null;
  }
}
