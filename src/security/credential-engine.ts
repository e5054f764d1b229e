import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";
import type { AuditSink } from "../audit/instance-audit-log.js";
import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import type { ICredentialRepository } from "./credential-repository.js";
import { decrypt, encrypt, parsePayload, serializePayload } from "./encryption.js";
import { type FlagFormat, generateFlag } from "./flag-format.js";
import type { FlagKeyring } from "./keyring.js";
import {
  type ActiveKey,
  DuplicateBindingError,
  type IssuedCredential,
  KeyringConfigurationError,
  type ValidationContext,
} from "./types.js";

// Per-process key for comparisons. Both sides are MACed before timingSafeEqual,
// so comparison time depends on neither length nor shared prefix.
const COMPARE_KEY = randomBytes(32);

/** Constant-time string equality. */
export function constantTimeEquals(a: string, b: string): boolean {
  const da = createHmac("sha256", COMPARE_KEY).update(a, "utf-8").digest();
  const db = createHmac("sha256", COMPARE_KEY).update(b, "utf-8").digest();
  return timingSafeEqual(da, db);
}

export interface RewrapResult {
  rewrapped: number;
  /** Rows revoked or rewrapped by someone else between list and update */
  skipped: number;
  errors: string[];
}

export interface CredentialEngineOptions extends FlagFormat {
  now?: () => number;
}

type Lookup =
  | { kind: "ok"; flag: string; keyId: number }
  | { kind: "missing" }
  | { kind: "unreadable"; reason: string };

/**
 * Mints, stores and checks per-instance flags.
 *
 * Flags are encrypted with AES-256-GCM under the key ring's current key, with
 * the instance id as associated data; the stored row remembers which key
 * encrypted it so rotation never strands a ciphertext.
 */
export class CredentialEngine {
  private readonly now: () => number;

  constructor(
    private readonly repo: ICredentialRepository,
    private readonly keyring: FlagKeyring,
    private readonly audit: AuditSink,
    private readonly options: CredentialEngineOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** The same engine over another repository (typically transaction-bound) and audit sink. */
  within(repo: ICredentialRepository, audit: AuditSink = this.audit): CredentialEngine {
    return new CredentialEngine(repo, this.keyring, audit, this.options);
  }

  mint(): string {
    return generateFlag(this.options);
  }

  /**
   * Encrypt and bind a flag to an instance, under the key storage currently
   * marks as current.
   * @throws DuplicateBindingError if the instance already has a credential
   */
  async issue(instanceId: string, flag: string = this.mint(), context?: ValidationContext): Promise<IssuedCredential> {
    const { keyId, key } = await this.currentKey();
    const createdAt = this.now();
    const ciphertext = serializePayload(encrypt(flag, key, instanceId));

    const inserted = await this.repo.insert({ instanceId, ciphertext, keyId, createdAt });
    if (!inserted) {
      throw new DuplicateBindingError(instanceId);
    }

    await this.audit.record({
      action: "flag.issued",
      instanceId,
      principalId: context?.principalId,
      challengeId: context?.challengeId,
      details: { keyId },
    });
    return { instanceId, keyId, createdAt };
  }

  /**
   * Check a submission against the instance's flag. Returns false (never
   * throws) when there is no credential or it cannot be decrypted.
   */
  async validate(instanceId: string, submitted: string, context?: ValidationContext): Promise<boolean> {
    let lookup: Lookup;
    try {
      lookup = await this.lookup(instanceId);
    } catch (err) {
      logger.error("Flag lookup failed", { instanceId, error: err instanceof Error ? err.message : String(err) });
      captureError(err, { instanceId, operation: "flag.validate" });
      lookup = { kind: "unreadable", reason: "lookup_failed" };
    }

    const accepted = lookup.kind === "ok" && constantTimeEquals(lookup.flag, submitted);
    let details: Record<string, unknown>;
    if (lookup.kind === "ok") details = { keyId: lookup.keyId };
    else details = { reason: lookup.kind === "missing" ? "no_credential" : lookup.reason };

    await this.audit.record({
      action: accepted ? "flag.validated" : "flag.rejected",
      instanceId,
      principalId: context?.principalId,
      challengeId: context?.challengeId,
      details,
    });
    return accepted;
  }

  /** Delete the instance's credential. Returns true if one existed. */
  async revoke(instanceId: string): Promise<boolean> {
    return this.repo.delete(instanceId);
  }

  /** Retire the current key and activate a new one. Existing ciphertexts stay readable. */
  async rotateKey(): Promise<number> {
    const keyId = await this.keyring.rotate();
    await this.audit.record({ action: "flag.key_rotated", details: { previousKeyId: keyId - 1, keyId } });
    return keyId;
  }

  /**
   * Re-encrypt up to `batchSize` credentials stored under retired keys with
   * the current key. Each update is conditional on the old key id, so a
   * concurrent revoke or rewrap wins and the row is skipped.
   */
  async rewrapRetired(batchSize = 100): Promise<RewrapResult> {
    const { keyId: currentKeyId, key: currentKey } = await this.currentKey();
    const rows = await this.repo.listNotUnderKey(currentKeyId, batchSize);
    const result: RewrapResult = { rewrapped: 0, skipped: 0, errors: [] };

    for (const row of rows) {
      const oldKey = this.keyring.keyFor(row.keyId);
      if (!oldKey) {
        result.errors.push(`Instance ${row.instanceId}: unknown key id ${row.keyId}`);
        continue;
      }
      try {
        const flag = decrypt(parsePayload(row.ciphertext), oldKey, row.instanceId);
        const ciphertext = serializePayload(encrypt(flag, currentKey, row.instanceId));
        const replaced = await this.repo.replaceCiphertext(row.instanceId, row.keyId, ciphertext, currentKeyId);
        if (replaced) result.rewrapped++;
        else result.skipped++;
      } catch (err) {
        result.errors.push(`Instance ${row.instanceId}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    if (rows.length > 0) {
      await this.audit.record({
        action: "flag.rewrapped",
        details: {
          keyId: currentKeyId,
          rewrapped: result.rewrapped,
          skipped: result.skipped,
          failed: result.errors.length,
        },
      });
    }
    if (result.errors.length > 0) {
      logger.error("Flag rewrap left credentials under retired keys", { errors: result.errors });
    }
    return result;
  }

  private async currentKey(): Promise<ActiveKey> {
    const keyId = await this.repo.currentKeyId();
    if (keyId === null) {
      throw new KeyringConfigurationError("Credential key ring has no current key");
    }
    return this.keyring.adopt(keyId);
  }

  private async lookup(instanceId: string): Promise<Lookup> {
    const row = await this.repo.get(instanceId);
    if (!row) return { kind: "missing" };

    let key = this.keyring.keyFor(row.keyId);
    if (!key) {
      // Another process may have rotated since we loaded.
      await this.keyring.refresh();
      key = this.keyring.keyFor(row.keyId);
    }
    if (!key) {
      logger.error("Credential references an unknown key id", { instanceId, keyId: row.keyId });
      return { kind: "unreadable", reason: "unknown_key" };
    }

    try {
      return { kind: "ok", flag: decrypt(parsePayload(row.ciphertext), key, instanceId), keyId: row.keyId };
    } catch (err) {
      logger.error("Credential failed authentication", {
        instanceId,
        keyId: row.keyId,
        error: err instanceof Error ? err.message : String(err),
      });
      captureError(err, { instanceId, operation: "flag.decrypt" });
      return { kind: "unreadable", reason: "decrypt_failed" };
    }
  }
}
