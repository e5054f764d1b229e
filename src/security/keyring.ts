import { logger } from "../config/logger.js";
import type { CredentialKeyRecord, ICredentialKeyRepository } from "./credential-key-repository.js";
import { deriveKey } from "./encryption.js";
import { type ActiveKey, KeyringConfigurationError } from "./types.js";

const MIN_SECRET_LENGTH = 16;

/**
 * In-memory view of the flag key ring.
 *
 * Key material is derived on demand from the master secret and the key id;
 * storage only knows which ids exist and which one is current. The current
 * key is swapped as one object, so readers see either the old or the new key.
 */
export class FlagKeyring {
  private active: ActiveKey;
  private knownKeyIds: Set<number>;

  private constructor(
    private readonly repo: ICredentialKeyRepository,
    private readonly masterSecret: string,
    records: CredentialKeyRecord[],
    private readonly now: () => number,
  ) {
    this.knownKeyIds = new Set();
    this.active = this.apply(records);
  }

  /** Load the ring, creating key 1 when storage holds none. */
  static async load(
    repo: ICredentialKeyRepository,
    masterSecret: string | undefined,
    now: () => number = Date.now,
  ): Promise<FlagKeyring> {
    if (!masterSecret || masterSecret.length < MIN_SECRET_LENGTH) {
      throw new KeyringConfigurationError(
        `FLAG_MASTER_SECRET must be set and at least ${MIN_SECRET_LENGTH} characters long`,
      );
    }
    await repo.ensureInitial(now());
    const keyring = new FlagKeyring(repo, masterSecret, await repo.list(), now);
    logger.info("Flag key ring loaded", { currentKeyId: keyring.current().keyId, keys: keyring.knownKeyIds.size });
    return keyring;
  }

  current(): ActiveKey {
    return this.active;
  }

  /** Key material for a known key id, or null when the ring has never seen it. */
  keyFor(keyId: number): Buffer | null {
    if (!this.knownKeyIds.has(keyId)) return null;
    if (keyId === this.active.keyId) return this.active.key;
    return deriveKey(this.masterSecret, keyId);
  }

  /**
   * Make `keyId` current when storage says it is. Another process may have
   * rotated since this ring loaded; the key is derived from its id, so no
   * storage read is needed to switch.
   */
  adopt(keyId: number): ActiveKey {
    if (keyId === this.active.keyId) return this.active;
    this.knownKeyIds.add(keyId);
    this.active = { keyId, key: deriveKey(this.masterSecret, keyId) };
    logger.info("Flag key ring picked up a rotation", { currentKeyId: keyId });
    return this.active;
  }

  /** Retire the current key and activate the next one. Returns the new key id. */
  async rotate(): Promise<number> {
    const next = await this.repo.rotate(this.now());
    this.knownKeyIds.add(next.keyId);
    this.active = { keyId: next.keyId, key: deriveKey(this.masterSecret, next.keyId) };
    logger.info("Flag key rotated", { currentKeyId: next.keyId });
    return next.keyId;
  }

  /** Re-read storage, picking up rotations made by other processes. */
  async refresh(): Promise<void> {
    this.active = this.apply(await this.repo.list());
  }

  private apply(records: CredentialKeyRecord[]): ActiveKey {
    const current = records.find((r) => r.retiredAt === null);
    if (!current) {
      throw new KeyringConfigurationError("Credential key ring has no current key");
    }
    this.knownKeyIds = new Set(records.map((r) => r.keyId));
    return { keyId: current.keyId, key: deriveKey(this.masterSecret, current.keyId) };
  }
}
