/** AES-256-GCM payload as stored in instance_credentials.ciphertext (JSON). */
export interface EncryptedPayload {
  /** AES-256-GCM initialization vector (hex). */
  iv: string;
  /** AES-256-GCM auth tag (hex). */
  authTag: string;
  /** Encrypted ciphertext (hex). */
  ciphertext: string;
}

/** A key ring entry with its derived material. */
export interface ActiveKey {
  keyId: number;
  key: Buffer;
}

/** Metadata returned by CredentialEngine.issue. The flag itself is never included. */
export interface IssuedCredential {
  instanceId: string;
  keyId: number;
  createdAt: number;
}

/** Caller context attached to validation audit events. */
export interface ValidationContext {
  principalId?: string;
  challengeId?: string;
}

export class DuplicateBindingError extends Error {
  readonly name = "DuplicateBindingError" as const;
  constructor(readonly instanceId: string) {
    super(`Instance ${instanceId} already has a bound credential`);
  }
}

export class KeyringConfigurationError extends Error {
  readonly name = "KeyringConfigurationError" as const;
}
