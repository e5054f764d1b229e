import { createCipheriv, createDecipheriv, createHmac, randomBytes } from "node:crypto";
import { z } from "zod";
import type { EncryptedPayload } from "./types.js";

const ALGORITHM = "aes-256-gcm";
const IV_BYTES = 16;
const KEY_BYTES = 32;

const encryptedPayloadSchema = z.object({
  iv: z.string().regex(/^[0-9a-f]+$/),
  authTag: z.string().regex(/^[0-9a-f]{32}$/),
  ciphertext: z.string().regex(/^[0-9a-f]*$/),
});

/**
 * Derive the key for one key ring entry from the master secret.
 * HMAC-SHA256 keeps it deterministic, so only the key id is ever stored.
 */
export function deriveKey(masterSecret: string, keyId: number): Buffer {
  return createHmac("sha256", masterSecret).update(`flag-key:${keyId}`).digest();
}

/**
 * Encrypt a plaintext string with AES-256-GCM.
 * `aad` is authenticated but not encrypted; decrypt must be given the same value.
 */
export function encrypt(plaintext: string, key: Buffer, aad?: string): EncryptedPayload {
  if (key.length !== KEY_BYTES) {
    throw new Error(`Encryption key must be ${KEY_BYTES} bytes, got ${key.length}`);
  }

  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv(ALGORITHM, key, iv);
  if (aad !== undefined) cipher.setAAD(Buffer.from(aad, "utf-8"));

  const encrypted = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return {
    iv: iv.toString("hex"),
    authTag: authTag.toString("hex"),
    ciphertext: encrypted.toString("hex"),
  };
}

/**
 * Decrypt an AES-256-GCM encrypted payload back to plaintext.
 * Throws on tampered data, wrong key or mismatched `aad`.
 */
export function decrypt(payload: EncryptedPayload, key: Buffer, aad?: string): string {
  if (key.length !== KEY_BYTES) {
    throw new Error(`Encryption key must be ${KEY_BYTES} bytes, got ${key.length}`);
  }

  const iv = Buffer.from(payload.iv, "hex");
  const authTag = Buffer.from(payload.authTag, "hex");
  const ciphertext = Buffer.from(payload.ciphertext, "hex");

  const decipher = createDecipheriv(ALGORITHM, key, iv);
  decipher.setAuthTag(authTag);
  if (aad !== undefined) decipher.setAAD(Buffer.from(aad, "utf-8"));

  const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  return decrypted.toString("utf-8");
}

export function serializePayload(payload: EncryptedPayload): string {
  return JSON.stringify(payload);
}

/** Parse a stored ciphertext column. Throws when the JSON is malformed. */
export function parsePayload(raw: string): EncryptedPayload {
  return encryptedPayloadSchema.parse(JSON.parse(raw));
}
