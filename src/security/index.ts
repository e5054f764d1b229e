export {
  CredentialEngine,
  type CredentialEngineOptions,
  constantTimeEquals,
  type RewrapResult,
} from "./credential-engine.js";
export {
  type CredentialKeyRecord,
  DrizzleCredentialKeyRepository,
  type ICredentialKeyRepository,
} from "./credential-key-repository.js";
export {
  type CredentialRow,
  DrizzleCredentialRepository,
  type ICredentialRepository,
} from "./credential-repository.js";
export { decrypt, deriveKey, encrypt } from "./encryption.js";
export { flagTemplateSchema, generateFlag, redactFlag } from "./flag-format.js";
export { FlagKeyring } from "./keyring.js";
export type { ActiveKey, EncryptedPayload, IssuedCredential, ValidationContext } from "./types.js";
export { DuplicateBindingError, KeyringConfigurationError } from "./types.js";
