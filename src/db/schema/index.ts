export { credentialKeys } from "./credential-keys.js";
export { instanceCredentials } from "./instance-credentials.js";
export { instanceEvents } from "./instance-events.js";
export { instances } from "./instances.js";
export { runtimePolicies } from "./runtime-policies.js";
