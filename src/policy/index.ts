export { DrizzlePolicyRepository, type IPolicyRepository, type PolicyRow } from "./policy-repository.js";
export { PolicyConfigurationError, type PolicyOverride, PolicyResolver } from "./policy-resolver.js";
export { GLOBAL_POLICY_KEY, type RuntimePolicy, runtimePolicySchema } from "./policy-schema.js";
