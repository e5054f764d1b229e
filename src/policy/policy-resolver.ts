import type { AuditSink } from "../audit/instance-audit-log.js";
import { logger } from "../config/logger.js";
import type { IPolicyRepository, PolicyRow } from "./policy-repository.js";
import { GLOBAL_POLICY_KEY, type RuntimePolicy, runtimePolicySchema } from "./policy-schema.js";

export class PolicyConfigurationError extends Error {
  readonly name = "PolicyConfigurationError" as const;
}

export interface PolicyOverride {
  challengeId: string;
  policy: RuntimePolicy;
  updatedBy: string | null;
  updatedAt: number;
}

function toPolicy(row: PolicyRow): RuntimePolicy | null {
  const parsed = runtimePolicySchema.safeParse({
    baseRuntimeSeconds: row.baseRuntimeSeconds,
    extensionIncrementSeconds: row.extensionIncrementSeconds,
    maxExtensions: row.maxExtensions,
    maxLifetimeSeconds: row.maxLifetimeSeconds,
  });
  if (parsed.success) return parsed.data;
  logger.error("Stored runtime policy is invalid; ignoring it", {
    challengeId: row.challengeId,
    issues: parsed.error.issues.map((i) => i.message),
  });
  return null;
}

/**
 * Maps a challenge to the runtime policy its instances follow.
 *
 * Lookup order: the challenge's override, then the stored '*' default, then
 * the configured default. Construction fails when no valid default exists,
 * so resolve never has to.
 */
export class PolicyResolver {
  private constructor(
    private readonly repo: IPolicyRepository,
    private readonly audit: AuditSink,
    private readonly configuredDefault: RuntimePolicy | null,
    private readonly now: () => number,
  ) {}

  /**
   * @throws PolicyConfigurationError if the configured default is invalid or
   * neither it nor a stored '*' policy exists
   */
  static async create(
    repo: IPolicyRepository,
    audit: AuditSink,
    configuredDefault?: unknown,
    now: () => number = Date.now,
  ): Promise<PolicyResolver> {
    let fallback: RuntimePolicy | null = null;
    if (configuredDefault !== undefined) {
      const parsed = runtimePolicySchema.safeParse(configuredDefault);
      if (!parsed.success) {
        throw new PolicyConfigurationError(
          `Invalid default runtime policy: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
        );
      }
      fallback = parsed.data;
    }

    const stored = (await repo.getMany([GLOBAL_POLICY_KEY]))[0];
    const storedDefault = stored ? toPolicy(stored) : null;
    if (!storedDefault && !fallback) {
      throw new PolicyConfigurationError("No global runtime policy is configured");
    }
    return new PolicyResolver(repo, audit, fallback, now);
  }

  /** The policy for a challenge. Falls back to the global default. */
  async resolve(challengeId: string): Promise<RuntimePolicy> {
    const rows = await this.repo.getMany(
      challengeId === GLOBAL_POLICY_KEY ? [GLOBAL_POLICY_KEY] : [challengeId, GLOBAL_POLICY_KEY],
    );
    const override = rows.find((r) => r.challengeId === challengeId && challengeId !== GLOBAL_POLICY_KEY);
    const policy = override ? toPolicy(override) : null;
    if (policy) return policy;
    return this.globalFrom(rows);
  }

  async setPolicy(challengeId: string, policy: unknown, updatedBy: string): Promise<RuntimePolicy> {
    const parsed = runtimePolicySchema.parse(policy);
    await this.repo.upsert(challengeId, parsed, updatedBy, this.now());
    await this.audit.record({
      action: "policy.updated",
      principalId: updatedBy,
      challengeId,
      details: { ...parsed },
    });
    logger.info("Runtime policy updated", { challengeId, updatedBy });
    return parsed;
  }

  async setGlobalDefault(policy: unknown, updatedBy: string): Promise<RuntimePolicy> {
    return this.setPolicy(GLOBAL_POLICY_KEY, policy, updatedBy);
  }

  /**
   * Remove an override. Clearing '*' is refused when no configured default
   * would remain. Returns false if there was nothing to clear.
   */
  async clearPolicy(challengeId: string, clearedBy: string): Promise<boolean> {
    if (challengeId === GLOBAL_POLICY_KEY && !this.configuredDefault) {
      throw new PolicyConfigurationError("Cannot clear the global policy without a configured default");
    }
    const removed = await this.repo.delete(challengeId);
    if (removed) {
      await this.audit.record({ action: "policy.cleared", principalId: clearedBy, challengeId });
      logger.info("Runtime policy cleared", { challengeId, clearedBy });
    }
    return removed;
  }

  /** Valid per-challenge overrides, sorted by challenge id. The '*' row is not included. */
  async listOverrides(): Promise<PolicyOverride[]> {
    const rows = await this.repo.list();
    const overrides: PolicyOverride[] = [];
    for (const row of rows) {
      if (row.challengeId === GLOBAL_POLICY_KEY) continue;
      const policy = toPolicy(row);
      if (policy) {
        overrides.push({ challengeId: row.challengeId, policy, updatedBy: row.updatedBy, updatedAt: row.updatedAt });
      }
    }
    return overrides;
  }

  private globalFrom(rows: PolicyRow[]): RuntimePolicy {
    const stored = rows.find((r) => r.challengeId === GLOBAL_POLICY_KEY);
    const policy = stored ? toPolicy(stored) : null;
    if (policy) return policy;
    if (this.configuredDefault) return this.configuredDefault;
    // Only reachable if the stored default was removed out of band.
    throw new PolicyConfigurationError("No global runtime policy is configured");
  }
}
