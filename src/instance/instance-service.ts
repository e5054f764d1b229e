import type { InstanceEventFilters, InstanceEventRow } from "../audit/events.js";
import type { InstanceAuditLog } from "../audit/instance-audit-log.js";
import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import type { PolicyResolver } from "../policy/policy-resolver.js";
import type { CredentialEngine } from "../security/credential-engine.js";
import { InstanceError, type InstanceErrorKind } from "./errors.js";
import type { LifecycleManager } from "./lifecycle-manager.js";
import { type Actor, type Clock, type Instance, systemClock } from "./repository-types.js";
import type { InstanceStatus, TerminationReason } from "./state-machine.js";

export type ServiceResult<T> = { ok: true; value: T } | { ok: false; error: InstanceErrorKind; message: string };

export type FlagVerdict = "accepted" | "rejected";

/** What an owner sees about an instance. */
export interface InstanceStatusView {
  instanceId: string;
  principalId: string;
  challengeId: string;
  status: InstanceStatus;
  createdAt: number;
  expiresAt: number;
  /** Seconds until expiry; 0 once past the deadline or no longer running */
  remainingSeconds: number;
  extensionCount: number;
  maxExtensions: number;
  terminatedAt: number | null;
  terminationReason: TerminationReason | null;
}

export interface CreateInstanceView {
  instance: InstanceStatusView;
  flag: string;
}

/**
 * The surface a request layer calls. Every method resolves to a tagged
 * result; InstanceErrors become `{ ok: false, error }` and anything else is
 * reported and surfaced as InvariantViolation.
 */
export class InstanceService {
  constructor(
    private readonly lifecycle: LifecycleManager,
    private readonly policies: PolicyResolver,
    private readonly credentials: CredentialEngine,
    private readonly audit: InstanceAuditLog,
    private readonly clock: Clock = systemClock,
  ) {}

  async createInstance(principalId: string, challengeId: string): Promise<ServiceResult<CreateInstanceView>> {
    return this.run("createInstance", async () => {
      const { instance, flag } = await this.lifecycle.create(principalId, challengeId);
      return { instance: await this.toView(instance), flag };
    });
  }

  async extendInstance(instanceId: string, actor: Actor): Promise<ServiceResult<InstanceStatusView>> {
    return this.run("extendInstance", async () => this.toView(await this.lifecycle.extend(instanceId, actor)));
  }

  async stopInstance(instanceId: string, actor: Actor): Promise<ServiceResult<InstanceStatusView>> {
    return this.run("stopInstance", async () => this.toView(await this.lifecycle.stop(instanceId, actor, "manual")));
  }

  /**
   * Check a flag submission. Submissions by anyone but the owner are
   * rejected without a lookup, and the answer never says why.
   */
  async submitFlag(instanceId: string, text: string, actor: Actor): Promise<ServiceResult<FlagVerdict>> {
    return this.run("submitFlag", async () => {
      const instance = await this.lifecycle.getInstance(instanceId);
      const principalId = actor.type === "principal" ? actor.principalId : null;

      if (instance && principalId !== instance.principalId) {
        await this.audit.record({
          action: "flag.rejected",
          principalId,
          instanceId,
          challengeId: instance.challengeId,
          details: { reason: "not_owner" },
        });
        return "rejected";
      }

      const accepted = await this.credentials.validate(instanceId, text, {
        principalId: principalId ?? undefined,
        challengeId: instance?.challengeId,
      });
      return accepted ? "accepted" : "rejected";
    });
  }

  async getInstanceStatus(instanceId: string, actor: Actor): Promise<ServiceResult<InstanceStatusView>> {
    return this.run("getInstanceStatus", async () => {
      const instance = await this.lifecycle.getInstance(instanceId);
      if (!instance) throw new InstanceError("NotFound", `Instance ${instanceId} not found`);
      if (actor.type === "principal" && !actor.isAdmin && actor.principalId !== instance.principalId) {
        throw new InstanceError("Forbidden", `Principal ${actor.principalId} does not own instance ${instanceId}`);
      }
      return this.toView(instance);
    });
  }

  /** The provisioning or running instance for (principal, challenge), or null. */
  async getActiveInstance(principalId: string, challengeId: string): Promise<ServiceResult<InstanceStatusView | null>> {
    return this.run("getActiveInstance", async () => {
      const instance = await this.lifecycle.getActiveInstance(principalId, challengeId);
      return instance ? this.toView(instance) : null;
    });
  }

  /** Operator audit surface. Admins and system actors only. */
  async queryEvents(
    filters: InstanceEventFilters,
    actor: Actor,
  ): Promise<ServiceResult<{ entries: InstanceEventRow[]; total: number }>> {
    return this.run("queryEvents", async () => {
      if (actor.type === "principal" && !actor.isAdmin) {
        throw new InstanceError("Forbidden", "Audit events are restricted to administrators");
      }
      return this.audit.query(filters);
    });
  }

  private async toView(instance: Instance): Promise<InstanceStatusView> {
    const policy = await this.policies.resolve(instance.challengeId);
    const remainingSeconds = instance.status === "running" ? Math.max(0, instance.expiresAt - this.clock()) : 0;
    return {
      instanceId: instance.id,
      principalId: instance.principalId,
      challengeId: instance.challengeId,
      status: instance.status,
      createdAt: instance.createdAt,
      expiresAt: instance.expiresAt,
      remainingSeconds,
      extensionCount: instance.extensionCount,
      maxExtensions: policy.maxExtensions,
      terminatedAt: instance.terminatedAt,
      terminationReason: instance.terminationReason,
    };
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<ServiceResult<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (err) {
      if (err instanceof InstanceError) {
        return { ok: false, error: err.kind, message: err.message };
      }
      logger.error(`Unexpected error in ${operation}`, { error: err instanceof Error ? err.message : String(err) });
      captureError(err, { operation });
      return { ok: false, error: "InvariantViolation", message: "Internal error" };
    }
  }
}
