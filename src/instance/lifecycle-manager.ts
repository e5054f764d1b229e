import { randomUUID } from "node:crypto";
import { type AuditSink, BufferedAuditSink } from "../audit/instance-audit-log.js";
import type { InstanceEventAction } from "../audit/events.js";
import { logger } from "../config/logger.js";
import { isTransientStoreError } from "../db/errors.js";
import { captureError } from "../observability/sentry.js";
import type { PolicyResolver } from "../policy/policy-resolver.js";
import type { CredentialEngine } from "../security/credential-engine.js";
import { redactFlag } from "../security/flag-format.js";
import { DuplicateBindingError } from "../security/types.js";
import { InstanceError } from "./errors.js";
import type { IInstanceRepository, LockedInstance } from "./instance-repository.js";
import {
  type Provisioner,
  ProvisionerRejectedError,
  ProvisionerUnavailableError,
  type WorkloadHandle,
} from "./provisioner.js";
import type { Actor, Clock, Instance } from "./repository-types.js";
import { systemClock } from "./repository-types.js";
import { retryWithBackoff, sleep, TimeoutError, withTimeout } from "./retry.js";
import type { TerminationReason } from "./state-machine.js";

export interface LifecycleOptions {
  clock?: Clock;
  provisionerTimeoutMs: number;
  /** Retries after the first attempt, for both start and stop. */
  provisionerRetries: number;
  provisionerRetryBaseMs: number;
  /** Retries after the first attempt for transient store failures. */
  storeRetries: number;
  /** Provisioning rows older than this are considered abandoned. */
  abandonedProvisioningSeconds: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CreatedInstance {
  instance: Instance;
  /** Plaintext flag, for delivery to the owner. Not stored anywhere in clear. */
  flag: string;
}

export type ExpireOutcome = "expired" | "skipped" | "failed";

interface TeardownProgress {
  workloadStopped: boolean;
}

const STORE_RETRY_BASE_MS = 50;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function actorPrincipal(actor: Actor): string | null {
  return actor.type === "principal" ? actor.principalId : null;
}

function provisionerErrorKind(err: unknown): "ProvisionerRejected" | "ProvisionerUnavailable" {
  return err instanceof ProvisionerRejectedError ? "ProvisionerRejected" : "ProvisionerUnavailable";
}

/**
 * Owns every instance state change: create, extend, stop, expire.
 *
 * Each mutation runs under the instance's row lock (see
 * IInstanceRepository.withInstanceLock) and re-checks status and counters
 * there, so concurrent extends, stops and reaper passes serialize per
 * instance. Audit events are written after the locked section commits.
 */
export class LifecycleManager {
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly instances: IInstanceRepository,
    private readonly policies: PolicyResolver,
    private readonly credentials: CredentialEngine,
    private readonly provisioner: Provisioner,
    private readonly audit: AuditSink,
    private readonly options: LifecycleOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? sleep;
  }

  async getInstance(instanceId: string): Promise<Instance | null> {
    return this.store(() => this.instances.getById(instanceId));
  }

  async getActiveInstance(principalId: string, challengeId: string): Promise<Instance | null> {
    return this.store(() => this.instances.findActive(principalId, challengeId));
  }

  /**
   * Provision a new instance for (principal, challenge) and bind a fresh flag to it.
   * @throws InstanceError AlreadyRunning, ProvisionerUnavailable, ProvisionerRejected, DuplicateBinding,
   * StoreUnavailable or InvariantViolation
   */
  async create(principalId: string, challengeId: string): Promise<CreatedInstance> {
    const policy = await this.store(() => this.policies.resolve(challengeId));
    const now = this.clock();
    const id = randomUUID();

    let instance: Instance;
    try {
      instance = await this.store(() =>
        this.instances.insertProvisioning({
          id,
          principalId,
          challengeId,
          createdAt: now,
          expiresAt: now + policy.baseRuntimeSeconds,
        }),
      );
    } catch (err) {
      if (err instanceof InstanceError) {
        await this.audit.record({
          action: "instance.failed_create",
          principalId,
          challengeId,
          details: { reason: err.kind },
        });
      }
      throw err;
    }

    const flag = this.credentials.mint();
    let handle: WorkloadHandle;
    try {
      handle = await this.startWorkload(instance, flag);
    } catch (err) {
      const kind = provisionerErrorKind(err);
      await this.releaseOrphan(id);
      await this.markFailed(id, `${kind}: ${errorMessage(err)}`);
      await this.audit.record({
        action: "instance.failed_create",
        principalId,
        instanceId: id,
        challengeId,
        details: { reason: kind, error: errorMessage(err) },
      });
      throw new InstanceError(kind, `Could not start workload for instance ${id}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    let pending = new BufferedAuditSink();
    try {
      instance = await this.store(() => {
        pending = new BufferedAuditSink();
        return this.instances.withInstanceLock(id, async (locked) => {
          if (locked.instance.status !== "provisioning") {
            throw new InstanceError(
              "InvariantViolation",
              `Instance ${id} left provisioning (${locked.instance.status}) while its workload was starting`,
            );
          }
          await this.credentials.within(locked.credentials, pending).issue(id, flag, { principalId, challengeId });
          return locked.update({ status: "running", workloadHandle: handle });
        });
      });
    } catch (err) {
      const failure = this.toFinalizeError(id, err);
      await this.teardownQuietly(id, handle);
      await this.markFailed(id, `${failure.kind}: ${failure.message}`);
      await this.audit.record({
        action: "instance.failed_create",
        principalId,
        instanceId: id,
        challengeId,
        details: { reason: failure.kind },
      });
      throw failure;
    }

    await this.audit.record({
      action: "instance.created",
      principalId,
      instanceId: id,
      challengeId,
      details: { expiresAt: instance.expiresAt, workloadHandle: handle },
    });
    await pending.flushTo(this.audit);
    logger.info("Instance created", {
      instanceId: id,
      principalId,
      challengeId,
      expiresAt: instance.expiresAt,
      flag: redactFlag(flag),
    });
    return { instance, flag };
  }

  /**
   * Push the deadline out by the policy's increment, bounded by the lifetime cap.
   * @throws InstanceError NotFound, Forbidden, InProgress, NotRunning, ExtensionLimitReached,
   * LifetimeCapReached or StoreUnavailable
   */
  async extend(instanceId: string, actor: Actor): Promise<Instance> {
    let challengeId: string | null = null;
    try {
      const snapshot = await this.store(() => this.instances.getById(instanceId));
      if (!snapshot) throw new InstanceError("NotFound", `Instance ${instanceId} not found`);
      challengeId = snapshot.challengeId;
      const policy = await this.store(() => this.policies.resolve(snapshot.challengeId));

      const { before, after } = await this.store(() =>
        this.instances.withInstanceLock(instanceId, async (locked) => {
          const current = locked.instance;
          this.authorize(current, actor);
          this.requireRunning(current);

          if (current.extensionCount >= policy.maxExtensions) {
            throw new InstanceError(
              "ExtensionLimitReached",
              `Instance ${instanceId} has used all ${policy.maxExtensions} extensions`,
            );
          }
          const cap = current.createdAt + policy.maxLifetimeSeconds;
          const candidate = Math.min(current.expiresAt + policy.extensionIncrementSeconds, cap);
          if (candidate <= current.expiresAt) {
            throw new InstanceError("LifetimeCapReached", `Instance ${instanceId} is already at its maximum lifetime`);
          }

          const updated = await locked.update({
            expiresAt: candidate,
            extensionCount: current.extensionCount + 1,
            lastExtendedAt: this.clock(),
          });
          return { before: current, after: updated };
        }),
      );

      await this.audit.record({
        action: "instance.extended",
        principalId: after.principalId,
        instanceId,
        challengeId: after.challengeId,
        details: {
          oldExpiresAt: before.expiresAt,
          newExpiresAt: after.expiresAt,
          extensionNumber: after.extensionCount,
          actor: actorPrincipal(actor) ?? "system",
        },
      });
      return after;
    } catch (err) {
      if (err instanceof InstanceError) {
        await this.audit.record({
          action: "instance.failed_extend",
          principalId: actorPrincipal(actor),
          instanceId,
          challengeId,
          details: { reason: err.kind },
        });
      }
      throw err;
    }
  }

  /**
   * Tear down a running instance and revoke its flag.
   * The instance stays running if teardown fails.
   * @throws InstanceError NotFound, Forbidden, InProgress, NotRunning, ProvisionerUnavailable,
   * ProvisionerRejected or StoreUnavailable
   */
  async stop(instanceId: string, actor: Actor, reason: TerminationReason = "manual"): Promise<Instance> {
    let challengeId: string | null = null;
    const progress: TeardownProgress = { workloadStopped: false };
    try {
      const stopped = await this.store(() =>
        this.instances.withInstanceLock(instanceId, async (locked) => {
          challengeId = locked.instance.challengeId;
          this.authorize(locked.instance, actor);
          this.requireRunning(locked.instance);
          return this.terminate(locked, reason, progress);
        }),
      );
      await this.recordStopped(stopped, actor);
      return stopped;
    } catch (err) {
      const failure = this.toStopError(instanceId, err);
      if (failure) {
        await this.audit.record({
          action: reason === "auto" ? "instance.failed_expire" : "instance.failed_stop",
          principalId: actorPrincipal(actor),
          instanceId,
          challengeId,
          details: { reason: failure.kind },
        });
        throw failure;
      }
      throw err;
    }
  }

  /**
   * Reaper entry point. Re-checks status and deadline under the lock, so an
   * instance stopped or extended since it was listed is skipped, and each
   * instance is torn down at most once.
   */
  async expire(instanceId: string): Promise<ExpireOutcome> {
    let challengeId: string | null = null;
    const progress: TeardownProgress = { workloadStopped: false };
    try {
      const result = await this.store(() =>
        this.instances.withInstanceLock(instanceId, async (locked): Promise<Instance | null> => {
          const current = locked.instance;
          challengeId = current.challengeId;
          if (current.status !== "running") return null;
          if (current.expiresAt > this.clock()) return null;
          return this.terminate(locked, "auto", progress);
        }),
      );
      if (!result) return "skipped";
      await this.recordStopped(result, { type: "system" });
      return "expired";
    } catch (err) {
      if (err instanceof InstanceError && err.kind === "NotFound") return "skipped";
      const failure = this.toStopError(instanceId, err) ?? new InstanceError("InvariantViolation", errorMessage(err));
      logger.error("Instance expiry failed", { instanceId, kind: failure.kind, error: failure.message });
      if (failure.kind === "InvariantViolation") captureError(err, { instanceId, operation: "instance.expire" });
      await this.audit.record({
        action: "instance.failed_expire",
        instanceId,
        challengeId,
        details: { reason: failure.kind },
      });
      return "failed";
    }
  }

  /**
   * Fail a row stuck in provisioning (the creating process died) so its
   * (principal, challenge) slot is released. Returns true if the row was failed.
   */
  async failAbandoned(instanceId: string): Promise<boolean> {
    const cutoff = this.clock() - this.options.abandonedProvisioningSeconds;
    const failed = await this.store(() =>
      this.instances.withInstanceLock(instanceId, async (locked): Promise<Instance | null> => {
        const current = locked.instance;
        if (current.status !== "provisioning" || current.createdAt > cutoff) return null;
        return locked.update({ status: "failed", failureReason: "abandoned during provisioning" });
      }),
    );
    if (!failed) return false;

    await this.releaseOrphan(instanceId);
    logger.warn("Failed abandoned provisioning instance", { instanceId, createdAt: failed.createdAt });
    await this.audit.record({
      action: "instance.failed_create",
      principalId: failed.principalId,
      instanceId,
      challengeId: failed.challengeId,
      details: { reason: "Abandoned" },
    });
    return true;
  }

  /** Ids of running instances past their deadline. Read without locks. */
  async listExpiredIds(limit: number): Promise<string[]> {
    return this.store(() => this.instances.listExpiredIds(this.clock(), limit));
  }

  /** Ids of provisioning rows older than the abandonment threshold. Read without locks. */
  async listAbandonedIds(limit: number): Promise<string[]> {
    const cutoff = this.clock() - this.options.abandonedProvisioningSeconds;
    return this.store(() => this.instances.listAbandonedIds(cutoff, limit));
  }

  // --- Private helpers ---

  /**
   * Teardown, revoke and terminate, all inside the caller's locked section.
   * `progress` outlives store retries: a retried attempt skips a workload
   * stop that already succeeded before the transaction rolled back.
   */
  private async terminate(
    locked: LockedInstance,
    reason: TerminationReason,
    progress: TeardownProgress,
  ): Promise<Instance> {
    const current = locked.instance;
    if (progress.workloadStopped) {
      logger.info("Workload already stopped by an earlier attempt", { instanceId: current.id });
    } else if (current.workloadHandle) {
      await this.stopWorkload(current.workloadHandle);
      progress.workloadStopped = true;
    } else {
      logger.error("Running instance has no workload handle", { instanceId: current.id });
      captureError(new Error(`Running instance ${current.id} has no workload handle`), {
        instanceId: current.id,
        operation: "instance.terminate",
      });
    }

    const revoked = await this.credentials.within(locked.credentials).revoke(current.id);
    if (!revoked) {
      logger.error("Running instance had no credential to revoke", { instanceId: current.id });
      captureError(new Error(`Running instance ${current.id} had no credential`), {
        instanceId: current.id,
        operation: "instance.terminate",
      });
    }

    return locked.update({ status: "terminated", terminatedAt: this.clock(), terminationReason: reason });
  }

  private async recordStopped(instance: Instance, actor: Actor): Promise<void> {
    const action: InstanceEventAction =
      instance.terminationReason === "auto" ? "instance.stopped_auto" : "instance.stopped_manual";
    await this.audit.record({
      action,
      principalId: instance.principalId,
      instanceId: instance.id,
      challengeId: instance.challengeId,
      details: {
        terminatedAt: instance.terminatedAt,
        expiresAt: instance.expiresAt,
        actor: actorPrincipal(actor) ?? "system",
      },
    });
    logger.info("Instance stopped", { instanceId: instance.id, reason: instance.terminationReason });
  }

  private authorize(instance: Instance, actor: Actor): void {
    if (actor.type === "system") return;
    if (actor.isAdmin || actor.principalId === instance.principalId) return;
    throw new InstanceError("Forbidden", `Principal ${actor.principalId} does not own instance ${instance.id}`);
  }

  private requireRunning(instance: Instance): void {
    if (instance.status === "provisioning") {
      throw new InstanceError("InProgress", `Instance ${instance.id} is still provisioning`);
    }
    if (instance.status !== "running") {
      throw new InstanceError("NotRunning", `Instance ${instance.id} is ${instance.status}`);
    }
  }

  private async startWorkload(instance: Instance, flag: string): Promise<WorkloadHandle> {
    const spec = {
      instanceId: instance.id,
      principalId: instance.principalId,
      challengeId: instance.challengeId,
      flag,
      expiresAt: instance.expiresAt,
    };
    return this.provisionerCall("provisioner.start", instance.id, (signal) => this.provisioner.start(spec, signal));
  }

  private async stopWorkload(handle: WorkloadHandle): Promise<void> {
    await this.provisionerCall("provisioner.stop", handle, (signal) => this.provisioner.stop(handle, signal));
  }

  private async provisionerCall<T>(
    label: string,
    target: string,
    op: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    return retryWithBackoff(() => withTimeout(op, this.options.provisionerTimeoutMs, label), {
      attempts: this.options.provisionerRetries + 1,
      baseDelayMs: this.options.provisionerRetryBaseMs,
      shouldRetry: (err) => err instanceof ProvisionerUnavailableError || err instanceof TimeoutError,
      sleep: this.sleep,
      onRetry: (err, attempt, delayMs) =>
        logger.warn(`${label} failed, retrying`, { target, attempt, delayMs, error: errorMessage(err) }),
    });
  }

  private async teardownQuietly(instanceId: string, handle: WorkloadHandle): Promise<void> {
    try {
      await this.stopWorkload(handle);
    } catch (err) {
      logger.error("Teardown after failed create did not complete; workload may be orphaned", {
        instanceId,
        handle,
        error: errorMessage(err),
      });
    }
  }

  /** Best effort removal of a workload whose handle was never recorded. */
  private async releaseOrphan(instanceId: string): Promise<void> {
    const release = this.provisioner.release?.bind(this.provisioner);
    if (!release) return;
    try {
      await this.provisionerCall("provisioner.release", instanceId, (signal) => release(instanceId, signal));
    } catch (err) {
      logger.warn("Could not release workload for instance", { instanceId, error: errorMessage(err) });
    }
  }

  /** Move a provisioning row to failed. Logged, not thrown: the reaper retries abandoned rows. */
  private async markFailed(instanceId: string, reason: string): Promise<void> {
    try {
      await this.store(() =>
        this.instances.withInstanceLock(instanceId, async (locked) => {
          if (locked.instance.status === "provisioning") {
            await locked.update({ status: "failed", failureReason: reason });
          }
        }),
      );
    } catch (err) {
      logger.error("Could not mark instance failed", { instanceId, error: errorMessage(err) });
      captureError(err, { instanceId, operation: "instance.mark_failed" });
    }
  }

  private toFinalizeError(instanceId: string, err: unknown): InstanceError {
    if (err instanceof DuplicateBindingError) {
      logger.error("CRITICAL: credential already bound to a new instance", { instanceId, severity: "critical" });
      captureError(err, { instanceId, operation: "instance.create" });
      return new InstanceError("DuplicateBinding", err.message, { cause: err });
    }
    if (err instanceof InstanceError) {
      if (err.kind === "InvariantViolation") captureError(err, { instanceId, operation: "instance.create" });
      return err;
    }
    logger.error("Finalizing instance failed", { instanceId, error: errorMessage(err) });
    captureError(err, { instanceId, operation: "instance.create" });
    return new InstanceError("InvariantViolation", errorMessage(err), { cause: err });
  }

  /** InstanceError for a stop/expire failure, or null for errors the caller should rethrow as-is. */
  private toStopError(instanceId: string, err: unknown): InstanceError | null {
    if (err instanceof InstanceError) return err;
    if (
      err instanceof ProvisionerUnavailableError ||
      err instanceof ProvisionerRejectedError ||
      err instanceof TimeoutError
    ) {
      const kind = provisionerErrorKind(err);
      return new InstanceError(kind, `Teardown of instance ${instanceId} failed: ${err.message}`, { cause: err });
    }
    return null;
  }

  /** Run a store operation, retrying transient failures; exhaustion becomes StoreUnavailable. */
  private async store<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await retryWithBackoff(op, {
        attempts: this.options.storeRetries + 1,
        baseDelayMs: STORE_RETRY_BASE_MS,
        maxDelayMs: 1000,
        shouldRetry: isTransientStoreError,
        sleep: this.sleep,
        onRetry: (err, attempt) =>
          logger.warn("Store operation failed, retrying", { attempt, error: errorMessage(err) }),
      });
    } catch (err) {
      if (isTransientStoreError(err)) {
        throw new InstanceError("StoreUnavailable", `Store unavailable: ${errorMessage(err)}`, { cause: err });
      }
      throw err;
    }
  }
}
