import { logger } from "../config/logger.js";
import { captureMessage } from "../observability/sentry.js";
import type { ExpireOutcome, LifecycleManager } from "./lifecycle-manager.js";

export interface ReaperConfig {
  /** Sweep interval in milliseconds */
  intervalMs?: number;
  /** Instances expired concurrently per batch */
  batchSize?: number;
  /** Upper bound on candidates listed per sweep */
  maxPerSweep?: number;
}

export interface SweepResult {
  examined: number;
  expired: number;
  skipped: number;
  failed: number;
  abandoned: number;
}

/**
 * Periodically stops running instances whose deadline has passed.
 *
 * Candidates are listed without locks; LifecycleManager.expire re-checks
 * each one under its lock, so a listed instance that was extended or
 * stopped in the meantime is skipped.
 */
export class ExpiryReaper {
  private readonly intervalMs: number;
  private readonly batchSize: number;
  private readonly maxPerSweep: number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private sweeping: Promise<SweepResult> | null = null;

  constructor(
    private readonly lifecycle: LifecycleManager,
    config: ReaperConfig = {},
  ) {
    this.intervalMs = config.intervalMs ?? 60_000;
    this.batchSize = Math.max(1, config.batchSize ?? 50);
    this.maxPerSweep = Math.max(this.batchSize, config.maxPerSweep ?? this.batchSize * 20);
  }

  start(): void {
    if (this.timer) {
      logger.warn("Expiry reaper already running");
      return;
    }

    logger.info("Starting expiry reaper", { intervalMs: this.intervalMs, batchSize: this.batchSize });

    this.timer = setInterval(() => {
      if (this.sweeping) {
        logger.warn("Previous expiry sweep still running; skipping this tick");
        return;
      }
      this.sweep().catch((err: unknown) => {
        logger.error("Expiry sweep failed", { error: err instanceof Error ? err.message : String(err) });
      });
    }, this.intervalMs);
  }

  /** Stop the timer and wait for an in-flight sweep to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info("Expiry reaper stopped");
    }
    if (this.sweeping) {
      // Failures are logged by whoever started the sweep.
      await this.sweeping.catch(() => undefined);
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** One pass over expired and abandoned instances. Concurrent calls share the running pass. */
  async sweep(): Promise<SweepResult> {
    if (this.sweeping) return this.sweeping;
    this.sweeping = this.runSweep();
    try {
      return await this.sweeping;
    } finally {
      this.sweeping = null;
    }
  }

  private async runSweep(): Promise<SweepResult> {
    const result: SweepResult = { examined: 0, expired: 0, skipped: 0, failed: 0, abandoned: 0 };

    const ids = await this.lifecycle.listExpiredIds(this.maxPerSweep);
    result.examined = ids.length;

    for (let i = 0; i < ids.length; i += this.batchSize) {
      const batch = ids.slice(i, i + this.batchSize);
      const outcomes = await Promise.allSettled(batch.map((id) => this.lifecycle.expire(id)));
      outcomes.forEach((outcome, idx) => {
        const status: ExpireOutcome = outcome.status === "fulfilled" ? outcome.value : "failed";
        if (outcome.status === "rejected") {
          logger.error("Expiring instance threw", {
            instanceId: batch[idx],
            error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
          });
        }
        result[status]++;
      });
    }

    const abandonedIds = await this.lifecycle.listAbandonedIds(this.maxPerSweep);
    for (const id of abandonedIds) {
      try {
        if (await this.lifecycle.failAbandoned(id)) result.abandoned++;
      } catch (err) {
        logger.error("Failing abandoned instance threw", {
          instanceId: id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    if (result.examined > 0 || result.abandoned > 0) {
      logger.info("Expiry sweep complete", { ...result });
    }
    if (result.failed > 0) {
      // Overdue instances are still running with live flags.
      captureMessage(`Expiry sweep failed for ${result.failed} of ${result.examined} overdue instances`, "warning");
    }
    return result;
  }
}
