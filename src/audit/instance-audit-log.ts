import crypto from "node:crypto";
import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import type { IInstanceEventRepository } from "./audit-log-repository.js";
import type { InstanceEventFilters, InstanceEventInput, InstanceEventRow } from "./events.js";

/** Minimal write surface handed to the engines; lets tests pass a recorder. */
export interface AuditSink {
  record(event: InstanceEventInput): Promise<void>;
}

/**
 * Holds events raised inside a transaction until it commits. Dropped on
 * rollback by simply discarding the buffer.
 */
export class BufferedAuditSink implements AuditSink {
  private readonly events: InstanceEventInput[] = [];

  async record(event: InstanceEventInput): Promise<void> {
    this.events.push(event);
  }

  async flushTo(sink: AuditSink): Promise<void> {
    for (const event of this.events.splice(0)) {
      await sink.record(event);
    }
  }
}

/**
 * Append-only audit trail for instance lifecycle and flag events.
 *
 * `record` never throws: a failed write is logged, reported on the
 * operational channel, and the caller carries on.
 */
export class InstanceAuditLog implements AuditSink {
  constructor(
    private readonly repo: IInstanceEventRepository,
    private readonly now: () => number = Date.now,
  ) {}

  async record(event: InstanceEventInput): Promise<void> {
    const row: InstanceEventRow = {
      id: crypto.randomUUID(),
      principal_id: event.principalId ?? null,
      instance_id: event.instanceId ?? null,
      challenge_id: event.challengeId ?? null,
      action: event.action,
      timestamp: this.now(),
      details: JSON.stringify(event.details ?? {}),
    };

    try {
      await this.repo.insert(row);
    } catch (err) {
      logger.error("Audit write failed", {
        action: row.action,
        instanceId: row.instance_id,
        error: err instanceof Error ? err.message : String(err),
      });
      captureError(err, {
        instanceId: row.instance_id ?? undefined,
        operation: "audit.record",
        extra: { action: row.action },
      });
    }
  }

  /** Query the trail with filters. Read-only. */
  async query(filters: InstanceEventFilters = {}): Promise<{ entries: InstanceEventRow[]; total: number }> {
    const [entries, total] = await Promise.all([this.repo.query(filters), this.repo.count(filters)]);
    return { entries, total };
  }

  /** Export as CSV string for operators. */
  async exportCsv(filters: InstanceEventFilters = {}): Promise<string> {
    const rows = await this.repo.all({ ...filters });

    const header = "id,timestamp,action,principal_id,instance_id,challenge_id,details";
    const csvEscape = (v: string): string => (/[",\n\r]/.test(v) ? `"${v.replace(/"/g, '""')}"` : v);
    const lines = rows.map((r) =>
      [
        csvEscape(r.id),
        String(r.timestamp),
        csvEscape(r.action),
        csvEscape(r.principal_id ?? ""),
        csvEscape(r.instance_id ?? ""),
        csvEscape(r.challenge_id ?? ""),
        csvEscape(r.details),
      ].join(","),
    );

    return [header, ...lines].join("\n");
  }
}
