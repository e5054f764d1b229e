/** Every action tag stored in instance_events.action. */
export const INSTANCE_EVENT_ACTIONS = [
  "instance.created",
  "instance.extended",
  "instance.stopped_manual",
  "instance.stopped_auto",
  "instance.failed_create",
  "instance.failed_extend",
  "instance.failed_stop",
  "instance.failed_expire",
  "flag.issued",
  "flag.validated",
  "flag.rejected",
  "flag.key_rotated",
  "flag.rewrapped",
  "policy.updated",
  "policy.cleared",
] as const;

export type InstanceEventAction = (typeof INSTANCE_EVENT_ACTIONS)[number];

/** Input to InstanceAuditLog.record. Ids are null for system events or failed creates. */
export interface InstanceEventInput {
  action: InstanceEventAction;
  principalId?: string | null;
  instanceId?: string | null;
  challengeId?: string | null;
  details?: Record<string, unknown>;
}

/** A stored audit event. `details` is a JSON object string. */
export interface InstanceEventRow {
  id: string;
  principal_id: string | null;
  instance_id: string | null;
  challenge_id: string | null;
  action: string;
  timestamp: number;
  details: string;
}

/** Filters for querying the audit trail. `action` may be exact or a `prefix.*` wildcard. */
export interface InstanceEventFilters {
  principalId?: string;
  challengeId?: string;
  instanceId?: string;
  action?: string;
  /** Inclusive lower bound, epoch ms */
  since?: number;
  /** Inclusive upper bound, epoch ms */
  until?: number;
  /** Newest first by default */
  order?: "asc" | "desc";
  limit?: number;
  offset?: number;
}
