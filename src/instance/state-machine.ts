/**
 * Instance lifecycle state machine. Pure logic.
 *
 * LockedInstance.update() enforces this graph; no other code changes an
 * instance's status.
 */

export const INSTANCE_STATUSES = ["provisioning", "running", "terminated", "failed"] as const;

export type InstanceStatus = (typeof INSTANCE_STATUSES)[number];

export const TERMINATION_REASONS = ["manual", "auto"] as const;

export type TerminationReason = (typeof TERMINATION_REASONS)[number];

/**
 * ```
 * provisioning → running, failed
 * running      → running (extend), terminated
 * terminated   (terminal)
 * failed       (terminal)
 * ```
 */
export const VALID_TRANSITIONS: Record<InstanceStatus, readonly InstanceStatus[]> = {
  provisioning: ["running", "failed"],
  running: ["running", "terminated"],
  terminated: [],
  failed: [],
};

export function isValidTransition(from: InstanceStatus, to: InstanceStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: InstanceStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

export function parseStatus(value: string): InstanceStatus {
  const status = INSTANCE_STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown instance status: ${value}`);
  return status;
}

export function parseTerminationReason(value: string | null): TerminationReason | null {
  if (value === null) return null;
  const reason = TERMINATION_REASONS.find((r) => r === value);
  if (!reason) throw new Error(`Unknown termination reason: ${value}`);
  return reason;
}

/** Thrown when code attempts a transition not in the valid graph. */
export class InvalidTransitionError extends Error {
  readonly name = "InvalidTransitionError" as const;
  constructor(from: InstanceStatus, to: InstanceStatus) {
    super(`Invalid instance transition: ${from} → ${to}`);
  }
}
