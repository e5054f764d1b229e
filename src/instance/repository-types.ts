import type { InstanceStatus, TerminationReason } from "./state-machine.js";

/** Plain domain object for a challenge instance. Times are Unix epoch seconds. */
export interface Instance {
  id: string;
  principalId: string;
  challengeId: string;
  status: InstanceStatus;
  createdAt: number;
  expiresAt: number;
  extensionCount: number;
  lastExtendedAt: number | null;
  workloadHandle: string | null;
  terminatedAt: number | null;
  terminationReason: TerminationReason | null;
  failureReason: string | null;
}

export interface NewInstance {
  id: string;
  principalId: string;
  challengeId: string;
  createdAt: number;
  expiresAt: number;
}

/** Fields the lifecycle manager may change under the instance lock. */
export type InstancePatch = Partial<
  Pick<
    Instance,
    | "status"
    | "expiresAt"
    | "extensionCount"
    | "lastExtendedAt"
    | "workloadHandle"
    | "terminatedAt"
    | "terminationReason"
    | "failureReason"
  >
>;

/** Who is asking. System actors (the reaper) bypass ownership checks. */
export type Actor = { type: "principal"; principalId: string; isAdmin?: boolean } | { type: "system" };

export const SYSTEM_ACTOR: Actor = { type: "system" };

/** Returns Unix epoch seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
