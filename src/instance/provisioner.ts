/** What the provisioner needs to start one challenge workload. */
export interface WorkloadSpec {
  instanceId: string;
  principalId: string;
  challengeId: string;
  /** Delivered to the workload; never logged. */
  flag: string;
  /** Unix epoch seconds */
  expiresAt: number;
}

/** Opaque reference to a started workload (a container id for Docker). */
export type WorkloadHandle = string;

/**
 * Starts and tears down challenge workloads.
 *
 * Implementations must honour `signal`: the lifecycle manager aborts it when
 * its timeout fires. `stop` must succeed for a workload that is already gone.
 */
export interface Provisioner {
  start(spec: WorkloadSpec, signal: AbortSignal): Promise<WorkloadHandle>;
  stop(handle: WorkloadHandle, signal: AbortSignal): Promise<void>;
  /** Tear down any workload started for the instance, when no handle was recorded. */
  release?(instanceId: string, signal: AbortSignal): Promise<void>;
}

/** Transient: the backend could not be reached or is overloaded. Retried. */
export class ProvisionerUnavailableError extends Error {
  readonly name = "ProvisionerUnavailableError" as const;
}

/** Permanent for this attempt: the backend refused the request. */
export class ProvisionerRejectedError extends Error {
  readonly name = "ProvisionerRejectedError" as const;
}
