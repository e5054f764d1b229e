export { DockerProvisioner } from "./docker-provisioner.js";
export { INSTANCE_ERROR_KINDS, InstanceError, type InstanceErrorKind, isInstanceError } from "./errors.js";
export { ExpiryReaper, type ReaperConfig, type SweepResult } from "./expiry-reaper.js";
export { DrizzleInstanceRepository, type IInstanceRepository, type LockedInstance } from "./instance-repository.js";
export {
  type CreateInstanceView,
  type FlagVerdict,
  InstanceService,
  type InstanceStatusView,
  type ServiceResult,
} from "./instance-service.js";
export {
  type CreatedInstance,
  type ExpireOutcome,
  LifecycleManager,
  type LifecycleOptions,
} from "./lifecycle-manager.js";
export {
  type Provisioner,
  ProvisionerRejectedError,
  ProvisionerUnavailableError,
  type WorkloadHandle,
  type WorkloadSpec,
} from "./provisioner.js";
export { type Actor, type Clock, type Instance, SYSTEM_ACTOR, systemClock } from "./repository-types.js";
export { INSTANCE_STATUSES, type InstanceStatus, isValidTransition, type TerminationReason } from "./state-machine.js";
