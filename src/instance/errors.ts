export const INSTANCE_ERROR_KINDS = [
  "AlreadyRunning",
  "NotRunning",
  "InProgress",
  "NotFound",
  "Forbidden",
  "ExtensionLimitReached",
  "LifetimeCapReached",
  "ProvisionerUnavailable",
  "ProvisionerRejected",
  "DuplicateBinding",
  "CredentialNotFound",
  "StoreUnavailable",
  "InvariantViolation",
] as const;

export type InstanceErrorKind = (typeof INSTANCE_ERROR_KINDS)[number];

/** Every failure the lifecycle manager reports carries one of the kinds above. */
export class InstanceError extends Error {
  readonly name = "InstanceError" as const;
  constructor(
    readonly kind: InstanceErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isInstanceError(err: unknown, kind?: InstanceErrorKind): err is InstanceError {
  return err instanceof InstanceError && (kind === undefined || err.kind === kind);
}
