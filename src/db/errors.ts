/** SQLSTATE codes this service reacts to. */
export const PG_UNIQUE_VIOLATION = "23505";

const TRANSIENT_CODES = new Set([
  "55P03", // lock_not_available (lock_timeout)
  "40001", // serialization_failure
  "40P01", // deadlock_detected
  "57P01", // admin_shutdown
  "08000",
  "08003",
  "08006",
]);

const TRANSIENT_NETWORK_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE"]);

/**
 * SQLSTATE (or socket error code) of a driver error, looking through `cause`
 * chains since query builders may wrap the driver error.
 */
export function pgErrorCode(err: unknown, depth = 0): string | undefined {
  if (typeof err !== "object" || err === null || depth > 4) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err) return pgErrorCode(err.cause, depth + 1);
  return undefined;
}

/** True when `err` is a Postgres unique-constraint violation. */
export function isUniqueViolation(err: unknown): boolean {
  if (pgErrorCode(err) === PG_UNIQUE_VIOLATION) return true;
  return err instanceof Error && err.message.includes("duplicate key");
}

/** True for store failures worth retrying: lock timeouts, serialization conflicts, lost connections. */
export function isTransientStoreError(err: unknown): boolean {
  const code = pgErrorCode(err);
  if (code === undefined) return false;
  return TRANSIENT_CODES.has(code) || TRANSIENT_NETWORK_CODES.has(code);
}
