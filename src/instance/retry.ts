/** Thrown by withTimeout when the operation does not settle in time. */
export class TimeoutError extends Error {
  readonly name = "TimeoutError" as const;
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
  }
}

/**
 * Run `op` with a deadline. On timeout the signal passed to `op` is aborted
 * and a TimeoutError is thrown; a late result from `op` is ignored.
 */
export async function withTimeout<T>(op: (signal: AbortSignal) => Promise<T>, ms: number, label: string): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race settles with the timeout.
      reject(new TimeoutError(label, ms));
      controller.abort();
    }, ms);
  });
  try {
    return await Promise.race([op(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  /** Total attempts, including the first. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Retry `fn` with exponential backoff while `shouldRetry` says the error is transient. */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxDelay = options.maxDelayMs ?? 10_000;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= options.attempts || !options.shouldRetry(err)) throw err;
      const delayMs = Math.min(options.baseDelayMs * 2 ** (attempt - 1), maxDelay);
      options.onRetry?.(err, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
