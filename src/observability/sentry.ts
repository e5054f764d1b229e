import * as Sentry from "@sentry/node";

let enabled = false;

/**
 * Initialize the Sentry SDK. Call before anything else in src/index.ts.
 * Without a DSN, Sentry stays disabled and every capture is a no-op.
 */
export function initSentry(dsn: string | undefined, environment = process.env.NODE_ENV ?? "development"): void {
  if (!dsn) {
    enabled = false;
    return;
  }

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    tracesSampleRate: environment === "production" ? 0.1 : 1.0,
    integrations: [Sentry.dedupeIntegration()],
  });
  enabled = true;
}

/**
 * Report an error on the operational channel with instance-level tags.
 */
export function captureError(
  error: unknown,
  context?: {
    instanceId?: string;
    principalId?: string;
    operation?: string;
    extra?: Record<string, unknown>;
  },
): void {
  if (!enabled) return;
  Sentry.captureException(error, {
    tags: {
      ...(context?.instanceId && { instanceId: context.instanceId }),
      ...(context?.principalId && { principalId: context.principalId }),
      ...(context?.operation && { operation: context.operation }),
    },
    extra: context?.extra,
  });
}

export function captureMessage(message: string, level: Sentry.SeverityLevel = "info"): void {
  if (!enabled) return;
  Sentry.captureMessage(message, level);
}
