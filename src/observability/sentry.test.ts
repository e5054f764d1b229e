import { beforeEach, describe, expect, it, vi } from "vitest";

// Mock @sentry/node before importing the module
vi.mock("@sentry/node", () => ({
  init: vi.fn(),
  captureException: vi.fn(),
  captureMessage: vi.fn(),
  dedupeIntegration: vi.fn(() => ({ name: "Dedupe" })),
}));

import * as Sentry from "@sentry/node";
import { captureError, captureMessage, initSentry } from "./sentry.js";

describe("sentry", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("does not call Sentry.init when dsn is undefined", () => {
    initSentry(undefined);
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("does not call Sentry.init when dsn is empty string", () => {
    initSentry("");
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("calls Sentry.init with dsn and environment when provided", () => {
    initSentry("https://abc@sentry.example/123", "production");
    expect(Sentry.init).toHaveBeenCalledWith(
      expect.objectContaining({
        dsn: "https://abc@sentry.example/123",
        environment: "production",
        tracesSampleRate: 0.1,
      }),
    );
  });

  it("captureError forwards instance tags", () => {
    initSentry("https://abc@sentry.example/123");
    const err = new Error("test");
    captureError(err, { instanceId: "inst-1", operation: "stop" });
    expect(Sentry.captureException).toHaveBeenCalledWith(err, {
      tags: { instanceId: "inst-1", operation: "stop" },
      extra: undefined,
    });
  });

  it("captureError is a no-op when sentry is not initialized", () => {
    initSentry(undefined);
    expect(() => captureError(new Error("test"))).not.toThrow();
    expect(Sentry.captureException).not.toHaveBeenCalled();
  });

  it("captureMessage calls Sentry.captureMessage", () => {
    initSentry("https://abc@sentry.example/123");
    captureMessage("test message", "warning");
    expect(Sentry.captureMessage).toHaveBeenCalledWith("test message", "warning");
  });
});
