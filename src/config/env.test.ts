import { describe, expect, it } from "vitest";
import { loadConfig } from "./index.js";

// loadConfig is called with an explicit env; the `config` singleton is parsed once at import.

describe("config env validation", () => {
  it("uses defaults when no env vars are set", () => {
    const result = loadConfig({});
    expect(result.nodeEnv).toBe("development");
    expect(result.flags.prefix).toBe("FLAG");
    expect(result.flags.template).toBe("<hex><hex>");
    expect(result.flags.masterSecret).toBeUndefined();
    expect(result.defaultPolicy).toEqual({
      baseRuntimeSeconds: 900,
      extensionIncrementSeconds: 900,
      maxExtensions: 5,
      maxLifetimeSeconds: 5400,
    });
    expect(result.reaper).toEqual({ intervalMs: 60_000, batchSize: 50, abandonedProvisioningSeconds: 600 });
    expect(result.provisioner.timeoutMs).toBe(30_000);
    expect(result.provisioner.retries).toBe(3);
    expect(result.provisioner.challengeImages).toEqual({});
    expect(result.store).toEqual({ lockTimeoutMs: 5000, retries: 3 });
  });

  it("coerces numeric strings", () => {
    const result = loadConfig({
      POLICY_BASE_RUNTIME_S: "600",
      POLICY_EXTENSION_INCREMENT_S: "300",
      POLICY_MAX_EXTENSIONS: "2",
      POLICY_MAX_LIFETIME_S: "1200",
      REAPER_INTERVAL_MS: "5000",
      STORE_RETRIES: "1",
    });
    expect(result.defaultPolicy).toEqual({
      baseRuntimeSeconds: 600,
      extensionIncrementSeconds: 300,
      maxExtensions: 2,
      maxLifetimeSeconds: 1200,
    });
    expect(result.reaper.intervalMs).toBe(5000);
    expect(result.store.retries).toBe(1);
  });

  it("rejects a partial default policy", () => {
    expect(() => loadConfig({ POLICY_BASE_RUNTIME_S: "600" })).toThrow();
  });

  it("rejects a lifetime shorter than the base runtime", () => {
    expect(() =>
      loadConfig({
        POLICY_BASE_RUNTIME_S: "900",
        POLICY_EXTENSION_INCREMENT_S: "900",
        POLICY_MAX_EXTENSIONS: "1",
        POLICY_MAX_LIFETIME_S: "600",
      }),
    ).toThrow("maxLifetimeSeconds must be at least baseRuntimeSeconds");
  });

  it("rejects a flag template with fewer than two placeholders", () => {
    expect(() => loadConfig({ FLAG_TEMPLATE: "ctf-<hex>" })).toThrow();
  });

  it("rejects a short master secret", () => {
    expect(() => loadConfig({ FLAG_MASTER_SECRET: "short" })).toThrow();
  });

  it("requires a master secret in production", () => {
    expect(() => loadConfig({ NODE_ENV: "production" })).toThrow("FLAG_MASTER_SECRET is required in production");
    expect(loadConfig({ NODE_ENV: "production", FLAG_MASTER_SECRET: "test-secret-master-key" }).nodeEnv).toBe(
      "production",
    );
  });

  it("parses CHALLENGE_IMAGES as a JSON object", () => {
    const result = loadConfig({ CHALLENGE_IMAGES: '{"web-101":"registry.local/web-101:1"}' });
    expect(result.provisioner.challengeImages).toEqual({ "web-101": "registry.local/web-101:1" });
  });

  it("rejects CHALLENGE_IMAGES that is not JSON", () => {
    expect(() => loadConfig({ CHALLENGE_IMAGES: "web-101=img" })).toThrow("Invalid CHALLENGE_IMAGES");
  });
});
