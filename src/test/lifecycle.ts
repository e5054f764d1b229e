import { type Mock, vi } from "vitest";
import { DrizzleInstanceEventRepository } from "../audit/audit-log-repository.js";
import { InstanceAuditLog } from "../audit/instance-audit-log.js";
import type { DrizzleDb } from "../db/index.js";
import { DrizzleInstanceRepository } from "../instance/instance-repository.js";
import { LifecycleManager, type LifecycleOptions } from "../instance/lifecycle-manager.js";
import type { Provisioner, WorkloadSpec } from "../instance/provisioner.js";
import { DrizzlePolicyRepository } from "../policy/policy-repository.js";
import { PolicyResolver } from "../policy/policy-resolver.js";
import type { RuntimePolicy } from "../policy/policy-schema.js";
import { CredentialEngine } from "../security/credential-engine.js";
import { DrizzleCredentialKeyRepository } from "../security/credential-key-repository.js";
import { DrizzleCredentialRepository } from "../security/credential-repository.js";
import { FlagKeyring } from "../security/keyring.js";

export const TEST_SECRET = "test-secret-master-key";

export const DEFAULT_POLICY: RuntimePolicy = {
  baseRuntimeSeconds: 900,
  extensionIncrementSeconds: 900,
  maxExtensions: 5,
  maxLifetimeSeconds: 5400,
};

/** Settable clock in epoch seconds. */
export interface FakeClock {
  (): number;
  set(seconds: number): void;
  advance(seconds: number): void;
}

export function fakeClock(start = 1_000_000): FakeClock {
  let now = start;
  const clock = () => now;
  return Object.assign(clock, {
    set(seconds: number) {
      now = seconds;
    },
    advance(seconds: number) {
      now += seconds;
    },
  });
}

export interface FakeProvisioner extends Provisioner {
  start: Mock<(spec: WorkloadSpec, signal: AbortSignal) => Promise<string>>;
  stop: Mock<(handle: string, signal: AbortSignal) => Promise<void>>;
  release: Mock<(instanceId: string, signal: AbortSignal) => Promise<void>>;
}

/** In-memory provisioner: `start` returns `ctr-<instanceId>`, `stop` and `release` succeed. */
export function fakeProvisioner(): FakeProvisioner {
  return {
    start: vi.fn<(spec: WorkloadSpec, signal: AbortSignal) => Promise<string>>(
      async (spec) => `ctr-${spec.instanceId}`,
    ),
    stop: vi.fn<(handle: string, signal: AbortSignal) => Promise<void>>(async () => {}),
    release: vi.fn<(instanceId: string, signal: AbortSignal) => Promise<void>>(async () => {}),
  };
}

export interface LifecycleHarness {
  lifecycle: LifecycleManager;
  instances: DrizzleInstanceRepository;
  policies: PolicyResolver;
  credentials: CredentialEngine;
  audit: InstanceAuditLog;
  provisioner: FakeProvisioner;
  clock: FakeClock;
}

/** Wire a LifecycleManager over a migrated test database with fakes at the edges. */
export async function buildLifecycle(
  db: DrizzleDb,
  overrides: { policy?: RuntimePolicy; options?: Partial<LifecycleOptions> } = {},
): Promise<LifecycleHarness> {
  const clock = fakeClock();
  const audit = new InstanceAuditLog(new DrizzleInstanceEventRepository(db), () => clock() * 1000);
  const keyring = await FlagKeyring.load(new DrizzleCredentialKeyRepository(db), TEST_SECRET);
  const credentials = new CredentialEngine(new DrizzleCredentialRepository(db), keyring, audit, {
    prefix: "FLAG",
    template: "<hex><hex>",
  });
  const policies = await PolicyResolver.create(
    new DrizzlePolicyRepository(db),
    audit,
    overrides.policy ?? DEFAULT_POLICY,
  );
  const instances = new DrizzleInstanceRepository(db, { lockTimeoutMs: 1000 });
  const provisioner = fakeProvisioner();
  const lifecycle = new LifecycleManager(instances, policies, credentials, provisioner, audit, {
    clock,
    provisionerTimeoutMs: 1000,
    provisionerRetries: 2,
    provisionerRetryBaseMs: 1,
    storeRetries: 2,
    abandonedProvisioningSeconds: 600,
    sleep: async () => {},
    ...overrides.options,
  });
  return { lifecycle, instances, policies, credentials, audit, provisioner, clock };
}
