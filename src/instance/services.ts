import Docker from "dockerode";
import pg from "pg";
import { DrizzleInstanceEventRepository } from "../audit/audit-log-repository.js";
import { InstanceAuditLog } from "../audit/instance-audit-log.js";
import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { createDb, type DrizzleDb } from "../db/index.js";
import { DrizzlePolicyRepository } from "../policy/policy-repository.js";
import { PolicyResolver } from "../policy/policy-resolver.js";
import { CredentialEngine } from "../security/credential-engine.js";
import { DrizzleCredentialKeyRepository } from "../security/credential-key-repository.js";
import { DrizzleCredentialRepository } from "../security/credential-repository.js";
import { FlagKeyring } from "../security/keyring.js";
import { DockerProvisioner } from "./docker-provisioner.js";
import { ExpiryReaper } from "./expiry-reaper.js";
import { DrizzleInstanceRepository } from "./instance-repository.js";
import { InstanceService } from "./instance-service.js";
import { LifecycleManager } from "./lifecycle-manager.js";

/**
 * Shared lazy-initialized singletons.
 *
 * Nothing runs at import time. The synchronous getters build on first call;
 * the pieces that need the database to load (key ring, policy resolver and
 * everything above them) are built by initServices().
 */

let _pool: pg.Pool | null = null;
let _db: DrizzleDb | null = null;
let _auditLog: InstanceAuditLog | null = null;
let _instanceRepo: DrizzleInstanceRepository | null = null;
let _provisioner: DockerProvisioner | null = null;

interface LoadedServices {
  keyring: FlagKeyring;
  credentials: CredentialEngine;
  policies: PolicyResolver;
  lifecycle: LifecycleManager;
  reaper: ExpiryReaper;
  service: InstanceService;
}

let _loaded: LoadedServices | null = null;

export function getPool(): pg.Pool {
  if (!_pool) {
    _pool = new pg.Pool({ connectionString: config.databaseUrl });
    _pool.on("error", (err) => logger.error("Idle database client error", { error: err.message }));
  }
  return _pool;
}

export function getDb(): DrizzleDb {
  if (!_db) {
    _db = createDb(getPool());
  }
  return _db;
}

export function getAuditLog(): InstanceAuditLog {
  if (!_auditLog) {
    _auditLog = new InstanceAuditLog(new DrizzleInstanceEventRepository(getDb()));
  }
  return _auditLog;
}

export function getInstanceRepo(): DrizzleInstanceRepository {
  if (!_instanceRepo) {
    _instanceRepo = new DrizzleInstanceRepository(getDb(), { lockTimeoutMs: config.store.lockTimeoutMs });
  }
  return _instanceRepo;
}

export function getProvisioner(): DockerProvisioner {
  if (!_provisioner) {
    const docker = new Docker(
      config.provisioner.dockerSocketPath ? { socketPath: config.provisioner.dockerSocketPath } : undefined,
    );
    const images = config.provisioner.challengeImages;
    _provisioner = new DockerProvisioner(docker, (challengeId) => images[challengeId] ?? null);
  }
  return _provisioner;
}

/**
 * Load the key ring and policy resolver and wire the lifecycle stack.
 * @throws KeyringConfigurationError or PolicyConfigurationError; both are fatal at startup
 */
export async function initServices(): Promise<LoadedServices> {
  if (_loaded) return _loaded;

  const db = getDb();
  const audit = getAuditLog();
  const keyring = await FlagKeyring.load(new DrizzleCredentialKeyRepository(db), config.flags.masterSecret);
  const credentials = new CredentialEngine(new DrizzleCredentialRepository(db), keyring, audit, {
    prefix: config.flags.prefix,
    template: config.flags.template,
  });
  const policies = await PolicyResolver.create(new DrizzlePolicyRepository(db), audit, config.defaultPolicy);
  const lifecycle = new LifecycleManager(getInstanceRepo(), policies, credentials, getProvisioner(), audit, {
    provisionerTimeoutMs: config.provisioner.timeoutMs,
    provisionerRetries: config.provisioner.retries,
    provisionerRetryBaseMs: config.provisioner.retryBaseMs,
    storeRetries: config.store.retries,
    abandonedProvisioningSeconds: config.reaper.abandonedProvisioningSeconds,
  });
  const reaper = new ExpiryReaper(lifecycle, {
    intervalMs: config.reaper.intervalMs,
    batchSize: config.reaper.batchSize,
  });
  const service = new InstanceService(lifecycle, policies, credentials, audit);

  _loaded = { keyring, credentials, policies, lifecycle, reaper, service };
  return _loaded;
}

function loaded(): LoadedServices {
  if (!_loaded) throw new Error("Services not initialized; call initServices() first");
  return _loaded;
}

export function getInstanceService(): InstanceService {
  return loaded().service;
}

export function getLifecycleManager(): LifecycleManager {
  return loaded().lifecycle;
}

export function getPolicyResolver(): PolicyResolver {
  return loaded().policies;
}

export function getCredentialEngine(): CredentialEngine {
  return loaded().credentials;
}

export function getExpiryReaper(): ExpiryReaper {
  return loaded().reaper;
}

/** Stop background work and close the pool. */
export async function shutdownServices(): Promise<void> {
  if (_loaded) await _loaded.reaper.stop();
  if (_pool) await _pool.end();
  _loaded = null;
  _instanceRepo = null;
  _auditLog = null;
  _db = null;
  _pool = null;
  _provisioner = null;
}
