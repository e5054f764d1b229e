import { and, asc, eq, inArray, lte, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { isUniqueViolation } from "../db/errors.js";
import { instances } from "../db/schema/index.js";
import { DrizzleCredentialRepository, type ICredentialRepository } from "../security/credential-repository.js";
import { InstanceError } from "./errors.js";
import type { Instance, InstancePatch, NewInstance } from "./repository-types.js";
import {
  InvalidTransitionError,
  isValidTransition,
  parseStatus,
  parseTerminationReason,
} from "./state-machine.js";

type InstanceRow = typeof instances.$inferSelect;

function toInstance(row: InstanceRow): Instance {
  return {
    ...row,
    status: parseStatus(row.status),
    terminationReason: parseTerminationReason(row.terminationReason),
  };
}

/**
 * An instance row held under its lock for the duration of a transaction.
 * Everything done through it commits or rolls back together.
 */
export interface LockedInstance {
  /** Current state, refreshed after every update. */
  readonly instance: Instance;
  /** Credential storage bound to the same transaction. */
  readonly credentials: ICredentialRepository;
  /** @throws InvalidTransitionError if the patch changes status along an edge the state machine forbids */
  update(patch: InstancePatch): Promise<Instance>;
}

/** Repository interface for instance rows. */
export interface IInstanceRepository {
  /**
   * Insert a provisioning row.
   * @throws InstanceError AlreadyRunning if the principal already holds an active slot for the challenge
   */
  insertProvisioning(record: NewInstance): Promise<Instance>;
  getById(id: string): Promise<Instance | null>;
  /** The provisioning or running instance for (principal, challenge), if any. */
  findActive(principalId: string, challengeId: string): Promise<Instance | null>;
  /** Running instances whose deadline is at or before `now`, earliest first. Takes no locks. */
  listExpiredIds(now: number, limit: number): Promise<string[]>;
  /** Provisioning instances created at or before `createdBefore`. Takes no locks. */
  listAbandonedIds(createdBefore: number, limit: number): Promise<string[]>;
  /**
   * Run `fn` in a transaction holding the instance's row lock.
   * @throws InstanceError NotFound if the instance does not exist
   */
  withInstanceLock<T>(id: string, fn: (locked: LockedInstance) => Promise<T>): Promise<T>;
}

export class DrizzleInstanceRepository implements IInstanceRepository {
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly db: DrizzleDb,
    options: { lockTimeoutMs?: number } = {},
  ) {
    this.lockTimeoutMs = Math.max(1, Math.floor(options.lockTimeoutMs ?? 5000));
  }

  async insertProvisioning(record: NewInstance): Promise<Instance> {
    try {
      const rows = await this.db
        .insert(instances)
        .values({ ...record, status: "provisioning", extensionCount: 0 })
        .returning();
      const row = rows[0];
      if (!row) throw new Error(`Insert of instance ${record.id} returned no row`);
      return toInstance(row);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new InstanceError(
          "AlreadyRunning",
          `Principal ${record.principalId} already has an active instance of ${record.challengeId}`,
          { cause: err },
        );
      }
      throw err;
    }
  }

  async getById(id: string): Promise<Instance | null> {
    const rows = await this.db.select().from(instances).where(eq(instances.id, id));
    return rows[0] ? toInstance(rows[0]) : null;
  }

  async findActive(principalId: string, challengeId: string): Promise<Instance | null> {
    const rows = await this.db
      .select()
      .from(instances)
      .where(
        and(
          eq(instances.principalId, principalId),
          eq(instances.challengeId, challengeId),
          inArray(instances.status, ["provisioning", "running"]),
        ),
      )
      .limit(1);
    return rows[0] ? toInstance(rows[0]) : null;
  }

  async listExpiredIds(now: number, limit: number): Promise<string[]> {
    const rows = await this.db
      .select({ id: instances.id })
      .from(instances)
      .where(and(eq(instances.status, "running"), lte(instances.expiresAt, now)))
      .orderBy(asc(instances.expiresAt))
      .limit(limit);
    return rows.map((r) => r.id);
  }

  async listAbandonedIds(createdBefore: number, limit: number): Promise<string[]> {
    const rows = await this.db
      .select({ id: instances.id })
      .from(instances)
      .where(and(eq(instances.status, "provisioning"), lte(instances.createdAt, createdBefore)))
      .orderBy(asc(instances.createdAt))
      .limit(limit);
    return rows.map((r) => r.id);
  }

  async withInstanceLock<T>(id: string, fn: (locked: LockedInstance) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      // lockTimeoutMs is a validated integer; SET does not take bind parameters.
      await tx.execute(sql.raw(`SET LOCAL lock_timeout = ${this.lockTimeoutMs}`));

      const row = (await tx.select().from(instances).where(eq(instances.id, id)).for("update"))[0];
      if (!row) throw new InstanceError("NotFound", `Instance ${id} not found`);

      let current = toInstance(row);
      const locked: LockedInstance = {
        get instance() {
          return current;
        },
        credentials: new DrizzleCredentialRepository(tx),
        async update(patch: InstancePatch): Promise<Instance> {
          if (patch.status !== undefined && !isValidTransition(current.status, patch.status)) {
            throw new InvalidTransitionError(current.status, patch.status);
          }
          const updated = (await tx.update(instances).set(patch).where(eq(instances.id, id)).returning())[0];
          if (!updated) throw new Error(`Instance ${id} disappeared while locked`);
          current = toInstance(updated);
          return current;
        },
      };

      return fn(locked);
    });
  }
}
