import { z } from "zod";
import { runtimePolicySchema } from "../policy/policy-schema.js";
import { flagTemplateSchema } from "../security/flag-format.js";

/**
 * Parse CHALLENGE_IMAGES, a JSON object mapping challenge id to container image.
 * Example: {"web-101":"registry.local/web-101:latest"}
 */
function parseChallengeImages(raw: string | undefined): Record<string, string> {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid CHALLENGE_IMAGES: not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  return z.record(z.string().min(1), z.string().min(1)).parse(parsed);
}

export const configSchema = z
  .object({
    nodeEnv: z.enum(["development", "production", "test"]).default("development"),
    logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

    databaseUrl: z.string().default("postgres://localhost:5432/instances"),

    /** Flag issuance and the encryption key ring. */
    flags: z
      .object({
        /** Root secret every key ring entry is derived from. Never logged. */
        masterSecret: z.string().min(16).optional(),
        prefix: z
          .string()
          .regex(/^[A-Za-z0-9_-]+$/, "FLAG_PREFIX may only contain letters, digits, '_' and '-'")
          .default("FLAG"),
        template: flagTemplateSchema.default("<hex><hex>"),
      })
      .default({ prefix: "FLAG", template: "<hex><hex>" }),

    /** Global default runtime policy, used when no stored default or override exists. */
    defaultPolicy: runtimePolicySchema.default({
      baseRuntimeSeconds: 900,
      extensionIncrementSeconds: 900,
      maxExtensions: 5,
      maxLifetimeSeconds: 5400,
    }),

    reaper: z
      .object({
        intervalMs: z.coerce.number().int().min(1000).default(60_000),
        batchSize: z.coerce.number().int().min(1).max(500).default(50),
        abandonedProvisioningSeconds: z.coerce.number().int().min(60).default(600),
      })
      .default({ intervalMs: 60_000, batchSize: 50, abandonedProvisioningSeconds: 600 }),

    provisioner: z
      .object({
        timeoutMs: z.coerce.number().int().min(1).default(30_000),
        retries: z.coerce.number().int().min(0).max(10).default(3),
        retryBaseMs: z.coerce.number().int().min(0).default(250),
        dockerSocketPath: z.string().optional(),
        challengeImages: z.record(z.string(), z.string()).default({}),
      })
      .default({ timeoutMs: 30_000, retries: 3, retryBaseMs: 250, challengeImages: {} }),

    store: z
      .object({
        lockTimeoutMs: z.coerce.number().int().min(1).default(5000),
        retries: z.coerce.number().int().min(0).max(10).default(3),
      })
      .default({ lockTimeoutMs: 5000, retries: 3 }),
  })
  .superRefine((c, ctx) => {
    if (c.nodeEnv === "production" && !c.flags.masterSecret) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["flags", "masterSecret"],
        message: "FLAG_MASTER_SECRET is required in production",
      });
    }
  });

export type Config = z.infer<typeof configSchema>;

/** The POLICY_* variables, or undefined when none are set so the built-in default applies. */
function readDefaultPolicy(env: NodeJS.ProcessEnv): Record<string, string | undefined> | undefined {
  const raw = {
    baseRuntimeSeconds: env.POLICY_BASE_RUNTIME_S,
    extensionIncrementSeconds: env.POLICY_EXTENSION_INCREMENT_S,
    maxExtensions: env.POLICY_MAX_EXTENSIONS,
    maxLifetimeSeconds: env.POLICY_MAX_LIFETIME_S,
  };
  return Object.values(raw).some((v) => v !== undefined) ? raw : undefined;
}

/** Build the raw config object from environment variables. Exported for tests. */
export function readConfigEnv(env: NodeJS.ProcessEnv): unknown {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    databaseUrl: env.DATABASE_URL,
    flags: {
      masterSecret: env.FLAG_MASTER_SECRET || undefined,
      prefix: env.FLAG_PREFIX,
      template: env.FLAG_TEMPLATE,
    },
    defaultPolicy: readDefaultPolicy(env),
    reaper: {
      intervalMs: env.REAPER_INTERVAL_MS,
      batchSize: env.REAPER_BATCH_SIZE,
      abandonedProvisioningSeconds: env.REAPER_ABANDONED_PROVISIONING_S,
    },
    provisioner: {
      timeoutMs: env.PROVISIONER_TIMEOUT_MS,
      retries: env.PROVISIONER_RETRIES,
      retryBaseMs: env.PROVISIONER_RETRY_BASE_MS,
      dockerSocketPath: env.DOCKER_SOCKET_PATH || undefined,
      challengeImages: parseChallengeImages(env.CHALLENGE_IMAGES),
    },
    store: {
      lockTimeoutMs: env.STORE_LOCK_TIMEOUT_MS,
      retries: env.STORE_RETRIES,
    },
  };
}

/** Parse and validate configuration. Throws on invalid values (fatal at startup). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse(readConfigEnv(env));
}

export const config = loadConfig();
