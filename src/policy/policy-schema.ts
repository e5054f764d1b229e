import { z } from "zod";

/** Sentinel policy key for the deployment-wide default. */
export const GLOBAL_POLICY_KEY = "*";

/**
 * Timing and limit policy for a challenge's instances. All durations are seconds.
 *
 * `maxLifetimeSeconds` is a hard cap measured from creation; extensions can
 * never push the deadline past it.
 */
export const runtimePolicySchema = z
  .object({
    baseRuntimeSeconds: z.coerce.number().int().positive(),
    extensionIncrementSeconds: z.coerce.number().int().positive(),
    maxExtensions: z.coerce.number().int().min(0),
    maxLifetimeSeconds: z.coerce.number().int().positive(),
  })
  .refine((p) => p.maxLifetimeSeconds >= p.baseRuntimeSeconds, {
    message: "maxLifetimeSeconds must be at least baseRuntimeSeconds",
    path: ["maxLifetimeSeconds"],
  });

export type RuntimePolicy = z.infer<typeof runtimePolicySchema>;
