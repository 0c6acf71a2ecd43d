// ─── Service Configuration ─────────────────────────────────────────
// Lock timings and snapshot retention, validated with zod. Every field
// has a default so an empty object is a complete configuration.

import { z } from "zod";
import { formatZodIssues } from "@rummikub/schema";
import { ConfigError } from "./errors";

const DAY_MS = 24 * 60 * 60 * 1000;

export const ServiceConfigSchema = z.object({
  /** A lease older than this may be taken over by another caller. */
  lockLeaseMs: z.number().int().positive().default(5_000),
  /** How long `acquire` keeps retrying before giving up. */
  lockWaitMs: z.number().int().nonnegative().default(5_000),
  lockRetryMs: z.number().int().positive().default(100),
  /** Completed games are dropped from storage after this long. */
  completedTtlMs: z.number().int().positive().default(DAY_MS),
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

const optionalMs = z.coerce.number().int().optional();

const EnvSchema = z.object({
  RUMMIKUB_LOCK_LEASE_MS: optionalMs,
  RUMMIKUB_LOCK_WAIT_MS: optionalMs,
  RUMMIKUB_LOCK_RETRY_MS: optionalMs,
  RUMMIKUB_COMPLETED_TTL_MS: optionalMs,
});

/**
 * Validates a raw configuration object, filling in defaults.
 * @throws {ConfigError} with one formatted line per issue.
 */
export function loadServiceConfig(raw: unknown = {}): ServiceConfig {
  const result = ServiceConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ConfigError(`Invalid service config: ${issues.length} issue(s)`, issues);
  }
  return result.data;
}

/** Reads the `RUMMIKUB_*` variables; unset ones keep their defaults. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const pick = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const parsed = EnvSchema.safeParse({
    RUMMIKUB_LOCK_LEASE_MS: pick("RUMMIKUB_LOCK_LEASE_MS"),
    RUMMIKUB_LOCK_WAIT_MS: pick("RUMMIKUB_LOCK_WAIT_MS"),
    RUMMIKUB_LOCK_RETRY_MS: pick("RUMMIKUB_LOCK_RETRY_MS"),
    RUMMIKUB_COMPLETED_TTL_MS: pick("RUMMIKUB_COMPLETED_TTL_MS"),
  });
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error.issues);
    throw new ConfigError(`Invalid service environment: ${issues.length} issue(s)`, issues);
  }

  const vars = parsed.data;
  return loadServiceConfig({
    lockLeaseMs: vars.RUMMIKUB_LOCK_LEASE_MS,
    lockWaitMs: vars.RUMMIKUB_LOCK_WAIT_MS,
    lockRetryMs: vars.RUMMIKUB_LOCK_RETRY_MS,
    completedTtlMs: vars.RUMMIKUB_COMPLETED_TTL_MS,
  });
}
