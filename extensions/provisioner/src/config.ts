/**
 * Converge — Configuration
 *
 * Schema-based validation of provisioner settings using Zod, with
 * environment overrides applied on top.
 */

import { z } from "zod";
import { ProvisionError } from "./errors.js";
import { formatIssues } from "./schemas.js";

// =============================================================================
// Zod Schemas
// =============================================================================

export const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

/**
 * Retry/backoff schema
 */
export const retryConfigSchema = z
  .object({
    maxAttempts: z.number().int().positive().default(3),
    minDelayMs: z.number().nonnegative().default(200),
    maxDelayMs: z.number().nonnegative().default(30_000),
    jitterFactor: z.number().min(0).max(1).default(0.2),
  })
  .refine((r) => r.maxDelayMs >= r.minDelayMs, {
    message: "maxDelayMs must not be lower than minDelayMs",
    path: ["maxDelayMs"],
  });

/**
 * Logging config schema
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default("info"),
  destinations: z
    .array(
      z.object({
        type: z.enum(["console", "file"]),
        path: z.string().min(1).optional(),
        minLevel: logLevelSchema.optional(),
      }),
    )
    .default([]),
  redactPatterns: z.array(z.string()).default([]),
});

/** Longest delay a Node.js timer honours; larger values fire at once. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const provisionerConfigSchema = z.object({
  /** Worker pool size per stage. */
  parallelism: z.number().int().positive().default(10),
  retry: retryConfigSchema.default({}),
  /** Per-operation deadline; 0 disables it. */
  operationTimeoutMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(300_000),
  logging: loggingConfigSchema.default({}),
});

export type ProvisionerConfig = z.infer<typeof provisionerConfigSchema>;
export type ProvisionerConfigInput = z.input<typeof provisionerConfigSchema>;

const envOverridesSchema = z.object({
  CONVERGE_PARALLELISM: z.coerce.number().int().positive().optional(),
  CONVERGE_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),
  CONVERGE_OPERATION_TIMEOUT_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).optional(),
  CONVERGE_LOG_LEVEL: logLevelSchema.optional(),
});

// =============================================================================
// Loading
// =============================================================================

export function getDefaultProvisionerConfig(): ProvisionerConfig {
  return provisionerConfigSchema.parse({});
}

/**
 * Validate configuration and apply `CONVERGE_*` environment overrides.
 *
 * @throws ProvisionError with code INVALID_CONFIG
 */
export function loadProvisionerConfig(
  input: unknown = {},
  env: Record<string, string | undefined> = process.env,
): ProvisionerConfig {
  const parsed = provisionerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ProvisionError(`Invalid provisioner configuration: ${formatIssues(parsed.error)}`, "INVALID_CONFIG");
  }

  const overrides = envOverridesSchema.safeParse(env);
  if (!overrides.success) {
    throw new ProvisionError(`Invalid environment override: ${formatIssues(overrides.error)}`, "INVALID_CONFIG");
  }

  const config = parsed.data;
  const o = overrides.data;
  return {
    ...config,
    parallelism: o.CONVERGE_PARALLELISM ?? config.parallelism,
    retry: { ...config.retry, maxAttempts: o.CONVERGE_MAX_ATTEMPTS ?? config.retry.maxAttempts },
    operationTimeoutMs: o.CONVERGE_OPERATION_TIMEOUT_MS ?? config.operationTimeoutMs,
    logging: { ...config.logging, level: o.CONVERGE_LOG_LEVEL ?? config.logging.level },
  };
}
