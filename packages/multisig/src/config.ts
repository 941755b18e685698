/**
 * Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { RetryPolicy } from "./retry.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_PRETTY: z
    .string()
    .transform((v) => v === "true")
    .default("false"),

  // Commit submission
  COMMIT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  COMMIT_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  COMMIT_ATTEMPT_TIMEOUT_MS: z.coerce.number().int().min(1000).default(120000),
});

export type MultisigConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): MultisigConfig {
  return ConfigSchema.parse(env);
}

export function retryPolicyFromConfig(config: MultisigConfig): RetryPolicy {
  return {
    maxAttempts: config.COMMIT_MAX_ATTEMPTS,
    backoffMs: config.COMMIT_BACKOFF_MS,
    attemptTimeoutMs: config.COMMIT_ATTEMPT_TIMEOUT_MS,
  };
}
