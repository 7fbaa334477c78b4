/**
 * @l2-finality/finalizer — Configuration.
 *
 * Loads and validates finalizer configuration from environment variables
 * using Zod.
 */

import { z } from "zod";
import { DEFAULT_FINALITY_LOOKBACK, FINALITY_DELAY } from "./lookback.js";
import type { LookbackConfig } from "./lookback.js";

// =============================================================================
// Finalizer Configuration
// =============================================================================

export interface FinalizerConfig extends LookbackConfig {
  /** L1 blocks to traverse between throttled finalization passes (default: 64) */
  readonly finalityDelay?: number;
}

// =============================================================================
// Schema
// =============================================================================

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const FinalizerEnvSchema = z
  .object({
    FINALITY_LOOKBACK: z.coerce.number().int().min(1).default(DEFAULT_FINALITY_LOOKBACK),
    FINALITY_DELAY: z.coerce.number().int().min(0).default(FINALITY_DELAY),

    // Alt-DA mode is active only when both windows are configured
    ALT_DA_CHALLENGE_WINDOW: z.coerce.number().int().min(0).optional(),
    ALT_DA_RESOLVE_WINDOW: z.coerce.number().int().min(0).optional(),

    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),
  })
  .superRefine((env, ctx) => {
    const challenge = env.ALT_DA_CHALLENGE_WINDOW !== undefined;
    const resolve = env.ALT_DA_RESOLVE_WINDOW !== undefined;
    if (challenge !== resolve) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [challenge ? "ALT_DA_RESOLVE_WINDOW" : "ALT_DA_CHALLENGE_WINDOW"],
        message: "ALT_DA_CHALLENGE_WINDOW and ALT_DA_RESOLVE_WINDOW must be set together",
      });
    }
  });

export type FinalizerEnv = z.infer<typeof FinalizerEnvSchema>;

export interface LoadedConfig {
  readonly finality: FinalizerConfig;
  readonly logLevel: LogLevel;
  readonly nodeEnv: FinalizerEnv["NODE_ENV"];
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadFinalizerConfig(
  env: Record<string, string | undefined> = process.env,
): LoadedConfig {
  const parsed = FinalizerEnvSchema.parse(env);

  const challengeWindow = parsed.ALT_DA_CHALLENGE_WINDOW;
  const resolveWindow = parsed.ALT_DA_RESOLVE_WINDOW;

  return {
    finality: {
      defaultLookback: parsed.FINALITY_LOOKBACK,
      finalityDelay: parsed.FINALITY_DELAY,
      ...(challengeWindow !== undefined && resolveWindow !== undefined
        ? { altDA: { challengeWindow, resolveWindow } }
        : {}),
    },
    logLevel: parsed.LOG_LEVEL,
    nodeEnv: parsed.NODE_ENV,
  };
}
