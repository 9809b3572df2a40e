/**
 * @judgekit/sdk — Configuration.
 *
 * Validates client configuration with Zod, and loads it from
 * environment variables for host programs that configure that way.
 */

import { z } from "zod";
import { DEFAULT_API_ROOT } from "./endpoints.js";
import type { JudgeClientConfig, LogLevel, SigningContext } from "./types.js";
import { UsageError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const SigningContextSchema = z
  .object({
    enabled: z.boolean(),
    key: z.string().min(1).optional(),
    secret: z.string().min(1).optional(),
    fixedTime: z.number().int().nonnegative().optional(),
  })
  .refine((ctx) => !ctx.enabled || (ctx.key !== undefined && ctx.secret !== undefined), {
    message: "key and secret are required when signing is enabled",
  });

export const ClientConfigSchema = z.object({
  apiRoot: z
    .string()
    .url()
    .transform((root) => root.replace(/\/+$/, ""))
    .default(DEFAULT_API_ROOT),
  auth: SigningContextSchema.default({ enabled: false }),
  timeoutMs: z.number().int().positive().optional(),
  logLevel: z.enum(LOG_LEVELS).default("silent"),
});

/**
 * The data part of a client configuration with defaults applied.
 */
export interface ResolvedClientConfig {
  readonly apiRoot: string;
  readonly auth: SigningContext;
  readonly timeoutMs: number | undefined;
  readonly logLevel: LogLevel;
}

/**
 * Validate a client configuration and apply defaults.
 *
 * @throws {UsageError} INVALID_CONFIG, with the ZodError as cause
 */
export function resolveClientConfig(config: JudgeClientConfig = {}): ResolvedClientConfig {
  const parsed = ClientConfigSchema.safeParse({
    apiRoot: config.apiRoot,
    auth: config.auth,
    timeoutMs: config.timeoutMs,
    logLevel: config.logLevel,
  });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new UsageError("INVALID_CONFIG", `Invalid client configuration: ${detail}`, {
      cause: parsed.error,
    });
  }
  return {
    apiRoot: parsed.data.apiRoot,
    auth: parsed.data.auth,
    timeoutMs: parsed.data.timeoutMs,
    logLevel: parsed.data.logLevel,
  };
}

// =============================================================================
// Environment
// =============================================================================

/**
 * An exported but empty variable counts as unset.
 */
function blankAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema.optional());
}

export const EnvSchema = z.object({
  JUDGEKIT_API_ROOT: z.string().url().optional(),
  JUDGEKIT_AUTH_ENABLED: z
    .string()
    .transform((v) => v === "true")
    .default("false"),
  JUDGEKIT_API_KEY: z.string().optional(),
  JUDGEKIT_API_SECRET: z.string().optional(),
  JUDGEKIT_FIXED_TIME: blankAsUnset(z.coerce.number().int().nonnegative()),
  JUDGEKIT_TIMEOUT_MS: blankAsUnset(z.coerce.number().int().min(1)),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("silent"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Build a client configuration from environment variables.
 *
 * @throws {z.ZodError} if a variable is present but invalid
 */
export function loadClientConfig(
  env: Record<string, string | undefined> = process.env,
): JudgeClientConfig {
  const parsed = EnvSchema.parse(env);
  return {
    apiRoot: parsed.JUDGEKIT_API_ROOT,
    auth: {
      enabled: parsed.JUDGEKIT_AUTH_ENABLED,
      key: parsed.JUDGEKIT_API_KEY,
      secret: parsed.JUDGEKIT_API_SECRET,
      fixedTime: parsed.JUDGEKIT_FIXED_TIME,
    },
    timeoutMs: parsed.JUDGEKIT_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}
