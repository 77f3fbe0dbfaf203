// =============================================================================
// @daybrief/shared: Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables with sensible defaults.
// ANTHROPIC_API_KEY is the only required variable. API_KEYS is validated as
// JSON; an empty object leaves the trigger API unauthenticated.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * JSON string that parses to a map of API key -> client ID.
 * Example: '{"key-ops": "ops-dashboard", "key-cron": "external-cron"}'
 */
const apiKeysSchema = z
  .string()
  .default("{}")
  .transform((val, ctx) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(val);
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "API_KEYS must be valid JSON",
      });
      return z.NEVER;
    }
    const result = z.record(z.string()).safeParse(parsed);
    if (!result.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "API_KEYS must be a JSON object mapping key strings to client ID strings",
      });
      return z.NEVER;
    }
    return result.data;
  });

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const configSchema = z.object({
  // Required
  ANTHROPIC_API_KEY: z.string().min(1, "ANTHROPIC_API_KEY is required"),

  // LLM
  LLM_MODEL: z.string().default("claude-sonnet-4-20250514"),
  LLM_MAX_TOKENS: z.coerce.number().int().min(256).default(4096),
  LLM_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60_000),
  LLM_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),

  // Article service
  ARTICLE_SERVICE_URL: z.string().url().default("http://localhost:8002"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30_000),
  LOOKBACK_HOURS: z.coerce.number().int().min(1).max(24 * 14).default(48),

  // Briefing shape
  DEEP_DIVE_COUNT: z.coerce.number().int().min(1).max(3).default(3),

  // Storage & templates
  PROFILES_PATH: z.string().default("user_profiles.jsonl"),
  TEMPLATE_DIR: z.string().default("templates"),

  // Email
  RESEND_API_KEY: z.string().min(1).optional(),
  EMAIL_FROM: z.string().default("Daybrief <briefing@example.com>"),

  // HTTP
  PORT: z.coerce.number().int().min(1).max(65535).default(8003),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  CORS_ORIGINS: z.string().default("*"),
  API_KEYS: apiKeysSchema,
  RATE_LIMIT_PER_MIN: z.coerce.number().int().min(1).default(30),

  // Scheduler
  CRON_ENABLED: booleanFlag,
  CRON_GENERATE: z.string().default("0 7 * * *"),
});

// ---------------------------------------------------------------------------
// Exported type
// ---------------------------------------------------------------------------

export type Config = z.infer<typeof configSchema>;

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load and validate configuration from environment variables.
 *
 * Throws a ZodError with detailed messages if the API key is missing or any
 * value fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  return configSchema.parse(env);
}
