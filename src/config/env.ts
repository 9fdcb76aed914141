import { z } from "zod";
import { ConfigurationError } from "../lib/errors.ts";

const booleanFlag = z
  .string()
  .optional()
  .default("false")
  .transform((val) => val === "true");

const envSchema = z.object({
  DATABASE_URL: z.string().default(""),
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR", "FATAL"]).optional(),

  // Model-backed scorers; dimensions without a model fall back to neutral defaults
  USE_MODEL_SCORERS: booleanFlag,
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  GROQ_API_KEY: z.string().optional(),
  REASONING_PROVIDER: z.enum(["openai", "anthropic", "groq"]).default("groq"),
  REASONING_MODEL: z.string().optional(),
  INFERENCE_BASE_URL: z.string().url().optional(),
  INFERENCE_API_KEY: z.string().optional(),
  SENTIMENT_MODEL: z.string().default("sentiment"),
  SCORER_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  // Scoring and batch tuning
  REFERENCE_YEAR: z.coerce.number().int().min(2000).max(2099).optional(),
  BATCH_SIZE: z.coerce.number().int().positive().optional(),
  MAX_BATCH_ERRORS: z.coerce.number().int().nonnegative().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment map (defaults to `process.env`).
 * Throws a ConfigurationError listing every invalid key.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigurationError(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}
