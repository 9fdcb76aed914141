/**
 * Pipeline Context
 *
 * Everything one run needs, opened explicitly and closed when the run
 * ends: validated config, the repository over a live pool, and whichever
 * inference models the environment configures.
 */

import type { Env } from "../config/env.ts";
import { buildPipelineConfig, type PipelineConfig, type PipelineConfigOverrides } from "../config/pipeline-config.ts";
import { openDatabase } from "../db/index.ts";
import { DrizzleClassificationRepository } from "../db/drizzle-repository.ts";
import type { ClassificationRepository } from "../db/repository.ts";
import {
  createReasoningCompleter,
  DEFAULT_REASONING_MODELS,
  hasReasoningKey,
  type ReasoningKeys,
} from "../scorers/client-factory.ts";
import { createHttpInferenceModel } from "../scorers/inference-client.ts";
import { createTemporalBleedModel } from "../scorers/temporal-bleed.ts";
import type { ModelRegistry } from "../scorers/types.ts";
import type { AssembleOptions } from "./vector-assembler.ts";
import { createPolicy, PERSISTENCE_POLICY, type RetryPolicy } from "./retry-engine.ts";
import { configureLogger, logger } from "./structured-logger.ts";

export interface PipelineContext {
  config: PipelineConfig;
  repository: ClassificationRepository;
  models: ModelRegistry;
  /** Liveness of the backing store */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/** Regression model names on the inference host */
const REGRESSION_MODELS = {
  agencyReversal: "agency-reversal",
  metaphorDensity: "metaphor-density",
  novelMeme: "novel-meme",
} as const;

/**
 * Build the model registry from the environment. Dimensions without a
 * configured model are left out and fall back to their neutral default.
 */
export function buildModelRegistry(env: Env, fetchFn?: typeof fetch): ModelRegistry {
  const models: ModelRegistry = {};

  if (env.INFERENCE_BASE_URL) {
    const http = { baseUrl: env.INFERENCE_BASE_URL, apiKey: env.INFERENCE_API_KEY, fetchFn };
    models.emotionalValence = createHttpInferenceModel({ ...http, model: env.SENTIMENT_MODEL, mode: "classification" });
    models.agencyReversal = createHttpInferenceModel({ ...http, model: REGRESSION_MODELS.agencyReversal, mode: "regression" });
    models.metaphorDensity = createHttpInferenceModel({ ...http, model: REGRESSION_MODELS.metaphorDensity, mode: "regression" });
    models.novelMeme = createHttpInferenceModel({ ...http, model: REGRESSION_MODELS.novelMeme, mode: "regression" });
  }

  const keys: ReasoningKeys = {
    openaiApiKey: env.OPENAI_API_KEY,
    anthropicApiKey: env.ANTHROPIC_API_KEY,
    groqApiKey: env.GROQ_API_KEY,
  };
  if (hasReasoningKey(env.REASONING_PROVIDER, keys)) {
    const model = env.REASONING_MODEL ?? DEFAULT_REASONING_MODELS[env.REASONING_PROVIDER];
    models.temporalBleed = createTemporalBleedModel(
      createReasoningCompleter(env.REASONING_PROVIDER, model, keys),
      `${env.REASONING_PROVIDER}:${model}`,
    );
  }

  return models;
}

export function assembleOptionsFor(context: Pick<PipelineContext, "config" | "models">): AssembleOptions {
  return {
    referenceYear: context.config.referenceYear,
    useModels: context.config.useModels,
    timeoutMs: context.config.scorerTimeoutMs,
    models: context.models,
  };
}

/**
 * PERSISTENCE_POLICY with the configured attempt budget and base delay.
 */
export function persistencePolicyFor(config: Pick<PipelineConfig, "persistence">): RetryPolicy {
  return createPolicy(PERSISTENCE_POLICY, {
    maxRetries: config.persistence.maxAttempts - 1,
    baseDelayMs: config.persistence.baseDelayMs,
  });
}

export function openPipelineContext(env: Env, overrides: PipelineConfigOverrides = {}): PipelineContext {
  if (env.LOG_LEVEL) configureLogger({ minLevel: env.LOG_LEVEL });

  const config = buildPipelineConfig(env, overrides);
  const database = openDatabase(env.DATABASE_URL);
  const models = buildModelRegistry(env);

  logger.info("pipeline-context", "Pipeline context opened", {
    referenceYear: config.referenceYear,
    useModels: config.useModels,
    models: Object.keys(models),
  });

  return {
    config,
    repository: new DrizzleClassificationRepository(database.db),
    models,
    ping: () => database.ping(),
    close: async () => {
      await database.close();
      logger.info("pipeline-context", "Pipeline context closed");
    },
  };
}
