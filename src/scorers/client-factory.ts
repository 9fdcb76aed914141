/**
 * Shared client initialization for the reasoning model.
 *
 * Lazy client getters keep a missing API key from failing at import time;
 * the key is only demanded on the first completion. Groq goes through the
 * OpenAI SDK with Groq's OpenAI-compatible base URL.
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { ConfigurationError } from "../lib/errors.ts";
import type { ChatCompleter } from "./temporal-bleed.ts";

export type ReasoningProvider = "openai" | "anthropic" | "groq";

const GROQ_BASE_URL = "https://api.groq.com/openai/v1";

export const DEFAULT_REASONING_MODELS: Record<ReasoningProvider, string> = {
  groq: "llama-3.1-8b-instant",
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-latest",
};

export interface ReasoningKeys {
  openaiApiKey?: string;
  anthropicApiKey?: string;
  groqApiKey?: string;
}

/**
 * Creates a lazy-initialized Anthropic client getter function.
 */
export function createAnthropicClientGetter(apiKey: string | undefined): () => Anthropic {
  let client: Anthropic | null = null;

  return () => {
    if (!client) {
      if (!apiKey) {
        throw new ConfigurationError("ANTHROPIC_API_KEY is not set; the anthropic reasoning model cannot run.");
      }
      client = new Anthropic({ apiKey });
    }
    return client;
  };
}

/**
 * Creates a lazy-initialized OpenAI-compatible client getter function.
 * Pass `baseURL` for compatible hosts (Groq).
 */
export function createOpenAIClientGetter(
  apiKey: string | undefined,
  keyName: string,
  baseURL?: string,
): () => OpenAI {
  let client: OpenAI | null = null;

  return () => {
    if (!client) {
      if (!apiKey) {
        throw new ConfigurationError(`${keyName} is not set; the reasoning model cannot run.`);
      }
      client = new OpenAI({ apiKey, baseURL });
    }
    return client;
  };
}

/**
 * True when the key the provider needs is present.
 */
export function hasReasoningKey(provider: ReasoningProvider, keys: ReasoningKeys): boolean {
  switch (provider) {
    case "openai":
      return Boolean(keys.openaiApiKey);
    case "anthropic":
      return Boolean(keys.anthropicApiKey);
    case "groq":
      return Boolean(keys.groqApiKey);
  }
}

/**
 * Build a ChatCompleter for the configured provider.
 */
export function createReasoningCompleter(
  provider: ReasoningProvider,
  model: string,
  keys: ReasoningKeys,
): ChatCompleter {
  if (provider === "anthropic") {
    const getClient = createAnthropicClientGetter(keys.anthropicApiKey);
    return async ({ prompt, temperature, maxTokens, timeoutMs }) => {
      const response = await getClient().messages.create(
        {
          model,
          max_tokens: maxTokens,
          temperature,
          messages: [{ role: "user", content: prompt }],
        },
        { timeout: timeoutMs, maxRetries: 0 },
      );
      return response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
    };
  }

  const getClient =
    provider === "groq"
      ? createOpenAIClientGetter(keys.groqApiKey, "GROQ_API_KEY", GROQ_BASE_URL)
      : createOpenAIClientGetter(keys.openaiApiKey, "OPENAI_API_KEY");

  return async ({ prompt, temperature, maxTokens, timeoutMs }) => {
    const response = await getClient().chat.completions.create(
      {
        model,
        temperature,
        max_tokens: maxTokens,
        messages: [{ role: "user", content: prompt }],
      },
      { timeout: timeoutMs, maxRetries: 0 },
    );
    return response.choices[0]?.message.content ?? "";
  };
}
