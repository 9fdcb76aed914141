/**
 * TemporalBleed: a reasoning model judges whether the text mixes tenses
 * and dates in impossible ways ("I already lost everything in 2031").
 *
 * The model answers in a fixed SCORE/DETECTED/REASONING/EXAMPLES block;
 * only SCORE feeds the vector.
 */

import { REASONING_MAX_TOKENS, REASONING_TEMPERATURE } from "../config/constants.ts";
import { clamp } from "../lib/math-utils.ts";
import { MalformedModelOutput, type InferenceModel } from "./types.ts";

export interface CompletionRequest {
  prompt: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * A chat-completion call reduced to prompt in, text out.
 */
export type ChatCompleter = (request: CompletionRequest) => Promise<string>;

export interface TemporalBleedAnswer {
  score: number;
  detected: boolean;
  reasoning: string;
  examples: string[];
}

export function buildTemporalBleedPrompt(text: string): string {
  return `Analyze this text for temporal contradictions or "temporal bleed": future events described in past tense, or timing that is logically impossible.

Examples of temporal bleed:
- "I already lost everything in 2031" (past tense + future year)
- "Remember when the grid went down next year" (past + future)

Text to analyze: "${text}"

Respond in this exact format:
SCORE: [0.0 to 1.0, where 0=no temporal bleed, 1=strong temporal bleed]
DETECTED: [yes/no]
REASONING: [one sentence explanation]
EXAMPLES: [list any specific phrases showing temporal bleed, or "none"]`;
}

/**
 * Parse the model's answer block. A missing or unreadable SCORE line is
 * malformed output; the other fields are optional.
 *
 * @example
 * parseTemporalBleedAnswer("SCORE: 0.8\nDETECTED: yes").score // 0.8
 */
export function parseTemporalBleedAnswer(content: string): TemporalBleedAnswer {
  let score: number | null = null;
  let detected = false;
  let reasoning = "";
  let examples: string[] = [];

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    const separator = line.indexOf(":");
    if (separator < 0) continue;
    const key = line.slice(0, separator).trim().toUpperCase();
    const value = line.slice(separator + 1).trim();

    if (key === "SCORE") {
      const parsed = Number.parseFloat(value);
      if (Number.isFinite(parsed)) score = clamp(parsed, 0, 1);
    } else if (key === "DETECTED") {
      detected = value.toLowerCase().includes("yes");
    } else if (key === "REASONING") {
      reasoning = value;
    } else if (key === "EXAMPLES") {
      examples = value.toLowerCase() === "none" || value.length === 0 ? [] : [value];
    }
  }

  if (score === null) {
    throw new MalformedModelOutput(`no SCORE line in reasoning answer: ${content.slice(0, 80)}`);
  }

  return { score, detected, reasoning, examples };
}

/**
 * Wrap a chat completer as the temporal-bleed InferenceModel.
 */
export function createTemporalBleedModel(complete: ChatCompleter, name: string): InferenceModel {
  return {
    name,
    async infer(text, timeoutMs) {
      const content = await complete({
        prompt: buildTemporalBleedPrompt(text),
        temperature: REASONING_TEMPERATURE,
        maxTokens: REASONING_MAX_TOKENS,
        timeoutMs,
      });
      return parseTemporalBleedAnswer(content).score;
    },
  };
}
