/**
 * HTTP inference client for hosted sentiment and regression models.
 *
 * Request:  POST {baseUrl}/models/{model}  { "inputs": text }
 * Response: a number, `{ score }`, or (optionally nested) arrays of
 *           `{ label, score }` as returned by text-classification hosts.
 */

import { z } from "zod";
import { MalformedModelOutput, type InferenceModel, type InferenceOutput } from "./types.ts";

export type InferenceMode = "classification" | "regression";

export interface HttpInferenceOptions {
  baseUrl: string;
  model: string;
  mode: InferenceMode;
  apiKey?: string;
  /** Injected for tests; defaults to global fetch */
  fetchFn?: typeof fetch;
}

const labelScore = z.object({ label: z.string(), score: z.number() });

const responseSchema = z.union([
  z.number(),
  z.object({ score: z.number() }),
  z.array(labelScore),
  z.array(z.array(labelScore)),
]);

type InferenceResponse = z.infer<typeof responseSchema>;

/**
 * Reduce a host response to an InferenceOutput.
 *
 * @example
 * readInferenceResponse([[{ label: "NEGATIVE", score: 0.9 }, { label: "POSITIVE", score: 0.1 }]], "classification")
 * // { label: "NEGATIVE", confidence: 0.9 }
 */
export function readInferenceResponse(body: InferenceResponse, mode: InferenceMode): InferenceOutput {
  if (typeof body === "number") return body;
  if (!Array.isArray(body)) return body.score;

  const flat: Array<z.infer<typeof labelScore>> = [];
  for (const entry of body) {
    if (Array.isArray(entry)) flat.push(...entry);
    else flat.push(entry);
  }
  if (flat.length === 0) {
    throw new MalformedModelOutput("empty prediction list");
  }

  if (mode === "regression") {
    return flat[0].score;
  }

  const top = flat.reduce((best, entry) => (entry.score > best.score ? entry : best), flat[0]);
  return { label: top.label, confidence: top.score };
}

export function createHttpInferenceModel(options: HttpInferenceOptions): InferenceModel {
  const fetchFn = options.fetchFn ?? fetch;
  const url = `${options.baseUrl.replace(/\/+$/, "")}/models/${options.model}`;

  return {
    name: options.model,
    async infer(text, timeoutMs) {
      const headers: Record<string, string> = { "Content-Type": "application/json" };
      if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`;

      const response = await fetchFn(url, {
        method: "POST",
        headers,
        body: JSON.stringify({ inputs: text }),
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        throw new Error(`inference_failed: ${options.model} returned HTTP ${response.status}`);
      }

      const parsed = responseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new MalformedModelOutput(`unexpected response shape from ${options.model}`);
      }
      return readInferenceResponse(parsed.data, options.mode);
    },
  };
}
