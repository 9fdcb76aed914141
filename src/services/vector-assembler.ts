/**
 * Vector Assembler
 *
 * Runs every scorer over one text and composes the fixed twelve-dimension
 * vector. Lexical scorers always run. Model-backed scorers run only when
 * `useModels` is set, all at once, each with its own timeout, so one slow
 * or failing model never holds back the others.
 *
 * No side effects besides logging; the same text and options always give
 * the same vector when models are off.
 */

import {
  DIMENSION_KEYS,
  buildDimensionVector,
  type DimensionKey,
  type DimensionVector,
} from "../schemas/dimension-vector.ts";
import { isBlank } from "../lib/text-utils.ts";
import { scoreCertaintyCollapse } from "../scorers/certainty-collapse.ts";
import { scorePronounFlip } from "../scorers/pronoun-flip.ts";
import { scoreSacredProfane } from "../scorers/sacred-profane.ts";
import { scoreTemporalProximity } from "../scorers/temporal-proximity.ts";
import { scoreTimeCompression } from "../scorers/time-compression.ts";
import { runModelScorer } from "../scorers/model-scorer.ts";
import { MODEL_DIMENSIONS, type ModelRegistry, type ScorerOutcome } from "../scorers/types.ts";

export interface AssembleOptions {
  referenceYear: number;
  useModels: boolean;
  timeoutMs: number;
  models?: ModelRegistry;
}

export interface AssembledVector {
  vector: DimensionVector;
  /** One outcome per dimension that was scored */
  outcomes: ScorerOutcome[];
  /** True when at least one model-backed dimension fell back to its default */
  degraded: boolean;
}

function lexicalScores(text: string, referenceYear: number): Partial<Record<DimensionKey, number>> {
  const pronouns = scorePronounFlip(text);
  return {
    certaintyCollapse: scoreCertaintyCollapse(text).score,
    pronounFirst: pronouns.first,
    pronounThird: pronouns.third,
    pronounCollective: pronouns.collective,
    timeCompression: scoreTimeCompression(text).score,
    sacredProfane: scoreSacredProfane(text).score,
    temporalProximity: scoreTemporalProximity(text, referenceYear).score,
  };
}

export async function assembleVector(text: string, options: AssembleOptions): Promise<AssembledVector> {
  const scores = lexicalScores(text, options.referenceYear);
  const outcomes: ScorerOutcome[] = DIMENSION_KEYS.flatMap((dimension) => {
    const score = scores[dimension];
    return score === undefined ? [] : [{ success: true as const, dimension, score, durationMs: 0 }];
  });

  if (options.useModels && !isBlank(text)) {
    const modelOutcomes = await Promise.all(
      MODEL_DIMENSIONS.map((dimension) =>
        runModelScorer(dimension, options.models?.[dimension], text, options.timeoutMs),
      ),
    );
    for (const outcome of modelOutcomes) {
      scores[outcome.dimension] = outcome.score;
      outcomes.push(outcome);
    }
  }

  return {
    vector: buildDimensionVector(scores),
    outcomes,
    degraded: outcomes.some((outcome) => !outcome.success),
  };
}
