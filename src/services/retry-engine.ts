/**
 * Retry & Backoff Engine
 *
 * Retries for store writes that hit lock, busy or serialization
 * conflicts. Model calls are not retried here: they carry their own
 * timeout and fall back to a neutral score.
 *
 * A failed call comes back as a result with `exhausted` set when the whole
 * attempt budget was spent; callers decide whether to skip the unit or
 * abort the batch.
 */

import { round } from "../lib/math-utils.ts";
import { errorMessage } from "../lib/errors.ts";
import {
  PERSISTENCE_BASE_DELAY_MS,
  PERSISTENCE_MAX_ATTEMPTS,
  PERSISTENCE_MAX_DELAY_MS,
} from "../config/constants.ts";
import { incrementCounter, logger } from "./structured-logger.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Key for metrics and the `retry.<name>` counter */
  name: string;
  /** Retries after the first try */
  maxRetries: number;
  baseDelayMs: number;
  /** Cap on the exponential part of the delay */
  maxDelayMs: number;
  backoffMultiplier: number;
  /** 0..1, share of the capped delay added at random */
  jitterFactor: number;
  retryablePatterns: RegExp[];
  /** Checked first; a match stops retrying even if a retryable pattern also matches */
  nonRetryablePatterns: RegExp[];
}

export interface RetryAttempt {
  attempt: number;
  durationMs: number;
  error: string | null;
  delayBeforeMs: number;
}

export interface RetryResult<T> {
  success: boolean;
  data: T | null;
  attempts: number;
  totalDurationMs: number;
  lastError: string | null;
  /** What the last failed attempt threw */
  cause: unknown;
  retryHistory: RetryAttempt[];
  exhausted: boolean;
}

export type RetryableFunction<T> = () => Promise<T>;

interface PolicyTally {
  calls: number;
  successes: number;
  failures: number;
  retriesUsed: number;
}

export interface RetryMetrics {
  totalCalls: number;
  totalSuccesses: number;
  totalFailures: number;
  totalRetriesUsed: number;
  retriesByPolicy: Record<string, PolicyTally>;
  averageRetriesPerCall: number;
}

// ---------------------------------------------------------------------------
// Policies
// ---------------------------------------------------------------------------

/** Up to 20% on top of the capped delay */
const PERSISTENCE_JITTER_FACTOR = 0.2;

/**
 * Store writes. Lock and serialization conflicts clear on their own;
 * constraint violations and malformed input never do.
 */
export const PERSISTENCE_POLICY: RetryPolicy = {
  name: "persistence",
  maxRetries: PERSISTENCE_MAX_ATTEMPTS - 1,
  baseDelayMs: PERSISTENCE_BASE_DELAY_MS,
  maxDelayMs: PERSISTENCE_MAX_DELAY_MS,
  backoffMultiplier: 2,
  jitterFactor: PERSISTENCE_JITTER_FACTOR,
  retryablePatterns: [
    /deadlock/i,
    /serializ/i,
    /lock/i,
    /busy/i,
    /timeout/i,
    /ECONNRESET/i,
    /ECONNREFUSED/i,
    /Connection terminated/i,
  ],
  nonRetryablePatterns: [
    /violates (check|not-null|foreign key) constraint/i,
    /invalid input syntax/i,
    /does not exist/i,
  ],
};

/**
 * Copy of `base` with `overrides` applied, e.g.
 * `createPolicy(PERSISTENCE_POLICY, { maxRetries: 5 })`.
 */
export function createPolicy(base: RetryPolicy, overrides: Partial<RetryPolicy>): RetryPolicy {
  return { ...base, ...overrides };
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

const tallies = new Map<string, PolicyTally>();

function tallyFor(policy: RetryPolicy): PolicyTally {
  let tally = tallies.get(policy.name);
  if (!tally) {
    tally = { calls: 0, successes: 0, failures: 0, retriesUsed: 0 };
    tallies.set(policy.name, tally);
  }
  return tally;
}

export function getRetryMetrics(): RetryMetrics {
  const retriesByPolicy: Record<string, PolicyTally> = {};
  const totals: PolicyTally = { calls: 0, successes: 0, failures: 0, retriesUsed: 0 };

  for (const [name, tally] of tallies) {
    retriesByPolicy[name] = { ...tally };
    totals.calls += tally.calls;
    totals.successes += tally.successes;
    totals.failures += tally.failures;
    totals.retriesUsed += tally.retriesUsed;
  }

  return {
    totalCalls: totals.calls,
    totalSuccesses: totals.successes,
    totalFailures: totals.failures,
    totalRetriesUsed: totals.retriesUsed,
    retriesByPolicy,
    averageRetriesPerCall: totals.calls > 0 ? round(totals.retriesUsed / totals.calls, 2) : 0,
  };
}

export function resetRetryMetrics(): void {
  tallies.clear();
}

// ---------------------------------------------------------------------------
// Classification and backoff
// ---------------------------------------------------------------------------

export function isRetryable(errorMsg: string, policy: RetryPolicy): boolean {
  return policy.retryablePatterns.some((pattern) => pattern.test(errorMsg));
}

export function isNonRetryable(errorMsg: string, policy: RetryPolicy): boolean {
  return policy.nonRetryablePatterns.some((pattern) => pattern.test(errorMsg));
}

/**
 * Delay before retry `attempt` (1-based): base × multiplier^(attempt-1),
 * capped, plus up to `jitterFactor` of the capped delay.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * policy.backoffMultiplier ** (attempt - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  return Math.round(capped * (1 + policy.jitterFactor * random()));
}

function sleep(ms: number): Promise<void> {
  return ms > 0 ? new Promise((resolve) => setTimeout(resolve, ms)) : Promise.resolve();
}

// ---------------------------------------------------------------------------
// Retry loop
// ---------------------------------------------------------------------------

/**
 * Run `fn`, retrying errors that match the policy's retryable patterns.
 *
 * @example
 * const linked = await withRetry(
 *   () => repository.linkTextUnit(unitId, classificationId),
 *   PERSISTENCE_POLICY,
 *   `link ${unitId}`,
 * );
 * if (!linked.success) errored++;
 */
export async function withRetry<T>(
  fn: RetryableFunction<T>,
  policy: RetryPolicy,
  label: string = policy.name,
): Promise<RetryResult<T>> {
  const started = Date.now();
  const tally = tallyFor(policy);
  const history: RetryAttempt[] = [];
  let cause: unknown = null;
  let lastError: string | null = null;

  tally.calls++;

  for (let attempt = 1; attempt <= policy.maxRetries + 1; attempt++) {
    const delayBeforeMs = attempt === 1 ? 0 : backoffDelay(policy, attempt - 1);
    if (attempt > 1) {
      tally.retriesUsed++;
      incrementCounter(`retry.${policy.name}`);
      logger.debug("retry-engine", `${label}: retry ${attempt - 1}/${policy.maxRetries} in ${delayBeforeMs}ms`, {
        lastError: lastError?.slice(0, 80),
      });
      await sleep(delayBeforeMs);
    }

    const attemptStarted = Date.now();
    try {
      const data = await fn();
      history.push({ attempt, durationMs: Date.now() - attemptStarted, error: null, delayBeforeMs });
      tally.successes++;
      if (attempt > 1) {
        logger.info("retry-engine", `${label}: succeeded on attempt ${attempt}`, {
          totalDurationMs: Date.now() - started,
        });
      }
      return {
        success: true,
        data,
        attempts: attempt,
        totalDurationMs: Date.now() - started,
        lastError: null,
        cause: null,
        retryHistory: history,
        exhausted: false,
      };
    } catch (err) {
      cause = err;
      lastError = errorMessage(err);
      history.push({ attempt, durationMs: Date.now() - attemptStarted, error: lastError, delayBeforeMs });

      const stopReason = isNonRetryable(lastError, policy)
        ? "non-retryable error"
        : isRetryable(lastError, policy)
          ? null
          : "unrecognized error (not retrying)";
      if (stopReason) {
        logger.warn("retry-engine", `${label}: ${stopReason} on attempt ${attempt}`, {
          error: lastError.slice(0, 120),
        });
        break;
      }
    }
  }

  tally.failures++;
  logger.warn("retry-engine", `${label}: all ${history.length} attempts failed`, {
    totalDurationMs: Date.now() - started,
    lastError: lastError?.slice(0, 200),
  });

  return {
    success: false,
    data: null,
    attempts: history.length,
    totalDurationMs: Date.now() - started,
    lastError,
    cause,
    retryHistory: history,
    exhausted: history.length > policy.maxRetries,
  };
}
