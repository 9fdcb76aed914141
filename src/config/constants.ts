// ---------------------------------------------------------------------------
// Vector precision
// ---------------------------------------------------------------------------

/**
 * Decimal places every dimension score is rounded to before it is stored or
 * compared. Two vectors are the same classification exactly when all twelve
 * rounded components are equal.
 */
export const VECTOR_PRECISION = 3;

// ---------------------------------------------------------------------------
// Scorer constants
// ---------------------------------------------------------------------------

/**
 * Marker density multiplier: markers per word × 100, capped at 1.
 * One marker per 100 words already saturates the intensity term.
 */
export const MARKER_DENSITY_SCALE = 100;

/**
 * Per-class bonus for TimeCompression. With four classes present the
 * multiplier reaches 1 + 4 × 0.1 = 1.4.
 */
export const COMPRESSION_CATEGORY_BONUS = 0.1;

/**
 * TemporalProximity score per category, in strict priority order.
 */
export const PROXIMITY_SCORES = {
  immediate: 1.0,
  impending: 0.66,
  "near-term": 0.33,
  "long-term": 0.0,
  unspecified: 0.5,
} as const;

/**
 * Years beyond the reference year that still count as near-term.
 */
export const NEAR_TERM_YEAR_HORIZON = 3;

/**
 * Default per-dimension timeout for a model-backed scorer call.
 */
export const DEFAULT_SCORER_TIMEOUT_MS = 15_000;

/**
 * Reasoning-model sampling settings for the temporal-bleed prompt.
 * Low temperature keeps the SCORE line stable across reruns.
 */
export const REASONING_TEMPERATURE = 0.1;
export const REASONING_MAX_TOKENS = 200;

// ---------------------------------------------------------------------------
// Batch classification
// ---------------------------------------------------------------------------

/**
 * Units persisted per transaction. A crash loses at most one uncommitted
 * chunk, which the next run redoes.
 */
export const DEFAULT_BATCH_SIZE = 100;

/**
 * Errored units tolerated before a batch run aborts.
 */
export const DEFAULT_MAX_BATCH_ERRORS = 10;

/**
 * Persistence retry: attempts (first try included) and base backoff delay.
 * 4 attempts at 250ms base → 250ms, 500ms, 1s between tries.
 */
export const PERSISTENCE_MAX_ATTEMPTS = 4;
export const PERSISTENCE_BASE_DELAY_MS = 250;
export const PERSISTENCE_MAX_DELAY_MS = 5_000;

// ---------------------------------------------------------------------------
// Anomaly & coherence
// ---------------------------------------------------------------------------

/**
 * z-score reported when the baseline has zero variance and the observation
 * exceeds its mean. Arbitrary but large; override per call where a
 * different sentinel is wanted.
 */
export const ZERO_VARIANCE_Z_SENTINEL = 10.0;

/**
 * Threshold multiplier k: a derivative is significant when |Δ| > k × std(Δ).
 */
export const DEFAULT_SYNC_THRESHOLD_K = 1.5;

/**
 * Days on each side of a candidate day for the pre/post asymmetry window.
 */
export const DEFAULT_ASYMMETRY_WINDOW_DAYS = 5;

/**
 * Event Coherence Index weights (must sum to 1).
 */
export const DEFAULT_SYNC_WEIGHT = 0.7;
export const DEFAULT_ASYMMETRY_WEIGHT = 0.3;

/**
 * Centered moving-average window for the Event Coherence Index, in days.
 */
export const DEFAULT_SMOOTHING_WINDOW_DAYS = 3;

/**
 * Event Coherence Index above which a day is an "event regime" day.
 */
export const DEFAULT_EVENT_THRESHOLD = 0.5;

/**
 * Days before an event scanned for a warning peak.
 */
export const DEFAULT_WARNING_WINDOW_DAYS = 7;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Two-sided p-value below which a corpus difference is significant.
 */
export const SIGNIFICANCE_ALPHA = 0.05;

/**
 * Cohen's d cut-offs (absolute value).
 */
export const EFFECT_SIZE_MEDIUM = 0.5;
export const EFFECT_SIZE_LARGE = 0.8;

/**
 * Control-window sampling: number of windows and the offset range (days
 * before the event) their centers are drawn from.
 */
export const DEFAULT_CONTROL_WINDOW_COUNT = 5;
export const DEFAULT_CONTROL_MIN_OFFSET_DAYS = 45;
export const DEFAULT_CONTROL_MAX_OFFSET_DAYS = 150;
export const DEFAULT_CONTROL_SEED = 42;

/**
 * Length of the baseline period that precedes an event window.
 */
export const DEFAULT_EVENT_BASELINE_DAYS = 30;

// ---------------------------------------------------------------------------
// Read API
// ---------------------------------------------------------------------------

/** Default and maximum row limit for word-dimension lookups */
export const DEFAULT_WORD_LIMIT = 100;
export const MAX_WORD_LIMIT = 1_000;

/** Tolerance used when comparing a cached aggregate against a recomputation */
export const AGGREGATE_TOLERANCE = 1e-6;
