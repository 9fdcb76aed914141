/**
 * Structured Logging
 *
 * Levelled logs for batch runs and the read API. Entries carry the active
 * batch/unit context, land in an in-memory ring buffer, and are written
 * as JSON lines in production or as short readable lines elsewhere.
 * Under NODE_ENV=test nothing reaches the console but the buffer and the
 * counters still fill.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const LEVELS = ["DEBUG", "INFO", "WARN", "ERROR", "FATAL"] as const;

export type LogLevel = (typeof LEVELS)[number];

export interface LogContext {
  batchId?: string;
  unitId?: string;
  /** Correlates every line of one batch or request */
  traceId?: string;
}

export interface StructuredLogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  data?: Record<string, unknown>;
  error?: { name: string; message: string; code?: string; stack?: string };
}

export interface BatchSummary {
  batchId: string;
  processed: number;
  skipped: number;
  errored: number;
  aborted: boolean;
  stopped: boolean;
  durationMs: number;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  jsonOutput: boolean;
  includeStackTraces: boolean;
  ringBufferSize: number;
  /** No console output; the ring buffer still records */
  silent: boolean;
}

export interface LoggerStats {
  totalLogs: number;
  logsByLevel: Record<LogLevel, number>;
  errorsLogged: number;
  counters: Record<string, number>;
}

export interface LogQuery {
  /** Minimum level */
  level?: LogLevel;
  service?: string;
  batchId?: string;
  unitId?: string;
  limit?: number;
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

const env = process.env.NODE_ENV;

const config: LoggerConfig = {
  minLevel: env === "production" ? "INFO" : "DEBUG",
  jsonOutput: env === "production",
  includeStackTraces: env !== "production",
  ringBufferSize: 500,
  silent: env === "test",
};

const recent: StructuredLogEntry[] = [];
let stats = freshStats();
let activeContext: LogContext = {};

function freshStats(): LoggerStats {
  const logsByLevel = { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 };
  return { totalLogs: 0, logsByLevel, errorsLogged: 0, counters: {} };
}

function severity(level: LogLevel): number {
  return LEVELS.indexOf(level);
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

/**
 * Run `fn` with `ctx` merged into the active context; the previous
 * context comes back once `fn` settles.
 */
export async function withContext<T>(ctx: LogContext, fn: () => Promise<T>): Promise<T> {
  const saved = activeContext;
  activeContext = { ...saved, ...ctx };
  try {
    return await fn();
  } finally {
    activeContext = saved;
  }
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

function errorFields(error: Error): NonNullable<StructuredLogEntry["error"]> {
  return {
    name: error.name,
    message: error.message,
    code: "code" in error && typeof error.code === "string" ? error.code : undefined,
    stack: config.includeStackTraces ? error.stack : undefined,
  };
}

function renderLine(entry: StructuredLogEntry): string {
  if (config.jsonOutput) return JSON.stringify(entry);

  const scope = entry.batchId
    ? ` (batch:${entry.batchId.slice(0, 12)}${entry.unitId ? ` unit:${entry.unitId}` : ""})`
    : "";
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
  const failure = entry.error ? ` ERROR: ${entry.error.message}` : "";
  return `[${entry.level}][${entry.service}]${scope} ${entry.message}${data}${failure}`;
}

function write(level: LogLevel, line: string): void {
  if (severity(level) >= severity("ERROR")) console.error(line);
  else if (level === "WARN") console.warn(line);
  else console.log(line);
}

function emit(
  level: LogLevel,
  service: string,
  message: string,
  data?: Record<string, unknown>,
  error?: Error,
): void {
  if (severity(level) < severity(config.minLevel)) return;

  const entry: StructuredLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...activeContext,
    data,
    error: error ? errorFields(error) : undefined,
  };

  stats.totalLogs++;
  stats.logsByLevel[level]++;
  if (error) stats.errorsLogged++;

  recent.push(entry);
  if (recent.length > config.ringBufferSize) recent.shift();

  if (!config.silent) write(level, renderLine(entry));
}

export const logger = {
  debug: (service: string, message: string, data?: Record<string, unknown>): void =>
    emit("DEBUG", service, message, data),
  info: (service: string, message: string, data?: Record<string, unknown>): void =>
    emit("INFO", service, message, data),
  warn: (service: string, message: string, data?: Record<string, unknown>): void =>
    emit("WARN", service, message, data),
  error: (service: string, message: string, error?: Error, data?: Record<string, unknown>): void =>
    emit("ERROR", service, message, data, error),
  fatal: (service: string, message: string, error?: Error, data?: Record<string, unknown>): void =>
    emit("FATAL", service, message, data, error),
};

export type Logger = typeof logger;

// ---------------------------------------------------------------------------
// Counters and batch lifecycle
// ---------------------------------------------------------------------------

/**
 * Bump a named counter, e.g. `scorer_failure.emotionalValence`.
 */
export function incrementCounter(name: string, by = 1): void {
  stats.counters[name] = (stats.counters[name] ?? 0) + by;
}

/**
 * Opens the batch context; every log until logBatchComplete carries it.
 */
export function logBatchStart(batchId: string, unitCount: number, useModels: boolean): void {
  activeContext = { ...activeContext, batchId, traceId: `trace_${batchId}` };
  logger.info("batch-classifier", "Classification batch started", { batchId, unitCount, useModels });
}

export function logChunkCommitted(chunkIndex: number, persisted: number, errored: number): void {
  logger.debug("batch-classifier", `Chunk ${chunkIndex} committed`, { chunkIndex, persisted, errored });
}

export function logBatchComplete(summary: BatchSummary): void {
  let level: LogLevel = "INFO";
  if (summary.aborted) level = "ERROR";
  else if (summary.errored > 0) level = "WARN";

  emit(level, "batch-classifier", "Classification batch finished", { ...summary });
  incrementCounter("batches_completed");
  if (summary.aborted) incrementCounter("batches_aborted");
  activeContext = {};
}

/**
 * Await `fn`, logging its duration at DEBUG, or at ERROR before rethrowing.
 */
export async function timeOperation<T>(
  service: string,
  operationName: string,
  fn: () => Promise<T>,
): Promise<{ result: T; durationMs: number }> {
  const started = Date.now();
  const elapsed = (): number => Date.now() - started;

  let result: T;
  try {
    result = await fn();
  } catch (err) {
    const durationMs = elapsed();
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error(service, `${operationName} failed after ${durationMs}ms`, error, { operation: operationName, durationMs });
    throw err;
  }

  const durationMs = elapsed();
  logger.debug(service, `${operationName} completed in ${durationMs}ms`, { operation: operationName, durationMs });
  return { result, durationMs };
}

// ---------------------------------------------------------------------------
// Inspection
// ---------------------------------------------------------------------------

/**
 * Newest entries from the ring buffer matching `query` (default 50).
 */
export function getRecentLogs(query: LogQuery = {}): StructuredLogEntry[] {
  const minSeverity = query.level ? severity(query.level) : 0;
  const matches = recent.filter(
    (entry) =>
      severity(entry.level) >= minSeverity &&
      (!query.service || entry.service === query.service) &&
      (!query.batchId || entry.batchId === query.batchId) &&
      (!query.unitId || entry.unitId === query.unitId),
  );
  return matches.slice(-(query.limit ?? 50));
}

export function configureLogger(updates: Partial<LoggerConfig>): LoggerConfig {
  Object.assign(config, updates);
  return { ...config };
}

export function getLoggerStats(): LoggerStats {
  return { ...stats, logsByLevel: { ...stats.logsByLevel }, counters: { ...stats.counters } };
}

/**
 * Clear stats, counters and the ring buffer.
 */
export function resetLoggerStats(): void {
  stats = freshStats();
  recent.length = 0;
}
