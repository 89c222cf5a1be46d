/**
 * Observability
 *
 * Logging and metrics for the engine, session and stream coordinator.
 */

export type { Logger, LogLevel, LogContext } from './logging.js';
export { ConsoleLogger, NoopLogger, LOG_LEVELS, isLogLevel, logOperation, logError } from './logging.js';
export type { MetricsCollector, MetricsSnapshot, HistogramSummary } from './metrics.js';
export { InMemoryMetricsCollector, NoopMetricsCollector, MapperMetricNames } from './metrics.js';
