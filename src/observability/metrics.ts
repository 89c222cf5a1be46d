/**
 * Metrics collection for mapper and stream operations
 */

export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: Record<string, string>): void;
  recordHistogram(name: string, value: number, labels?: Record<string, string>): void;
  recordGauge(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * Standard metric names
 */
export const MapperMetricNames = {
  OPERATIONS_TOTAL: 'dynamap_operations_total',
  OPERATION_DURATION: 'dynamap_operation_duration_seconds',
  ERRORS: 'dynamap_errors_total',
  CONSTRAINT_VIOLATIONS: 'dynamap_constraint_violations_total',
  BATCH_UNPROCESSED: 'dynamap_batch_unprocessed_keys',
  RECORDS_READ: 'dynamap_stream_records_read_total',
  SHARDS_PROMOTED: 'dynamap_stream_shards_promoted_total',
  ITERATOR_REFRESHES: 'dynamap_stream_iterator_refreshes_total',
} as const;

export interface MetricsSnapshot {
  counters: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
  gauges: Record<string, number>;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
  mean: number;
  values: number[];
}

/**
 * In-memory metrics collector for testing and development
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();
  private gauges: Map<string, number> = new Map();

  incrementCounter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const current = this.counters.get(key) ?? 0;
    this.counters.set(key, current + value);
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  recordGauge(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    this.gauges.set(key, value);
  }

  /**
   * Get all collected metrics
   */
  getMetrics(): MetricsSnapshot {
    const metrics: MetricsSnapshot = {
      counters: {},
      histograms: {},
      gauges: {},
    };

    for (const [key, value] of this.counters.entries()) {
      metrics.counters[key] = value;
    }

    for (const [key, values] of this.histograms.entries()) {
      metrics.histograms[key] = {
        count: values.length,
        sum: values.reduce((a, b) => a + b, 0),
        min: Math.min(...values),
        max: Math.max(...values),
        mean: values.reduce((a, b) => a + b, 0) / values.length,
        values,
      };
    }

    for (const [key, value] of this.gauges.entries()) {
      metrics.gauges[key] = value;
    }

    return metrics;
  }

  /**
   * Get a specific counter value
   */
  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  /**
   * Get a specific histogram values
   */
  getHistogram(name: string, labels?: Record<string, string>): number[] {
    return this.histograms.get(this.makeKey(name, labels)) ?? [];
  }

  /**
   * Get a specific gauge value
   */
  getGauge(name: string, labels?: Record<string, string>): number | undefined {
    return this.gauges.get(this.makeKey(name, labels));
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}:${labelStr}`;
  }
}

/**
 * No-op metrics collector for environments where metrics are disabled
 */
export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value?: number, _labels?: Record<string, string>): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _labels?: Record<string, string>): void {
    // No-op
  }

  recordGauge(_name: string, _value: number, _labels?: Record<string, string>): void {
    // No-op
  }
}
