/**
 * Performance Monitoring Utility for the recommendation pipeline
 * Keeps a rolling window of timings per operation
 */

import logger from './logger';

interface PerformanceMetric {
  name: string;
  duration: number;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface MetricSummary {
  count: number;
  average: number;
  percentiles: { p50: number; p90: number; p95: number; p99: number };
  lastMeasurement: PerformanceMetric;
}

export interface PerformanceSummary {
  timestamp: Date;
  metrics: Record<string, MetricSummary>;
  alerts: Array<{ type: 'SLOW_OPERATION'; metric: string; value: number; message: string }>;
}

const MAX_METRICS_PER_NAME = 100;

class PerformanceMonitor {
  private metrics: Map<string, PerformanceMetric[]> = new Map();

  constructor(private readonly slowThresholdMs: number = 1000) {}

  /**
   * Record a performance metric
   */
  recordMetric(name: string, duration: number, metadata?: Record<string, unknown>): void {
    const metrics = this.metrics.get(name) ?? [];
    metrics.push({ name, duration, timestamp: new Date(), metadata });

    // Keep only the most recent measurements per metric
    if (metrics.length > MAX_METRICS_PER_NAME) {
      metrics.splice(0, metrics.length - MAX_METRICS_PER_NAME);
    }
    this.metrics.set(name, metrics);

    if (duration > this.slowThresholdMs) {
      logger.warn(`Slow operation detected: ${name} took ${duration}ms`, metadata);
    }
  }

  /**
   * Time a synchronous operation, recording the duration whether it returns or throws
   */
  track<T>(name: string, operation: () => T, metadata?: Record<string, unknown>): T {
    const start = Date.now();
    try {
      const result = operation();
      this.recordMetric(name, Date.now() - start, metadata);
      return result;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.recordMetric(name, Date.now() - start, { ...metadata, error: errorMessage });
      throw error;
    }
  }

  getAveragePerformance(metricName: string): number | null {
    const metrics = this.metrics.get(metricName);
    if (!metrics || metrics.length === 0) {
      return null;
    }
    return metrics.reduce((sum, metric) => sum + metric.duration, 0) / metrics.length;
  }

  getPerformancePercentiles(metricName: string): MetricSummary['percentiles'] | null {
    const metrics = this.metrics.get(metricName);
    if (!metrics || metrics.length === 0) {
      return null;
    }

    const durations = metrics.map((m) => m.duration).sort((a, b) => a - b);
    const at = (fraction: number) =>
      durations[Math.min(durations.length - 1, Math.floor(durations.length * fraction))];

    return { p50: at(0.5), p90: at(0.9), p95: at(0.95), p99: at(0.99) };
  }

  getPerformanceSummary(): PerformanceSummary {
    const summary: PerformanceSummary = { timestamp: new Date(), metrics: {}, alerts: [] };

    for (const [metricName, metrics] of this.metrics.entries()) {
      const average = this.getAveragePerformance(metricName);
      const percentiles = this.getPerformancePercentiles(metricName);
      if (average === null || percentiles === null) continue;

      summary.metrics[metricName] = {
        count: metrics.length,
        average,
        percentiles,
        lastMeasurement: metrics[metrics.length - 1],
      };

      if (average > this.slowThresholdMs) {
        summary.alerts.push({
          type: 'SLOW_OPERATION',
          metric: metricName,
          value: average,
          message: `${metricName} is averaging ${average.toFixed(0)}ms`,
        });
      }
    }

    return summary;
  }

  /**
   * Clear all metrics (useful for testing)
   */
  clearMetrics(): void {
    this.metrics.clear();
  }
}

// Singleton instance
export const performanceMonitor = new PerformanceMonitor();

export default PerformanceMonitor;
