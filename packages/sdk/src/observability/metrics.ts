/**
 * Metrics tracking for store operations issued by the mapper
 */

export type Operation =
  | "insert"
  | "update"
  | "delete"
  | "find"
  | "count"
  | "ensureIndexes";

export interface OperationMetrics {
  count: number;
  failures: number;
  durationMs: number[];
}

class MetricsCollector {
  #metrics = new Map<string, OperationMetrics>();

  /**
   * Get or create metrics for a collection operation
   */
  #getMetrics(collection: string, op: Operation): OperationMetrics {
    const key = `${collection}/${op}`;
    let metrics = this.#metrics.get(key);
    if (!metrics) {
      metrics = { count: 0, failures: 0, durationMs: [] };
      this.#metrics.set(key, metrics);
    }
    return metrics;
  }

  /**
   * Record a completed operation
   */
  record(collection: string, op: Operation, ms: number, failed = false): void {
    const metrics = this.#getMetrics(collection, op);
    metrics.count++;
    if (failed) {
      metrics.failures++;
    }
    metrics.durationMs.push(ms);

    // Keep only last 100 samples to avoid unbounded memory growth
    if (metrics.durationMs.length > 100) {
      metrics.durationMs.shift();
    }
  }

  /**
   * Time an async operation, recording a failure when it rejects
   */
  async track<T>(collection: string, op: Operation, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.record(collection, op, performance.now() - start);
      return result;
    } catch (err) {
      this.record(collection, op, performance.now() - start, true);
      throw err;
    }
  }

  /**
   * Get metrics for a collection operation
   */
  getMetrics(collection: string, op: Operation): OperationMetrics | undefined {
    return this.#metrics.get(`${collection}/${op}`);
  }

  /**
   * Copy of all metrics keyed by "collection/operation"
   */
  snapshot(): Map<string, OperationMetrics> {
    return new Map(
      [...this.#metrics].map(([key, m]) => [key, { ...m, durationMs: [...m.durationMs] }])
    );
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Reset metrics for a collection, or all metrics
   */
  reset(collection?: string): void {
    if (collection) {
      for (const key of [...this.#metrics.keys()]) {
        if (key.startsWith(`${collection}/`)) {
          this.#metrics.delete(key);
        }
      }
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
