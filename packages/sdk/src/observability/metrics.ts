/**
 * Metrics tracking for table operations
 */

import { performance } from "node:perf_hooks";

export type Operation = "select" | "insert" | "update" | "delete";

export interface OperationMetrics {
  /** Completed calls */
  count: number;
  /** Calls that threw */
  errors: number;
  /** Records returned or affected, summed over calls */
  rows: number;
  /** Last 100 durations in milliseconds */
  durationMs: number[];
}

export type TableMetrics = Record<Operation, OperationMetrics>;

const MAX_SAMPLES = 100;

function emptyOperationMetrics(): OperationMetrics {
  return { count: 0, errors: 0, rows: 0, durationMs: [] };
}

class MetricsCollector {
  #metrics = new Map<string, TableMetrics>();

  /**
   * Get or create metrics for a table
   */
  #getMetrics(table: string): TableMetrics {
    let metrics = this.#metrics.get(table);
    if (!metrics) {
      metrics = {
        select: emptyOperationMetrics(),
        insert: emptyOperationMetrics(),
        update: emptyOperationMetrics(),
        delete: emptyOperationMetrics(),
      };
      this.#metrics.set(table, metrics);
    }
    return metrics;
  }

  /**
   * Record a completed operation
   */
  recordOperation(table: string, op: Operation, ms: number, rows: number): void {
    const metrics = this.#getMetrics(table)[op];
    metrics.count++;
    metrics.rows += rows;
    metrics.durationMs.push(ms);

    // Keep only the most recent samples
    if (metrics.durationMs.length > MAX_SAMPLES) {
      metrics.durationMs.shift();
    }
  }

  /**
   * Record a failed operation
   */
  recordError(table: string, op: Operation): void {
    this.#getMetrics(table)[op].errors++;
  }

  /**
   * Get metrics for a table
   */
  getMetrics(table: string): TableMetrics | undefined {
    return this.#metrics.get(table);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<string, TableMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a set of samples
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * Reset metrics for one table or all tables
   */
  reset(table?: string): void {
    if (table) {
      this.#metrics.delete(table);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();

/**
 * Time a synchronous table operation and record its outcome
 * @param rowsOf - Derives the affected row count from the result
 */
export function timed<T>(table: string, op: Operation, fn: () => T, rowsOf: (result: T) => number): T {
  const start = performance.now();
  try {
    const result = fn();
    metrics.recordOperation(table, op, performance.now() - start, rowsOf(result));
    return result;
  } catch (err) {
    metrics.recordError(table, op);
    throw err;
  }
}
