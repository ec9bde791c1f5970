/**
 * Metrics tracking for config operations
 */

export type Operation =
  | "get"
  | "multiget"
  | "set"
  | "multiset"
  | "delete"
  | "push"
  | "pop"
  | "list"
  | "validate"
  | "init";

export interface OperationMetrics {
  count: number;
  errorCount: number;
  durationMs: number[];
  lockWaitMs: number[];
}

export interface WriteMetrics {
  /** Writes that kept the original text around the patched node */
  spliced: number;
  /** Writes that swapped an AST node and re-rendered from the AST */
  nodeReplaced: number;
  /** Writes that fully re-serialized the decoded document */
  reserialized: number;
  /** Mutations that changed nothing and skipped the write */
  skipped: number;
}

export type WriteKind = keyof WriteMetrics;

/** Keep only the most recent samples to avoid unbounded memory growth */
const MAX_SAMPLES = 100;

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

class MetricsCollector {
  #operations = new Map<Operation, OperationMetrics>();
  #writes: WriteMetrics = { spliced: 0, nodeReplaced: 0, reserialized: 0, skipped: 0 };

  /**
   * Get or create metrics for an operation
   */
  #getMetrics(op: Operation): OperationMetrics {
    let metrics = this.#operations.get(op);
    if (!metrics) {
      metrics = { count: 0, errorCount: 0, durationMs: [], lockWaitMs: [] };
      this.#operations.set(op, metrics);
    }
    return metrics;
  }

  /**
   * Record a completed operation
   */
  recordOperation(op: Operation, ms: number, success: boolean): void {
    const metrics = this.#getMetrics(op);
    metrics.count++;
    if (!success) {
      metrics.errorCount++;
    }
    pushSample(metrics.durationMs, ms);
  }

  /**
   * Record time spent waiting for the file lock
   */
  recordLockWait(op: Operation, ms: number): void {
    pushSample(this.#getMetrics(op).lockWaitMs, ms);
  }

  /**
   * Record how a mutation reached disk
   */
  recordWrite(kind: WriteKind): void {
    this.#writes[kind]++;
  }

  getMetrics(op: Operation): OperationMetrics | undefined {
    return this.#operations.get(op);
  }

  getWriteMetrics(): WriteMetrics {
    return { ...this.#writes };
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Reset metrics for one operation, or everything
   */
  reset(op?: Operation): void {
    if (op) {
      this.#operations.delete(op);
    } else {
      this.#operations.clear();
      this.#writes = { spliced: 0, nodeReplaced: 0, reserialized: 0, skipped: 0 };
    }
  }
}

/**
 * Wrap an async operation with timing metrics
 */
export async function withTiming<T>(op: Operation, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    metrics.recordOperation(op, Date.now() - start, success);
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
