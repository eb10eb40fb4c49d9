/**
 * In-process metrics for monitoring tool performance
 * Tracks call counts, errors by kind, and latency histograms
 */

interface Counter {
  count: number;
}

interface Histogram {
  values: number[];
  sum: number;
  count: number;
}

export interface HistogramStats {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

export class MetricsRegistry {
  #counters: Map<string, Counter> = new Map();
  #histograms: Map<string, Histogram> = new Map();

  // Increment a counter
  inc(name: string, labels: Record<string, string> = {}): void {
    const key = this.makeKey(name, labels);
    const counter = this.#counters.get(key) || { count: 0 };
    counter.count++;
    this.#counters.set(key, counter);
  }

  // Observe a value in a histogram
  observe(name: string, value: number, labels: Record<string, string> = {}): void {
    const key = this.makeKey(name, labels);
    const histogram = this.#histograms.get(key) || { values: [], sum: 0, count: 0 };
    histogram.values.push(value);
    histogram.sum += value;
    histogram.count++;

    // Keep only the last 1000 values
    if (histogram.values.length > 1000) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
      histogram.count = histogram.values.length;
    }

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Record<string, string> = {}): number {
    const key = this.makeKey(name, labels);
    return this.#counters.get(key)?.count || 0;
  }

  // Get histogram stats (p50, p95, p99)
  getHistogram(name: string, labels: Record<string, string> = {}): HistogramStats | null {
    return this.stats(this.makeKey(name, labels));
  }

  // Get all metrics (for debugging)
  getAllMetrics(): {
    counters: Record<string, number>;
    histograms: Record<string, HistogramStats | null>;
  } {
    const counters: Record<string, number> = {};
    for (const [key, counter] of this.#counters) {
      counters[key] = counter.count;
    }

    const histograms: Record<string, HistogramStats | null> = {};
    for (const key of this.#histograms.keys()) {
      histograms[key] = this.stats(key);
    }

    return { counters, histograms };
  }

  private stats(key: string): HistogramStats | null {
    const histogram = this.#histograms.get(key);
    if (!histogram || histogram.values.length === 0) {
      return null;
    }

    const sorted = [...histogram.values].sort((a, b) => a - b);
    const percentile = (p: number) => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)];
    };

    return {
      count: histogram.count,
      sum: histogram.sum,
      p50: percentile(50),
      p95: percentile(95),
      p99: percentile(99),
    };
  }

  private makeKey(name: string, labels: Record<string, string>): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return labelStr ? `${name}{${labelStr}}` : name;
  }
}

export const metrics = new MetricsRegistry();

// Record one tool call; errorKind is set when the call failed
export function recordToolExecution(
  registry: MetricsRegistry,
  tool: string,
  duration_ms: number,
  errorKind?: string
): void {
  registry.inc("couchdb_mcp.tool.calls_total", { tool });

  if (errorKind !== undefined) {
    registry.inc("couchdb_mcp.tool.errors_total", { tool, kind: errorKind });
  }

  registry.observe("couchdb_mcp.tool.latency_ms", duration_ms, { tool });
}
