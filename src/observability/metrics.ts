import type { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      api_calls: this.counters.get("api_calls") ?? 0,
      api_rate_limited: this.counters.get("api_rate_limited") ?? 0,
      page_size_reductions: this.counters.get("page_size_reductions") ?? 0,
      methods_dumped: this.counters.get("methods_dumped") ?? 0,
      methods_failed: this.counters.get("methods_failed") ?? 0,
      downloads_ok: this.counters.get("downloads_ok") ?? 0,
      downloads_failed: this.counters.get("downloads_failed") ?? 0,
      nofile_records: this.counters.get("nofile_records") ?? 0,
      attachments_skipped: this.counters.get("attachments_skipped") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      api_call_ms: this.summarize("api_call_ms"),
      method_ms: this.summarize("method_ms"),
      download_ms: this.summarize("download_ms"),
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          counters: this.getCounters(),
          timers: this.getTimerSummaries(),
        },
        null,
        2,
      ),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
