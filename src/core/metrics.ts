/**
 * Metrics: counters, gauges and histograms kept in process, with a text exposition.
 */

// ── Types ──

export type Tags = Record<string, string>;

export interface MetricsSnapshot {
  counters: Record<string, { value: number; tags?: Tags }[]>;
  gauges: Record<string, { value: number; tags?: Tags }[]>;
  histograms: Record<string, HistogramSummary[]>;
  collectedAt: string;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
  tags?: Tags;
}

/** Adapter interface for external metrics systems */
export interface MetricsAdapter {
  onCounter(name: string, value: number, tags?: Tags): void;
  onGauge(name: string, value: number, tags?: Tags): void;
  onHistogram(name: string, value: number, tags?: Tags): void;
}

interface Entry<V> {
  value: V;
  tags?: Tags;
}

/** Histograms keep at most this many recent observations per tag set */
const MAX_HISTOGRAM_SAMPLES = 1000;

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1);
  return sorted[Math.max(0, idx)];
}

function summarize(values: number[], tags?: Tags): HistogramSummary {
  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, v) => acc + v, 0);
  const summary: HistogramSummary = {
    count: sorted.length,
    sum,
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
  };
  if (tags) summary.tags = tags;
  return summary;
}

function promName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_]/g, '_');
}

function promLabels(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  const parts = Object.entries(tags)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${promName(k)}="${v.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`);
  return `{${parts.join(',')}}`;
}

// ── Metrics Collector ──

export class MetricsCollector {
  private counters = new Map<string, Map<string, Entry<number>>>();
  private gauges = new Map<string, Map<string, Entry<number>>>();
  private histograms = new Map<string, Map<string, Entry<number[]>>>();
  private adapters: MetricsAdapter[] = [];

  registerAdapter(adapter: MetricsAdapter): void {
    this.adapters.push(adapter);
  }

  /** Increment a counter by 1 (or by `amount`). */
  counter(name: string, tags?: Tags, amount = 1): void {
    const byTags = this.series(this.counters, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.value += amount;
    } else {
      byTags.set(key, { value: amount, tags });
    }
    for (const a of this.adapters) a.onCounter(name, amount, tags);
  }

  gauge(name: string, value: number, tags?: Tags): void {
    this.series(this.gauges, name).set(tagsKey(tags), { value, tags });
    for (const a of this.adapters) a.onGauge(name, value, tags);
  }

  histogram(name: string, value: number, tags?: Tags): void {
    const byTags = this.series(this.histograms, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.value.push(value);
      if (existing.value.length > MAX_HISTOGRAM_SAMPLES) existing.value.shift();
    } else {
      byTags.set(key, { value: [value], tags });
    }
    for (const a of this.adapters) a.onHistogram(name, value, tags);
  }

  /** Start a timer; calling the returned function records elapsed ms into `name`. */
  startTimer(name: string, tags?: Tags): () => number {
    const started = Date.now();
    return () => {
      const elapsed = Date.now() - started;
      this.histogram(name, elapsed, tags);
      return elapsed;
    };
  }

  getSnapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, byTags] of this.counters) {
      counters[name] = Array.from(byTags.values(), (e) => (e.tags ? { value: e.value, tags: e.tags } : { value: e.value }));
    }

    const gauges: MetricsSnapshot['gauges'] = {};
    for (const [name, byTags] of this.gauges) {
      gauges[name] = Array.from(byTags.values(), (e) => (e.tags ? { value: e.value, tags: e.tags } : { value: e.value }));
    }

    const histograms: MetricsSnapshot['histograms'] = {};
    for (const [name, byTags] of this.histograms) {
      histograms[name] = Array.from(byTags.values(), (e) => summarize(e.value, e.tags));
    }

    return { counters, gauges, histograms, collectedAt: new Date().toISOString() };
  }

  /** Render counters and gauges in the Prometheus text format; histograms as summaries. */
  toPrometheus(): string {
    const lines: string[] = [];
    for (const [name, byTags] of this.counters) {
      lines.push(`# TYPE ${promName(name)} counter`);
      for (const e of byTags.values()) lines.push(`${promName(name)}${promLabels(e.tags)} ${e.value}`);
    }
    for (const [name, byTags] of this.gauges) {
      lines.push(`# TYPE ${promName(name)} gauge`);
      for (const e of byTags.values()) lines.push(`${promName(name)}${promLabels(e.tags)} ${e.value}`);
    }
    for (const [name, byTags] of this.histograms) {
      lines.push(`# TYPE ${promName(name)} summary`);
      for (const e of byTags.values()) {
        const s = summarize(e.value);
        lines.push(`${promName(name)}_count${promLabels(e.tags)} ${s.count}`);
        lines.push(`${promName(name)}_sum${promLabels(e.tags)} ${s.sum}`);
      }
    }
    return lines.join('\n') + '\n';
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }

  /** Sum across all tag combinations, or the value for specific tags. */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) return byTags.get(tagsKey(tags))?.value ?? 0;
    let total = 0;
    for (const entry of byTags.values()) total += entry.value;
    return total;
  }

  getGauge(name: string, tags?: Tags): number | undefined {
    return this.gauges.get(name)?.get(tagsKey(tags))?.value;
  }

  getHistogramValues(name: string, tags?: Tags): number[] {
    const byTags = this.histograms.get(name);
    if (!byTags) return [];
    if (tags) return [...(byTags.get(tagsKey(tags))?.value ?? [])];
    const all: number[] = [];
    for (const entry of byTags.values()) {
      for (const value of entry.value) all.push(value);
    }
    return all;
  }

  private series<V>(store: Map<string, Map<string, Entry<V>>>, name: string): Map<string, Entry<V>> {
    let byTags = store.get(name);
    if (!byTags) {
      byTags = new Map();
      store.set(name, byTags);
    }
    return byTags;
  }
}

/** Process-wide collector used when none is injected */
export const globalMetrics = new MetricsCollector();
