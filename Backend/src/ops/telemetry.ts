// src/ops/telemetry.ts
/**
 * Lightweight telemetry hub (counters, gauges, histograms) with Prometheus-style
 * text exposition for GET /api/health/metrics.
 */

export type Labels = Record<string, string | number | boolean>;

export interface MetricOptions {
  help?: string;
  labelNames?: string[];
}

export interface SeriesValue {
  labels: Labels;
  value: number;
}

export interface HistogramValue {
  labels: Labels;
  count: number;
  sum: number;
  /** cumulative counts per upper bound */
  buckets: { le: number; count: number }[];
}

export type MetricSnapshot =
  | { name: string; kind: "counter" | "gauge"; help?: string; values: SeriesValue[] }
  | { name: string; kind: "histogram"; help?: string; values: HistogramValue[] };

const DEFAULT_LATENCY_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10_000, 30_000];

// --- Utilities

function pick(labels: Labels | undefined, names: string[]): Labels {
  const out: Labels = {};
  for (const k of names) out[k] = labels?.[k] ?? "";
  return out;
}
function seriesKey(lbls: Labels, names: string[]) {
  return names.map((k) => `${k}=${lbls[k]}`).join("|");
}

// --- Metrics

abstract class MetricBase {
  constructor(
    public readonly name: string,
    public readonly help: string | undefined,
    public readonly labelNames: string[],
  ) {}
}

class ScalarSeries extends MetricBase {
  protected series = new Map<string, SeriesValue>();

  protected slot(labels?: Labels): SeriesValue {
    const clean = pick(labels, this.labelNames);
    const key = seriesKey(clean, this.labelNames);
    let s = this.series.get(key);
    if (!s) {
      s = { labels: clean, value: 0 };
      this.series.set(key, s);
    }
    return s;
  }

  value(labels?: Labels): number {
    return this.series.get(seriesKey(pick(labels, this.labelNames), this.labelNames))?.value ?? 0;
  }

  values(): SeriesValue[] {
    return [...this.series.values()].map((s) => ({ labels: { ...s.labels }, value: s.value }));
  }

  resetAll() {
    this.series.clear();
  }
}

export class Counter extends ScalarSeries {
  inc(by = 1, labels?: Labels) {
    this.slot(labels).value += by;
  }
}

export class Gauge extends ScalarSeries {
  set(value: number, labels?: Labels) {
    this.slot(labels).value = value;
  }
}

export class Histogram extends MetricBase {
  private readonly bounds: number[];
  private series = new Map<string, { labels: Labels; count: number; sum: number; buckets: number[] }>();

  constructor(name: string, help: string | undefined, labelNames: string[], bounds = DEFAULT_LATENCY_BUCKETS) {
    super(name, help, labelNames);
    this.bounds = bounds.slice().sort((a, b) => a - b);
  }

  observe(value: number, labels?: Labels) {
    const clean = pick(labels, this.labelNames);
    const key = seriesKey(clean, this.labelNames);
    let e = this.series.get(key);
    if (!e) {
      e = { labels: clean, count: 0, sum: 0, buckets: this.bounds.map(() => 0) };
      this.series.set(key, e);
    }
    e.count += 1;
    e.sum += value;
    this.bounds.forEach((le, i) => {
      if (value <= le && e) e.buckets[i] += 1;
    });
  }

  startTimer(labels?: Labels): () => number {
    const t0 = performance.now();
    return () => {
      const ms = performance.now() - t0;
      this.observe(ms, labels);
      return ms;
    };
  }

  values(): HistogramValue[] {
    return [...this.series.values()].map((e) => ({
      labels: { ...e.labels },
      count: e.count,
      sum: e.sum,
      buckets: this.bounds.map((le, i) => ({ le, count: e.buckets[i] })),
    }));
  }
}

// --- Hub

export class Telemetry {
  private counters = new Map<string, Counter>();
  private gauges = new Map<string, Gauge>();
  private histograms = new Map<string, Histogram>();

  counter(name: string, opts: MetricOptions = {}): Counter {
    let m = this.counters.get(name);
    if (!m) {
      m = new Counter(name, opts.help, opts.labelNames ?? []);
      this.counters.set(name, m);
    }
    return m;
  }

  gauge(name: string, opts: MetricOptions = {}): Gauge {
    let m = this.gauges.get(name);
    if (!m) {
      m = new Gauge(name, opts.help, opts.labelNames ?? []);
      this.gauges.set(name, m);
    }
    return m;
  }

  histogram(name: string, opts: MetricOptions & { buckets?: number[] } = {}): Histogram {
    let m = this.histograms.get(name);
    if (!m) {
      m = new Histogram(name, opts.help, opts.labelNames ?? [], opts.buckets);
      this.histograms.set(name, m);
    }
    return m;
  }

  snapshot(): MetricSnapshot[] {
    const out: MetricSnapshot[] = [];
    for (const m of this.counters.values()) out.push({ name: m.name, kind: "counter", help: m.help, values: m.values() });
    for (const m of this.gauges.values()) out.push({ name: m.name, kind: "gauge", help: m.help, values: m.values() });
    for (const m of this.histograms.values()) out.push({ name: m.name, kind: "histogram", help: m.help, values: m.values() });
    return out;
  }

  /** Drops every series (tests). */
  reset() {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }
}

// --- Exposition

export function prometheusText(snaps: MetricSnapshot[]): string {
  const lines: string[] = [];
  for (const s of snaps) {
    if (s.help) lines.push(`# HELP ${s.name} ${s.help}`);
    lines.push(`# TYPE ${s.name} ${s.kind}`);
    if (s.kind === "histogram") {
      for (const v of s.values) {
        for (const b of v.buckets) lines.push(`${s.name}_bucket${formatLabels({ ...v.labels, le: b.le })} ${b.count}`);
        lines.push(`${s.name}_bucket${formatLabels({ ...v.labels, le: "+Inf" })} ${v.count}`);
        lines.push(`${s.name}_count${formatLabels(v.labels)} ${v.count}`);
        lines.push(`${s.name}_sum${formatLabels(v.labels)} ${v.sum}`);
      }
    } else {
      for (const v of s.values) lines.push(`${s.name}${formatLabels(v.labels)} ${v.value}`);
    }
  }
  return lines.join("\n");
}

export function formatLabels(lbls: Labels): string {
  const keys = Object.keys(lbls);
  if (keys.length === 0) return "";
  const esc = (v: string | number | boolean) =>
    `"${String(v).replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"')}"`;
  return `{${keys.map((k) => `${k}=${esc(lbls[k])}`).join(",")}}`;
}

// --- Singleton

export const telemetry = new Telemetry();
