import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { CommandType, MotionEvent } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyState = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type LatencyStats = LatencyState & {
  averageMs: number;
};

type HistogramSnapshot = Record<string, number>;

type HistogramConfig = {
  buckets: number[];
  format: (bucket: number, previous?: number) => string;
};

type CommandOutcome = 'ok' | 'rejected';

type LogContext = {
  message?: string;
};

type MetricsSnapshot = {
  createdAt: string;
  counters: CounterMap;
  gauges: CounterMap;
  notices: CounterMap;
  commands: Record<string, CounterMap>;
  events: {
    total: number;
    lastEventAt: string | null;
    regions: number;
  };
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    levelChanges: CounterMap;
    lastLevelChangeAt: string | null;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  latencies: Record<string, LatencyStats>;
  histograms: Record<string, HistogramSnapshot>;
};

type PrometheusOptions = {
  prefix?: string;
  labels?: Record<string, string>;
};

type PrometheusGaugeSample = {
  value: number;
  labels?: Record<string, string>;
};

const DEFAULT_HISTOGRAM: HistogramConfig = {
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2000],
  format: (bucket, previous) => {
    if (typeof previous === 'undefined') {
      return `<${bucket}`;
    }
    return previous === bucket ? `${bucket}` : `${previous}-${bucket}`;
  }
};

const REGION_HISTOGRAM: HistogramConfig = {
  buckets: [1, 2, 5, 10, 25, 50],
  format: DEFAULT_HISTOGRAM.format
};

const ERROR_LEVELS = new Set(['error', 'fatal']);

class MetricsRegistry {
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();
  private readonly notices = new Map<string, number>();
  private readonly commands = new Map<string, Map<CommandOutcome, number>>();
  private readonly latencyStats = new Map<string, LatencyState>();
  private readonly histograms = new Map<string, Map<string, number>>();
  private readonly histogramConfigs = new Map<string, HistogramConfig>();
  private readonly histogramStats = new Map<string, { sum: number; count: number }>();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private readonly resetEmitter = new EventEmitter();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private totalEvents = 0;
  private totalRegions = 0;
  private lastEventTimestamp: number | null = null;

  reset() {
    this.counters.clear();
    this.gauges.clear();
    this.notices.clear();
    this.commands.clear();
    this.latencyStats.clear();
    this.histograms.clear();
    this.histogramConfigs.clear();
    this.histogramStats.clear();
    this.logLevelCounters.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.totalEvents = 0;
    this.totalRegions = 0;
    this.lastEventTimestamp = null;
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementCounter(counter: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    this.counters.set(counter, (this.counters.get(counter) ?? 0) + amount);
  }

  setGauge(gauge: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    this.gauges.set(gauge, value);
  }

  incrementLogLevel(level: string, context: LogContext = {}) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);
    if (ERROR_LEVELS.has(normalized)) {
      this.lastErrorAt = Date.now();
      this.lastErrorMessage = context.message ?? null;
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    this.currentLogLevel = normalized;
    if (previous && previous.toLowerCase() !== normalized) {
      this.logLevelChangeCounters.set(
        normalized,
        (this.logLevelChangeCounters.get(normalized) ?? 0) + 1
      );
      this.lastLogLevelChangeAt = Date.now();
    }
  }

  recordMotionEvent(event: MotionEvent) {
    this.totalEvents += 1;
    this.totalRegions += event.regions.length;
    this.lastEventTimestamp = event.ts;
    this.observeHistogram('motion.regions', event.regions.length, REGION_HISTOGRAM);
  }

  recordNotice(code: string) {
    this.notices.set(code, (this.notices.get(code) ?? 0) + 1);
  }

  recordCommand(type: CommandType, outcome: CommandOutcome) {
    const outcomes = this.commands.get(type) ?? new Map<CommandOutcome, number>();
    outcomes.set(outcome, (outcomes.get(outcome) ?? 0) + 1);
    this.commands.set(type, outcomes);
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
    this.observeHistogram(metric, durationMs);
  }

  observeHistogram(metric: string, value: number, config: HistogramConfig = DEFAULT_HISTOGRAM) {
    const histogramConfig = this.histogramConfigs.get(metric) ?? config;
    this.histogramConfigs.set(metric, histogramConfig);
    const histogram = this.histograms.get(metric) ?? new Map<string, number>();
    this.histograms.set(metric, histogram);

    if (Number.isFinite(value)) {
      const stats = this.histogramStats.get(metric);
      if (stats) {
        stats.sum += value;
        stats.count += 1;
      } else {
        this.histogramStats.set(metric, { sum: value, count: 1 });
      }
    }

    const bucketLabel = resolveHistogramBucket(value, histogramConfig);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  snapshot(): MetricsSnapshot {
    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, state] of sortedEntries(this.latencyStats)) {
      latencies[metric] = {
        ...state,
        averageMs: state.count === 0 ? 0 : state.totalMs / state.count
      };
    }

    const histograms: Record<string, HistogramSnapshot> = {};
    for (const [metric, histogram] of sortedEntries(this.histograms)) {
      histograms[metric] = Object.fromEntries(
        Array.from(histogram.entries()).sort(([a], [b]) => compareHistogramKeys(a, b))
      );
    }

    const commands: Record<string, CounterMap> = {};
    for (const [type, outcomes] of sortedEntries(this.commands)) {
      commands[type] = mapFrom(outcomes);
    }

    return {
      createdAt: new Date().toISOString(),
      counters: mapFrom(this.counters),
      gauges: mapFrom(this.gauges),
      notices: mapFrom(this.notices),
      commands,
      events: {
        total: this.totalEvents,
        lastEventAt: this.lastEventTimestamp ? new Date(this.lastEventTimestamp).toISOString() : null,
        regions: this.totalRegions
      },
      logs: {
        byLevel: mapFrom(this.logLevelCounters),
        currentLevel: this.currentLogLevel,
        levelChanges: mapFrom(this.logLevelChangeCounters),
        lastLevelChangeAt: this.lastLogLevelChangeAt
          ? new Date(this.lastLogLevelChangeAt).toISOString()
          : null,
        lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
        lastErrorMessage: this.lastErrorMessage
      },
      latencies,
      histograms
    };
  }

  exportPrometheus(options: PrometheusOptions = {}): string {
    const prefix = options.prefix ?? 'motionwatch';
    const baseLabels = options.labels ?? {};
    const sections = [
      formatPrometheusGauge(
        `${prefix}_counter_total`,
        'Pipeline counters grouped by name',
        Array.from(this.counters.entries()).map(([counter, value]) => ({
          value,
          labels: { counter }
        })),
        baseLabels
      ),
      formatPrometheusGauge(
        `${prefix}_gauge`,
        'Pipeline gauges grouped by name',
        Array.from(this.gauges.entries()).map(([gauge, value]) => ({ value, labels: { gauge } })),
        baseLabels
      ),
      formatPrometheusGauge(
        `${prefix}_notices_total`,
        'Detector notices grouped by code',
        Array.from(this.notices.entries()).map(([code, value]) => ({ value, labels: { code } })),
        baseLabels
      ),
      formatPrometheusGauge(
        `${prefix}_motion_events_total`,
        'Motion events published since start',
        [{ value: this.totalEvents }],
        baseLabels
      ),
      formatPrometheusGauge(
        `${prefix}_log_lines_total`,
        'Log lines grouped by level',
        Array.from(this.logLevelCounters.entries()).map(([level, value]) => ({
          value,
          labels: { level }
        })),
        baseLabels
      )
    ];
    return sections.filter(Boolean).join('\n');
  }
}

function formatPrometheusGauge(
  metricName: string,
  help: string,
  samples: PrometheusGaugeSample[],
  baseLabels: Record<string, string>
): string {
  const filtered = samples.filter(sample => Number.isFinite(sample.value));
  if (filtered.length === 0) {
    return '';
  }

  const name = sanitizePrometheusName(metricName);
  const lines = [`# HELP ${name} ${help}`, `# TYPE ${name} gauge`];
  const rendered = filtered
    .map(sample => ({
      value: sample.value,
      labelString: formatPrometheusLabels({ ...baseLabels, ...(sample.labels ?? {}) })
    }))
    .sort((a, b) => a.labelString.localeCompare(b.labelString));

  for (const sample of rendered) {
    lines.push(`${name}${sample.labelString} ${formatPrometheusValue(sample.value)}`);
  }

  return lines.join('\n');
}

function sanitizePrometheusName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'motionwatch_metric';
  }
  if (/^[0-9]/.test(lower)) {
    return `_${lower}`;
  }
  return lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const normalized = entries.map(([key, value]) => [sanitizePrometheusName(key), value] as const);
  normalized.sort(([a], [b]) => a.localeCompare(b));
  const rendered = normalized.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

function sortedEntries<V>(source: Map<string, V>): Array<[string, V]> {
  return Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(sortedEntries(source));
}

function compareHistogramKeys(a: string, b: string) {
  const extract = (key: string) => {
    if (key.startsWith('<')) {
      return [parseFloat(key.slice(1)), -1] as const;
    }
    if (key.endsWith('+')) {
      return [parseFloat(key.slice(0, -1)), Number.POSITIVE_INFINITY] as const;
    }
    const [start, end] = key.split('-').map(Number);
    return [start, end ?? start] as const;
  };

  const [aStart, aEnd] = extract(a);
  const [bStart, bEnd] = extract(b);
  if (aStart === bStart) {
    return aEnd - bEnd;
  }
  return aStart - bStart;
}

function resolveHistogramBucket(value: number, config: HistogramConfig) {
  const { buckets, format } = config;
  let previous = 0;
  for (const bucket of buckets) {
    if (value < bucket) {
      return format(bucket, previous === 0 ? undefined : previous);
    }
    previous = bucket;
  }
  return `${buckets[buckets.length - 1]}+`;
}

const defaultRegistry = new MetricsRegistry();

export type { HistogramSnapshot, LatencyStats, MetricsSnapshot, PrometheusOptions };
export { MetricsRegistry };
export default defaultRegistry;
