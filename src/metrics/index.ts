import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { EventRecord } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type ComponentMetricState = {
  counters: Map<string, number>;
  gauges: Map<string, number>;
  lastRunAt: number | null;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
};

export type ComponentMetricsSnapshot = {
  counters: CounterMap;
  gauges: CounterMap;
  lastRunAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

export type MetricsSnapshot = {
  createdAt: string;
  events: {
    total: number;
    lastEventAt: string | null;
    bySeverity: CounterMap;
    byClassification: CounterMap;
  };
  components: Record<string, ComponentMetricsSnapshot>;
  latencies: Record<string, LatencyStats>;
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
};

export type PrometheusExportOptions = {
  prefix?: string;
  labels?: Record<string, string>;
};

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly severityCounters = new Map<string, number>();
  private readonly classificationCounters = new Map<string, number>();
  private readonly componentMetrics = new Map<string, ComponentMetricState>();
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private totalEvents = 0;
  private lastEventTimestamp: number | null = null;

  reset() {
    this.logLevelCounters.clear();
    this.currentLogLevel = 'info';
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.severityCounters.clear();
    this.classificationCounters.clear();
    this.componentMetrics.clear();
    this.latencyStats.clear();
    this.totalEvents = 0;
    this.lastEventTimestamp = null;
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string) {
    this.currentLogLevel = level.toLowerCase();
  }

  recordEvent(event: EventRecord) {
    this.totalEvents += 1;
    this.lastEventTimestamp = event.timestamp;
    this.severityCounters.set(event.severity, (this.severityCounters.get(event.severity) ?? 0) + 1);
    this.classificationCounters.set(
      event.classification,
      (this.classificationCounters.get(event.classification) ?? 0) + 1
    );
  }

  incrementCounter(component: string, counter: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    const state = getComponentState(this.componentMetrics, component);
    state.counters.set(counter, (state.counters.get(counter) ?? 0) + amount);
    state.lastRunAt = Date.now();
  }

  setGauge(component: string, gauge: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = getComponentState(this.componentMetrics, component);
    state.lastRunAt = Date.now();
    state.gauges.set(gauge, value);
  }

  recordError(component: string, message: string) {
    const state = getComponentState(this.componentMetrics, component);
    const now = Date.now();
    state.lastRunAt = now;
    state.lastErrorAt = now;
    state.lastErrorMessage = message;
    state.counters.set('errors', (state.counters.get('errors') ?? 0) + 1);
  }

  getCounter(component: string, counter: string): number {
    return this.componentMetrics.get(component)?.counters.get(counter) ?? 0;
  }

  getGauge(component: string, gauge: string): number | null {
    return this.componentMetrics.get(component)?.gauges.get(gauge) ?? null;
  }

  observeLatency(metric: string, durationMs: number) {
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
    const components: Record<string, ComponentMetricsSnapshot> = {};
    const ordered = Array.from(this.componentMetrics.entries()).sort(([a], [b]) => a.localeCompare(b));
    for (const [name, state] of ordered) {
      components[name] = {
        counters: mapFrom(state.counters),
        gauges: mapFrom(state.gauges),
        lastRunAt: toIso(state.lastRunAt),
        lastErrorAt: toIso(state.lastErrorAt),
        lastErrorMessage: state.lastErrorMessage
      };
    }

    return {
      createdAt: new Date().toISOString(),
      events: {
        total: this.totalEvents,
        lastEventAt: toIso(this.lastEventTimestamp),
        bySeverity: mapFrom(this.severityCounters),
        byClassification: mapFrom(this.classificationCounters)
      },
      components,
      latencies: mapFromLatencies(this.latencyStats),
      logs: {
        byLevel: mapFrom(this.logLevelCounters),
        currentLevel: this.currentLogLevel,
        lastErrorAt: toIso(this.lastErrorAt),
        lastErrorMessage: this.lastErrorMessage
      }
    };
  }

  exportPrometheus(options: PrometheusExportOptions = {}): string {
    const prefix = options.prefix ?? 'watchpost';
    const baseLabels = options.labels ?? {};
    const lines: string[] = [];

    const eventsName = sanitizePrometheusMetricName(`${prefix}_events_total`);
    lines.push(`# TYPE ${eventsName} counter`);
    for (const [severity, value] of Object.entries(mapFrom(this.severityCounters))) {
      lines.push(`${eventsName}${formatPrometheusLabels({ ...baseLabels, severity })} ${formatPrometheusValue(value)}`);
    }

    const ordered = Array.from(this.componentMetrics.entries()).sort(([a], [b]) => a.localeCompare(b));
    for (const [component, state] of ordered) {
      for (const [counter, value] of Object.entries(mapFrom(state.counters))) {
        const name = sanitizePrometheusMetricName(`${prefix}_${component}_${counter}_total`);
        lines.push(`# TYPE ${name} counter`);
        lines.push(`${name}${formatPrometheusLabels(baseLabels)} ${formatPrometheusValue(value)}`);
      }
      for (const [gauge, value] of Object.entries(mapFrom(state.gauges))) {
        const name = sanitizePrometheusMetricName(`${prefix}_${component}_${gauge}`);
        lines.push(`# TYPE ${name} gauge`);
        lines.push(`${name}${formatPrometheusLabels(baseLabels)} ${formatPrometheusValue(value)}`);
      }
    }

    const logName = sanitizePrometheusMetricName(`${prefix}_log_records_total`);
    lines.push(`# TYPE ${logName} counter`);
    for (const [level, value] of Object.entries(mapFrom(this.logLevelCounters))) {
      lines.push(`${logName}${formatPrometheusLabels({ ...baseLabels, level })} ${formatPrometheusValue(value)}`);
    }

    return `${lines.join('\n')}\n`;
  }
}

function getComponentState(map: Map<string, ComponentMetricState>, component: string): ComponentMetricState {
  const existing = map.get(component);
  if (existing) {
    return existing;
  }
  const created: ComponentMetricState = {
    counters: new Map<string, number>(),
    gauges: new Map<string, number>(),
    lastRunAt: null,
    lastErrorAt: null,
    lastErrorMessage: null
  };
  map.set(component, created);
  return created;
}

function toIso(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromLatencies(
  source: Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>
): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [name, stats] of source.entries()) {
    result[name] = {
      count: stats.count,
      totalMs: stats.totalMs,
      minMs: stats.minMs === Number.POSITIVE_INFINITY ? 0 : stats.minMs,
      maxMs: stats.maxMs,
      averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
    };
  }
  return result;
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'watchpost_metric';
  }
  if (/^[0-9]/.test(lower)) {
    return `watchpost_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  return /^[0-9]/.test(sanitized) ? `_${sanitized}` : sanitized;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const normalized = entries.map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  normalized.sort(([a], [b]) => a.localeCompare(b));
  const rendered = normalized.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value)) {
    return '0';
  }
  return Number.isInteger(value) ? String(value) : value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
