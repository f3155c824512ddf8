/**
 * Request metrics: counters, histograms and gauges, each a series per label set
 */

import type { CircuitState } from '../resilience/types.js';

export type MetricLabels = Readonly<Record<string, string>>;

export interface MetricsCollector {
  incrementCounter(name: string, value: number, labels?: MetricLabels): void;
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;
  setGauge(name: string, value: number, labels?: MetricLabels): void;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
}

export interface MetricSample<V> {
  name: string;
  labels: MetricLabels;
  value: V;
}

export interface MetricsSnapshot {
  counters: MetricSample<number>[];
  gauges: MetricSample<number>[];
  histograms: MetricSample<HistogramSummary>[];
}

/**
 * Keeps every series in memory, for tests and for inspecting a client during development
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, MetricSample<number>>();
  private readonly gauges = new Map<string, MetricSample<number>>();
  private readonly histograms = new Map<string, MetricSample<number[]>>();

  incrementCounter(name: string, value: number, labels: MetricLabels = {}): void {
    seriesOf(this.counters, name, labels, 0).value += value;
  }

  recordHistogram(name: string, value: number, labels: MetricLabels = {}): void {
    seriesOf(this.histograms, name, labels, []).value.push(value);
  }

  setGauge(name: string, value: number, labels: MetricLabels = {}): void {
    seriesOf(this.gauges, name, labels, value).value = value;
  }

  getCounter(name: string, labels: MetricLabels = {}): number {
    return this.counters.get(seriesKey(name, labels))?.value ?? 0;
  }

  /**
   * Sum of a counter over all of its label sets, e.g. retries across every group
   */
  getCounterTotal(name: string): number {
    let total = 0;
    for (const series of this.counters.values()) {
      if (series.name === name) total += series.value;
    }
    return total;
  }

  getHistogram(name: string, labels: MetricLabels = {}): number[] {
    return [...(this.histograms.get(seriesKey(name, labels))?.value ?? [])];
  }

  getGauge(name: string, labels: MetricLabels = {}): number | undefined {
    return this.gauges.get(seriesKey(name, labels))?.value;
  }

  /**
   * Every series recorded so far, histograms reduced to count, sum, min and max
   */
  snapshot(): MetricsSnapshot {
    return {
      counters: [...this.counters.values()].map(copySample),
      gauges: [...this.gauges.values()].map(copySample),
      histograms: [...this.histograms.values()].map(series => ({
        name: series.name,
        labels: series.labels,
        value: summarize(series.value),
      })),
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }
}

/**
 * Collector that records nothing
 */
export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value: number, _labels?: MetricLabels): void {}
  recordHistogram(_name: string, _value: number, _labels?: MetricLabels): void {}
  setGauge(_name: string, _value: number, _labels?: MetricLabels): void {}
}

// Label order does not matter: {group, method} and {method, group} are one series
function seriesKey(name: string, labels: MetricLabels): string {
  const names = Object.keys(labels).sort();
  if (names.length === 0) {
    return name;
  }
  return `${name}{${names.map(label => `${label}=${labels[label]}`).join(',')}}`;
}

function seriesOf<V>(
  store: Map<string, MetricSample<V>>,
  name: string,
  labels: MetricLabels,
  initial: V
): MetricSample<V> {
  const key = seriesKey(name, labels);
  let series = store.get(key);
  if (!series) {
    series = { name, labels: { ...labels }, value: initial };
    store.set(key, series);
  }
  return series;
}

function copySample(series: MetricSample<number>): MetricSample<number> {
  return { name: series.name, labels: series.labels, value: series.value };
}

function summarize(values: readonly number[]): HistogramSummary {
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    sum += value;
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  return { count: values.length, sum, min, max };
}

/**
 * Metric names recorded by the request executor
 */
export const MetricNames = {
  REQUEST_COUNT: 'brokerage.requests.total',
  REQUEST_DURATION_MS: 'brokerage.requests.duration_ms',
  REQUEST_ERRORS: 'brokerage.requests.errors',
  CACHE_HITS: 'brokerage.cache.hits',
  CACHE_MISSES: 'brokerage.cache.misses',
  RETRY_ATTEMPTS: 'brokerage.retry.attempts',
  RATE_LIMIT_WAITS: 'brokerage.rate_limit.waits',
  CIRCUIT_BREAKER_REJECTIONS: 'brokerage.circuit_breaker.rejections',
  CIRCUIT_BREAKER_STATE: 'brokerage.circuit_breaker.state',
} as const;

const CIRCUIT_STATE_VALUE: Record<CircuitState, number> = {
  closed: 0,
  half_open: 1,
  open: 2,
};

/**
 * Gauge value for a circuit state: 0 closed, 1 half-open, 2 open
 */
export function circuitStateValue(state: CircuitState): number {
  return CIRCUIT_STATE_VALUE[state];
}
