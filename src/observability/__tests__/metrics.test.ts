import { describe, it, expect } from 'vitest';
import { InMemoryMetricsCollector, MetricNames, circuitStateValue } from '../metrics.js';

describe('InMemoryMetricsCollector', () => {
  it('should add up counters per label set', () => {
    const metrics = new InMemoryMetricsCollector();

    metrics.incrementCounter(MetricNames.REQUEST_COUNT, 1, { group: 'quotes', method: 'GET' });
    metrics.incrementCounter(MetricNames.REQUEST_COUNT, 2, { method: 'GET', group: 'quotes' });
    metrics.incrementCounter(MetricNames.REQUEST_COUNT, 1, { group: 'orders', method: 'POST' });

    expect(metrics.getCounter(MetricNames.REQUEST_COUNT, { group: 'quotes', method: 'GET' })).toBe(3);
    expect(metrics.getCounter(MetricNames.REQUEST_COUNT, { group: 'orders', method: 'POST' })).toBe(1);
    expect(metrics.getCounter(MetricNames.REQUEST_COUNT)).toBe(0);
  });

  it('should record histogram values and keep the last gauge value', () => {
    const metrics = new InMemoryMetricsCollector();

    metrics.recordHistogram(MetricNames.REQUEST_DURATION_MS, 12);
    metrics.recordHistogram(MetricNames.REQUEST_DURATION_MS, 40);
    metrics.setGauge(MetricNames.CIRCUIT_BREAKER_STATE, 2, { group: 'quotes' });
    metrics.setGauge(MetricNames.CIRCUIT_BREAKER_STATE, 0, { group: 'quotes' });

    expect(metrics.getHistogram(MetricNames.REQUEST_DURATION_MS)).toEqual([12, 40]);
    expect(metrics.getGauge(MetricNames.CIRCUIT_BREAKER_STATE, { group: 'quotes' })).toBe(0);
    expect(metrics.getGauge(MetricNames.CIRCUIT_BREAKER_STATE, { group: 'orders' })).toBeUndefined();
  });

  it('should total a counter over every label set', () => {
    const metrics = new InMemoryMetricsCollector();

    metrics.incrementCounter(MetricNames.RETRY_ATTEMPTS, 2, { group: 'quotes' });
    metrics.incrementCounter(MetricNames.RETRY_ATTEMPTS, 1, { group: 'orders' });
    metrics.incrementCounter(MetricNames.CACHE_HITS, 5, { group: 'quotes' });

    expect(metrics.getCounterTotal(MetricNames.RETRY_ATTEMPTS)).toBe(3);
    expect(metrics.getCounterTotal(MetricNames.RATE_LIMIT_WAITS)).toBe(0);
  });

  it('should summarize histograms in a snapshot', () => {
    const metrics = new InMemoryMetricsCollector();

    metrics.incrementCounter(MetricNames.REQUEST_COUNT, 1, { group: 'quotes' });
    metrics.setGauge(MetricNames.CIRCUIT_BREAKER_STATE, 2, { group: 'quotes' });
    metrics.recordHistogram(MetricNames.REQUEST_DURATION_MS, 30, { group: 'quotes' });
    metrics.recordHistogram(MetricNames.REQUEST_DURATION_MS, 10, { group: 'quotes' });

    expect(metrics.snapshot()).toEqual({
      counters: [{ name: MetricNames.REQUEST_COUNT, labels: { group: 'quotes' }, value: 1 }],
      gauges: [{ name: MetricNames.CIRCUIT_BREAKER_STATE, labels: { group: 'quotes' }, value: 2 }],
      histograms: [{
        name: MetricNames.REQUEST_DURATION_MS,
        labels: { group: 'quotes' },
        value: { count: 2, sum: 40, min: 10, max: 30 },
      }],
    });
  });

  it('should return a copy of histogram values', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.recordHistogram(MetricNames.REQUEST_DURATION_MS, 12);

    metrics.getHistogram(MetricNames.REQUEST_DURATION_MS).push(99);

    expect(metrics.getHistogram(MetricNames.REQUEST_DURATION_MS)).toEqual([12]);
  });

  it('should forget everything on reset', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.incrementCounter(MetricNames.CACHE_HITS, 1);

    metrics.reset();

    expect(metrics.getCounter(MetricNames.CACHE_HITS)).toBe(0);
  });
});

describe('circuitStateValue', () => {
  it('should map states to gauge values', () => {
    expect(circuitStateValue('closed')).toBe(0);
    expect(circuitStateValue('half_open')).toBe(1);
    expect(circuitStateValue('open')).toBe(2);
  });
});
