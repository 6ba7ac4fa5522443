import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsCollector } from '../src/core/metrics.js';
import type { MetricsAdapter } from '../src/core/metrics.js';

describe('MetricsCollector', () => {
  let metrics: MetricsCollector;

  beforeEach(() => {
    metrics = new MetricsCollector();
  });

  it('sums counters per tag set and overall', () => {
    metrics.counter('fabric_steps_total', { unit: 'DataWriter', outcome: 'success' });
    metrics.counter('fabric_steps_total', { outcome: 'success', unit: 'DataWriter' });
    metrics.counter('fabric_steps_total', { unit: 'DataWriter', outcome: 'failure' }, 3);
    expect(metrics.getCounter('fabric_steps_total', { unit: 'DataWriter', outcome: 'success' })).toBe(2);
    expect(metrics.getCounter('fabric_steps_total')).toBe(5);
    expect(metrics.getCounter('missing')).toBe(0);
  });

  it('keeps the last gauge value', () => {
    metrics.gauge('signal_subscribers', 4);
    metrics.gauge('signal_subscribers', 2);
    expect(metrics.getGauge('signal_subscribers')).toBe(2);
    expect(metrics.getGauge('other')).toBeUndefined();
  });

  it('summarizes histograms in the snapshot', () => {
    for (const v of [40, 10, 30, 20]) metrics.histogram('fabric_step_duration_ms', v);
    const [summary] = metrics.getSnapshot().histograms['fabric_step_duration_ms'];
    expect(summary).toEqual({ count: 4, sum: 100, min: 10, max: 40, p50: 20, p95: 40 });
  });

  it('records elapsed time through startTimer', () => {
    const stop = metrics.startTimer('http_duration_ms', { path: '/health' });
    const elapsed = stop();
    expect(metrics.getHistogramValues('http_duration_ms', { path: '/health' })).toEqual([elapsed]);
  });

  it('renders the text exposition with sorted, escaped labels', () => {
    metrics.counter('fabric_intents_total', { intent: 'IngestData', domain: 'data-fabric' });
    metrics.gauge('signal_subscribers', 1);
    metrics.histogram('fabric_execution_duration_ms', 5);
    metrics.histogram('fabric_execution_duration_ms', 7);
    metrics.counter('odd.name', { q: 'a"b' });

    expect(metrics.toPrometheus()).toBe(
      [
        '# TYPE fabric_intents_total counter',
        'fabric_intents_total{domain="data-fabric",intent="IngestData"} 1',
        '# TYPE odd_name counter',
        'odd_name{q="a\\"b"} 1',
        '# TYPE signal_subscribers gauge',
        'signal_subscribers 1',
        '# TYPE fabric_execution_duration_ms summary',
        'fabric_execution_duration_ms_count 2',
        'fabric_execution_duration_ms_sum 12',
        '',
      ].join('\n'),
    );
  });

  it('notifies adapters and clears on reset', () => {
    const calls: string[] = [];
    const adapter: MetricsAdapter = {
      onCounter: (name) => calls.push(`counter:${name}`),
      onGauge: (name) => calls.push(`gauge:${name}`),
      onHistogram: (name) => calls.push(`histogram:${name}`),
    };
    metrics.registerAdapter(adapter);
    metrics.counter('c');
    metrics.gauge('g', 1);
    metrics.histogram('h', 1);
    expect(calls).toEqual(['counter:c', 'gauge:g', 'histogram:h']);

    metrics.reset();
    expect(Object.keys(metrics.getSnapshot().counters)).toHaveLength(0);
  });
});
