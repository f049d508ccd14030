import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsRegistry } from './metrics-registry.js';

describe('MetricsRegistry', () => {
  let registry: MetricsRegistry;

  beforeEach(() => {
    registry = new MetricsRegistry();
  });

  describe('counter', () => {
    it('should count per label set', () => {
      const counter = registry.counter('hits_total', 'Hits', ['method']);

      counter.inc({ method: 'a' });
      counter.inc({ method: 'a' });
      counter.inc({ method: 'b' }, 3);

      expect(counter.get({ method: 'a' })).toBe(2);
      expect(counter.get({ method: 'b' })).toBe(3);
      expect(counter.get({ method: 'c' })).toBe(0);
    });

    it('should refuse to decrease', () => {
      const counter = registry.counter('c_total', 'C');
      expect(() => counter.inc({}, -1)).toThrow(
        'Counter c_total cannot be decreased',
      );
    });
  });

  describe('gauge', () => {
    it('should move up and down', () => {
      const gauge = registry.gauge('active', 'Active');
      gauge.inc();
      gauge.inc();
      gauge.dec();
      expect(gauge.get()).toBe(1);
    });
  });

  describe('histogram', () => {
    it('should track count and sum', () => {
      const histogram = registry.histogram('latency', 'Latency', [], [1, 5]);
      histogram.observe(0.5);
      histogram.observe(3);
      expect(histogram.getCount()).toBe(2);
      expect(histogram.getSum()).toBe(3.5);
    });
  });

  it('should reject duplicate names', () => {
    registry.counter('dup', 'first');
    expect(() => registry.gauge('dup', 'second')).toThrow(
      'Metric already registered: dup',
    );
  });

  it('should render the Prometheus text format', () => {
    registry
      .counter('rate_limit_exceeded_total', 'Rejections', ['method', 'key'])
      .inc({ method: '/svc.S/M', key: 'global' });
    registry.gauge('active', 'Active calls');
    const histogram = registry.histogram('dur', 'Duration', ['m'], [0.5, 1]);
    histogram.observe(0.25, { m: 'x' });
    histogram.observe(2, { m: 'x' });

    expect(registry.render()).toBe(
      [
        '# HELP rate_limit_exceeded_total Rejections',
        '# TYPE rate_limit_exceeded_total counter',
        'rate_limit_exceeded_total{method="/svc.S/M",key="global"} 1',
        '# HELP active Active calls',
        '# TYPE active gauge',
        'active 0',
        '# HELP dur Duration',
        '# TYPE dur histogram',
        'dur_bucket{m="x",le="0.5"} 1',
        'dur_bucket{m="x",le="1"} 1',
        'dur_bucket{m="x",le="+Inf"} 2',
        'dur_sum{m="x"} 2.25',
        'dur_count{m="x"} 2',
        '',
      ].join('\n'),
    );
  });

  it('should escape label values', () => {
    registry.counter('e_total', 'E', ['v']).inc({ v: 'a"b\\c' });
    expect(registry.render()).toContain('e_total{v="a\\"b\\\\c"} 1');
  });
});
