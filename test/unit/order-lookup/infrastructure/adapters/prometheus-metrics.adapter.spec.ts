import { PrometheusMetricsAdapter } from '@/modules/order-lookup/infrastructure/adapters/metrics/prometheus-metrics.adapter';

describe('PrometheusMetricsAdapter', () => {
  it('renders counters and the latency histogram', () => {
    const metrics = new PrometheusMetricsAdapter();

    metrics.incrementLookup('found');
    metrics.incrementLookup('found');
    metrics.incrementLookup('invalid_identifier');
    metrics.incrementUpstreamCall({ system: 'commerce', result: 'ok' });
    metrics.observeLookupLatency(0.3);

    const lines = metrics.renderPrometheus().split('\n');

    expect(lines).toEqual(
      expect.arrayContaining([
        '# TYPE order_lookup_requests_total counter',
        'order_lookup_requests_total{outcome="found"} 2',
        'order_lookup_requests_total{outcome="invalid_identifier"} 1',
        'order_lookup_upstream_calls_total{system="commerce",result="ok"} 1',
        'order_lookup_latency_seconds_bucket{le="0.25"} 0',
        'order_lookup_latency_seconds_bucket{le="0.5"} 1',
        'order_lookup_latency_seconds_bucket{le="+Inf"} 1',
        'order_lookup_latency_seconds_sum 0.3',
        'order_lookup_latency_seconds_count 1',
      ]),
    );
  });

  it('records invalid latencies as zero', () => {
    const metrics = new PrometheusMetricsAdapter();

    metrics.observeLookupLatency(Number.NaN);

    expect(metrics.renderPrometheus()).toContain('order_lookup_latency_seconds_bucket{le="0.1"} 1');
  });
});
