export const ORDER_LOOKUP_METRIC_REQUESTS_TOTAL = 'order_lookup_requests_total';
export const ORDER_LOOKUP_METRIC_UPSTREAM_CALLS_TOTAL = 'order_lookup_upstream_calls_total';
export const ORDER_LOOKUP_METRIC_LATENCY_SECONDS = 'order_lookup_latency_seconds';

export const ORDER_LOOKUP_LATENCY_BUCKETS = [0.1, 0.25, 0.5, 1, 2, 3, 5, 8] as const;
