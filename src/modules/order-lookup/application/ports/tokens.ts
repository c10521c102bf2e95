export const ORDER_RESOLVER_PORT = Symbol('ORDER_RESOLVER_PORT');
export const TRACKING_ENRICHMENT_PORT = Symbol('TRACKING_ENRICHMENT_PORT');
export const ORDER_TRACKING_PORT = Symbol('ORDER_TRACKING_PORT');
export const LOOKUP_METRICS_PORT = Symbol('LOOKUP_METRICS_PORT');
