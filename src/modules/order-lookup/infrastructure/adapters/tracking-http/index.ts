export { OrderTrackingClient } from './order-tracking.client';
export { TrackingClient } from './tracking-client';
export { TrackingEnrichmentClient } from './tracking-enrichment.client';
export { classifyTrackingPayload, resolveTrackingDetail, type TrackingPayload } from './tracking-payload';
