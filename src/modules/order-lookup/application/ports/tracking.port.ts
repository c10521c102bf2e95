import type { TrackingDetail } from '../../domain/records';
import type { UpstreamResult } from './upstream-result';

/** Enrichment mode: carrier tracking numbers taken from a resolved order. */
export interface TrackingEnrichmentPort {
  lookupByTrackingNumbers(input: {
    requestId: string;
    trackingNumbers: string[];
  }): Promise<UpstreamResult<TrackingDetail>>;
}

/** Sole-source mode: the tracking system is queried directly by order number. */
export interface OrderTrackingPort {
  lookupByOrderNumber(input: {
    requestId: string;
    orderNumber: number;
  }): Promise<UpstreamResult<TrackingDetail>>;
}
