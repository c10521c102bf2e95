export interface StatusLine {
  sentence: string;
  trackingUrl?: string;
  /** The status is one a customer is likely to follow up on with support. */
  needsAttention: boolean;
}

export type TrackingStatusCode =
  | 'RECEIVED'
  | 'ON_HOLD_INVENTORY'
  | 'ON_HOLD_WINERY_REQUEST'
  | 'ON_HOLD_WEATHER'
  | 'ON_HOLD_CUSTOMER_SERVICE'
  | 'PROCESSING'
  | 'CANCELED'
  | 'EXCEPTION'
  | 'READY_TO_SHIP'
  | 'READY_FOR_PICKUP'
  | 'SHIPPED'
  | 'IN_TRANSIT'
  | 'DELIVERED'
  | 'RETURNED'
  | 'RETURNED_TO_SHIPPER'
  | 'DAMAGED_IN_TRANSIT';
