/**
 * Request-scoped views of upstream payloads. Only the fields the lookup
 * pipeline reads are materialized; everything else is dropped at parse time.
 */

export interface LineItem {
  title: string;
  quantity: number;
}

export interface ShipmentEvent {
  type: string;
  trackingNumbers: string[];
  carrier?: string;
}

export interface OrderRecord {
  internalId?: string;
  orderNumber: number;
  customerId?: string;
  fulfillmentStatus: string;
  shippingStatus: string;
  lineItems: LineItem[];
  shipmentEvents: ShipmentEvent[];
}

export interface CustomerRecord {
  emails: string[];
}

export interface TrackingDetail {
  statusCode?: string;
  statusText?: string;
  estimatedDelivery?: string;
  trackingUrl?: string;
}
