import type { TrackingStatusCode } from './types';

export const ORDER_STATUS_MESSAGES = {
  notFulfilled: 'Not shipped yet; typical dispatch within two business days.',
  partiallyFulfilled: 'Partially fulfilled; remaining items will ship soon.',
  delivered: 'Order was delivered.',
  onItsWay: 'Order is on its way; follow via the provided tracking link.',
  fulfilled: 'Order fulfilled.',
  noFulfillmentRequired: 'No fulfillment required.',
  statusAvailable: 'Order status available; see tracking for latest updates.',
} as const;

export const GENERIC_TRACKING_MESSAGE = ORDER_STATUS_MESSAGES.onItsWay;

// Candidate field names, highest priority first.
export const TRACKING_STATUS_CODE_FIELDS = [
  'statusCode',
  'status_code',
  'orderStatusCode',
  'shipmentStatusCode',
  'status',
] as const;

export const TRACKING_STATUS_TEXT_FIELDS = [
  'statusDescription',
  'status_description',
  'carrierStatus',
  'description',
] as const;

export const TRACKING_ESTIMATED_DELIVERY_FIELDS = [
  'estimatedDeliveryDate',
  'estimated_delivery_date',
  'estimatedDelivery',
  'eta',
] as const;

export const TRACKING_URL_FIELDS = [
  'trackingUrl',
  'tracking_url',
  'embeddedCarrierTrackingUrl',
  'carrierTrackingUrl',
  'trackingLink',
] as const;

export const TRACKING_STATUS_SENTENCES: Readonly<
  Record<TrackingStatusCode, { sentence: string; needsAttention: boolean }>
> = {
  RECEIVED: {
    sentence: 'Order was received and is queued for processing.',
    needsAttention: false,
  },
  ON_HOLD_INVENTORY: {
    sentence: 'Order is on hold while inventory is confirmed.',
    needsAttention: true,
  },
  ON_HOLD_WINERY_REQUEST: {
    sentence: "Order is on hold at the winery's request.",
    needsAttention: true,
  },
  ON_HOLD_WEATHER: {
    sentence: 'Order is on hold until weather along the route is safe for shipping.',
    needsAttention: true,
  },
  ON_HOLD_CUSTOMER_SERVICE: {
    sentence: 'Order is on hold pending a customer service review.',
    needsAttention: true,
  },
  PROCESSING: {
    sentence: 'Order is being processed at the warehouse.',
    needsAttention: false,
  },
  CANCELED: {
    sentence: 'Order was canceled.',
    needsAttention: true,
  },
  EXCEPTION: {
    sentence: 'The carrier reported an exception for this shipment.',
    needsAttention: true,
  },
  READY_TO_SHIP: {
    sentence: 'Order is packed and ready to ship.',
    needsAttention: false,
  },
  READY_FOR_PICKUP: {
    sentence: 'Order is ready for pickup.',
    needsAttention: false,
  },
  SHIPPED: {
    sentence: 'Order has shipped.',
    needsAttention: false,
  },
  IN_TRANSIT: {
    sentence: 'Order is in transit with the carrier.',
    needsAttention: false,
  },
  DELIVERED: {
    sentence: 'Order was delivered.',
    needsAttention: false,
  },
  RETURNED: {
    sentence: 'Order was returned to the shipper.',
    needsAttention: true,
  },
  RETURNED_TO_SHIPPER: {
    sentence: 'Order was returned to the shipper.',
    needsAttention: true,
  },
  DAMAGED_IN_TRANSIT: {
    sentence: 'Order was damaged in transit.',
    needsAttention: true,
  },
};

export const TRACKING_STATUS_CODE_ALIASES: Readonly<Record<string, TrackingStatusCode>> = {
  CANCELLED: 'CANCELED',
  INTRANSIT: 'IN_TRANSIT',
  RETURN_TO_SHIPPER: 'RETURNED_TO_SHIPPER',
  ON_HOLD_WINERY: 'ON_HOLD_WINERY_REQUEST',
  ON_HOLD_WINERY_REQUESTED: 'ON_HOLD_WINERY_REQUEST',
  ON_HOLD_CS: 'ON_HOLD_CUSTOMER_SERVICE',
  DAMAGED: 'DAMAGED_IN_TRANSIT',
};
