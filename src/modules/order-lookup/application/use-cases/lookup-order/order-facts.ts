import type { OrderRecord } from '../../../domain/records';

export interface ShipmentTracking {
  trackingNumbers: string[];
  carrier?: string;
}

/**
 * Tracking numbers from every `shipped` fulfillment, in order, plus the first
 * carrier named on one of them.
 */
export function extractShipmentTracking(order: Pick<OrderRecord, 'shipmentEvents'>): ShipmentTracking {
  const trackingNumbers: string[] = [];
  let carrier: string | undefined;

  for (const event of order.shipmentEvents) {
    if (event.type.trim().toLowerCase() !== 'shipped') {
      continue;
    }

    trackingNumbers.push(...event.trackingNumbers.filter((value) => value.trim().length > 0));
    if (!carrier && event.carrier) {
      carrier = event.carrier;
    }
  }

  return carrier ? { trackingNumbers, carrier } : { trackingNumbers };
}
