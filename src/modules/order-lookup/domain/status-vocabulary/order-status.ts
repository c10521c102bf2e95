import type { OrderRecord } from '../records';
import { ORDER_STATUS_MESSAGES } from './constants';
import type { StatusLine } from './types';

export function mapOrderStatus(
  order: Pick<OrderRecord, 'fulfillmentStatus' | 'shippingStatus'>,
): StatusLine {
  return {
    sentence: resolveOrderStatusSentence(
      normalizeStatus(order.fulfillmentStatus),
      normalizeStatus(order.shippingStatus),
    ),
    needsAttention: false,
  };
}

function resolveOrderStatusSentence(fulfillment: string, shipping: string): string {
  switch (fulfillment) {
    case 'not fulfilled':
      return ORDER_STATUS_MESSAGES.notFulfilled;
    case 'partially fulfilled':
      return ORDER_STATUS_MESSAGES.partiallyFulfilled;
    case 'fulfilled':
      if (shipping === 'delivered') {
        return ORDER_STATUS_MESSAGES.delivered;
      }
      if (shipping === 'in transit' || shipping === 'pending') {
        return ORDER_STATUS_MESSAGES.onItsWay;
      }
      return ORDER_STATUS_MESSAGES.fulfilled;
    case 'no fulfillment required':
      return ORDER_STATUS_MESSAGES.noFulfillmentRequired;
    default:
      return ORDER_STATUS_MESSAGES.statusAvailable;
  }
}

function normalizeStatus(value: unknown): string {
  return typeof value === 'string' ? value.trim().toLowerCase() : '';
}
