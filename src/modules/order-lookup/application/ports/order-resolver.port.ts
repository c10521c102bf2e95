/**
 * Port for resolving a human order number plus a customer email into an
 * order the customer owns.
 *
 * Every failure branch collapses into `{ ok: false }`. The `reason` is for
 * logs and metrics only and must never reach the caller.
 */

import type { OrderRecord } from '../../domain/records';

export type OrderNotFoundReason =
  | 'missing_email'
  | 'search_failed'
  | 'no_exact_match'
  | 'detail_unavailable'
  | 'missing_customer_link'
  | 'customer_unavailable'
  | 'email_mismatch';

export type OrderResolution =
  | { ok: true; order: OrderRecord }
  | { ok: false; reason: OrderNotFoundReason };

export interface OrderResolverPort {
  resolveOrder(input: {
    requestId: string;
    orderNumber: number;
    customerEmail?: string;
  }): Promise<OrderResolution>;
}
