/**
 * Commerce order-system endpoints, relative to `COMMERCE_BASE_URL`.
 */

export function orderSearchEndpoint(orderNumber: number): string {
  const params = new URLSearchParams({ q: String(orderNumber) });
  return `/orders?${params.toString()}`;
}

export function orderDetailEndpoint(internalId: string): string {
  return `/orders/${encodeURIComponent(internalId)}`;
}

export function customerEndpoint(customerId: string): string {
  return `/customers/${encodeURIComponent(customerId)}`;
}
