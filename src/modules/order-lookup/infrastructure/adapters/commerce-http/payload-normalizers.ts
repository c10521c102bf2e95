import { isRecord } from '../../../../../common/utils/object.utils';
import { resolveOptionalString } from '../../../../../common/utils/string.utils';
import { parseOrderNumber } from '../../../domain/order-identifier';
import type { LineItem, OrderRecord, ShipmentEvent } from '../../../domain/records';

const DEFAULT_ITEM_TITLE = 'Item';

export function extractSearchEntries(body: unknown): Record<string, unknown>[] {
  if (!isRecord(body) || !Array.isArray(body.orders)) {
    return [];
  }

  return body.orders.filter(isRecord);
}

/**
 * Entry whose `orderNumber`, read as an integer, equals the requested number.
 * Entries with non-numeric order numbers are skipped.
 */
export function findExactOrderMatch(
  entries: Record<string, unknown>[],
  orderNumber: number,
): Record<string, unknown> | undefined {
  return entries.find((entry) => parseOrderNumber(entry.orderNumber) === orderNumber);
}

export function unwrapOrderPayload(body: unknown): Record<string, unknown> | undefined {
  if (!isRecord(body)) {
    return undefined;
  }

  const candidate = isRecord(body.order) ? body.order : body;
  return Object.keys(candidate).length > 0 ? candidate : undefined;
}

export function normalizeOrderRecord(
  raw: Record<string, unknown>,
  fallbackOrderNumber: number,
): OrderRecord {
  const internalId = resolveIdentifier(raw.id);
  const customerId = resolveIdentifier(raw.customerId);

  return {
    ...(internalId ? { internalId } : {}),
    orderNumber: parseOrderNumber(raw.orderNumber) ?? fallbackOrderNumber,
    ...(customerId ? { customerId } : {}),
    fulfillmentStatus: resolveOptionalString(raw.fulfillmentStatus) ?? '',
    shippingStatus: resolveOptionalString(raw.shippingStatus) ?? '',
    lineItems: normalizeLineItems(raw.items),
    shipmentEvents: normalizeShipmentEvents(raw.fulfillments),
  };
}

export function extractCustomerEmails(body: unknown): string[] {
  if (!isRecord(body) || !Array.isArray(body.emails)) {
    return [];
  }

  return body.emails.flatMap((entry) => {
    const email = isRecord(entry) ? resolveOptionalString(entry.email) : resolveOptionalString(entry);
    return email ? [email.toLowerCase()] : [];
  });
}

export function resolveIdentifier(value: unknown): string | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return resolveOptionalString(value);
}

function normalizeLineItems(value: unknown): LineItem[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter(isRecord).map((line) => ({
    title:
      resolveOptionalString(line.productTitle) ??
      resolveOptionalString(line.title) ??
      resolveOptionalString(line.sku) ??
      DEFAULT_ITEM_TITLE,
    quantity: normalizeQuantity(line.quantity),
  }));
}

function normalizeQuantity(value: unknown): number {
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof parsed === 'number' && Number.isFinite(parsed) && parsed >= 1) {
    return Math.trunc(parsed);
  }

  return 1;
}

function normalizeShipmentEvents(value: unknown): ShipmentEvent[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter(isRecord).map((fulfillment) => {
    const shipped: Record<string, unknown> = isRecord(fulfillment.shipped)
      ? fulfillment.shipped
      : {};
    const trackingNumbers = Array.isArray(shipped.trackingNumbers)
      ? shipped.trackingNumbers.flatMap((entry) => {
          const trackingNumber = resolveIdentifier(entry);
          return trackingNumber ? [trackingNumber] : [];
        })
      : [];
    const carrier = resolveOptionalString(shipped.carrier);

    return {
      type: resolveOptionalString(fulfillment.type) ?? '',
      trackingNumbers,
      ...(carrier ? { carrier } : {}),
    };
  });
}
