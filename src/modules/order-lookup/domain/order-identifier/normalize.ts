import type { OrderIdentifierResult } from './types';

const INVALID: OrderIdentifierResult = { ok: false, code: 'invalid_identifier' };

/**
 * Validates the trimmed identifier against `pattern` (before the `#` strip),
 * then parses the `#`-stripped form as a non-negative integer.
 */
export function normalizeOrderIdentifier(raw: string, pattern: RegExp): OrderIdentifierResult {
  const trimmed = raw.trim();
  if (!pattern.test(trimmed)) {
    return INVALID;
  }

  const canonical = trimmed.startsWith('#') ? trimmed.slice(1) : trimmed;
  const orderNumber = parseOrderNumber(canonical);
  if (orderNumber === undefined) {
    return INVALID;
  }

  return {
    ok: true,
    identifier: { raw, canonical, orderNumber },
  };
}

/**
 * Parses an order number given either as an integer or a digit-only string.
 * Anything else (signs, decimals, letters, unsafe integers) yields undefined.
 */
export function parseOrderNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value : undefined;
  }

  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }

  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}
