import { isRecord } from '../../../../common/utils/object.utils';
import type { TrackingDetail } from '../records';
import {
  TRACKING_ESTIMATED_DELIVERY_FIELDS,
  TRACKING_STATUS_CODE_FIELDS,
  TRACKING_STATUS_TEXT_FIELDS,
  TRACKING_URL_FIELDS,
} from './constants';

/**
 * Picks the first non-empty value of each candidate field family out of one
 * upstream tracking record. Non-object input yields an empty detail.
 */
export function toTrackingDetail(record: unknown): TrackingDetail {
  if (!isRecord(record)) {
    return {};
  }

  const statusCode = pickField(record, TRACKING_STATUS_CODE_FIELDS);
  const statusText = pickField(record, TRACKING_STATUS_TEXT_FIELDS);
  const estimatedDelivery = pickField(record, TRACKING_ESTIMATED_DELIVERY_FIELDS);
  const trackingUrl = pickField(record, TRACKING_URL_FIELDS);

  return {
    ...(statusCode ? { statusCode } : {}),
    ...(statusText ? { statusText } : {}),
    ...(estimatedDelivery ? { estimatedDelivery } : {}),
    ...(trackingUrl ? { trackingUrl } : {}),
  };
}

function pickField(record: Record<string, unknown>, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = record[name];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }

  return undefined;
}
