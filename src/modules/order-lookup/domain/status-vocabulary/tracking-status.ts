import type { TrackingDetail } from '../records';
import {
  GENERIC_TRACKING_MESSAGE,
  TRACKING_STATUS_CODE_ALIASES,
  TRACKING_STATUS_SENTENCES,
} from './constants';
import type { StatusLine, TrackingStatusCode } from './types';

/**
 * Turns one tracking detail into a sentence. Resolution order: known status
 * code, then free-text description, then the generic in-transit sentence.
 * An estimated delivery is appended as a second clause.
 */
export function mapTrackingStatus(detail: TrackingDetail | undefined): StatusLine {
  const code = detail?.statusCode ? resolveTrackingStatusCode(detail.statusCode) : undefined;
  const entry = code ? TRACKING_STATUS_SENTENCES[code] : undefined;
  const description = cleanDescription(detail?.statusText);

  let sentence =
    entry?.sentence ??
    (description ? `Order is on its way (${description}).` : GENERIC_TRACKING_MESSAGE);
  if (detail?.estimatedDelivery) {
    sentence += ` Estimated delivery ${detail.estimatedDelivery}.`;
  }

  return {
    sentence,
    ...(detail?.trackingUrl ? { trackingUrl: detail.trackingUrl } : {}),
    needsAttention: entry?.needsAttention ?? false,
  };
}

export function resolveTrackingStatusCode(raw: string): TrackingStatusCode | undefined {
  const key = raw
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (key.length === 0) {
    return undefined;
  }

  if (isTrackingStatusCode(key)) {
    return key;
  }

  return Object.prototype.hasOwnProperty.call(TRACKING_STATUS_CODE_ALIASES, key)
    ? TRACKING_STATUS_CODE_ALIASES[key]
    : undefined;
}

function isTrackingStatusCode(key: string): key is TrackingStatusCode {
  return Object.prototype.hasOwnProperty.call(TRACKING_STATUS_SENTENCES, key);
}

function cleanDescription(value: string | undefined): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const cleaned = value.trim().replace(/[.\s]+$/, '');
  return cleaned.length > 0 ? cleaned : undefined;
}
