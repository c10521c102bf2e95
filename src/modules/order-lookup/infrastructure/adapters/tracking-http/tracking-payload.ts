import { isRecord } from '../../../../../common/utils/object.utils';
import type { TrackingDetail } from '../../../domain/records';
import { toTrackingDetail } from '../../../domain/status-vocabulary';
import type { UpstreamBody } from '../shared';

const LIST_FIELDS = ['details', 'packages'] as const;

export type TrackingPayload =
  | { kind: 'list'; records: unknown[] }
  | { kind: 'single'; record: Record<string, unknown> }
  | { kind: 'unparseable' };

export function classifyTrackingPayload(body: UpstreamBody): TrackingPayload {
  if (body.kind !== 'json') {
    return { kind: 'unparseable' };
  }

  const value = body.value;
  if (Array.isArray(value)) {
    return { kind: 'list', records: value };
  }

  if (!isRecord(value)) {
    return { kind: 'unparseable' };
  }

  const lists = LIST_FIELDS.map((field) => value[field]).filter(
    (list): list is unknown[] => Array.isArray(list),
  );
  if (lists.length > 0) {
    // An empty list yields to the next non-empty one.
    return { kind: 'list', records: lists.find((list) => list.length > 0) ?? [] };
  }

  return { kind: 'single', record: value };
}

/**
 * First detail of a successful tracking response. An empty list means the
 * upstream has nothing for this lookup; a body that is not structured data
 * still counts as an answer and maps to an empty detail.
 */
export function resolveTrackingDetail(payload: TrackingPayload): TrackingDetail | undefined {
  switch (payload.kind) {
    case 'list':
      return payload.records.length > 0 ? toTrackingDetail(payload.records[0]) : undefined;
    case 'single':
      return toTrackingDetail(payload.record);
    case 'unparseable':
      return {};
  }
}
