export {
  GENERIC_TRACKING_MESSAGE,
  ORDER_STATUS_MESSAGES,
  TRACKING_STATUS_SENTENCES,
} from './constants';
export { mapOrderStatus } from './order-status';
export { mapTrackingStatus, resolveTrackingStatusCode } from './tracking-status';
export { toTrackingDetail } from './tracking-fields';
export type { StatusLine, TrackingStatusCode } from './types';
