/**
 * Tracking-system endpoints, relative to `TRACKING_BASE_URL`.
 */

export const TRACKING_DETAILS_ENDPOINT = '/openapi/tracking/getdetails';

export const ORDER_STATUS_ENDPOINT = '/openapi/tracking/getorderstatus';

export const MAX_TRACKING_NUMBERS_PER_REQUEST = 3;
