import type { UpstreamErrorCode } from '../../domain/errors';

/**
 * Outcome of one upstream call. `no_data` covers a 404-equivalent answer or a
 * call that was skipped because the integration is disabled.
 */
export type UpstreamResult<T> =
  | { status: 'ok'; data: T }
  | { status: 'no_data' }
  | { status: 'error'; errorCode: UpstreamErrorCode; statusCode: number };
