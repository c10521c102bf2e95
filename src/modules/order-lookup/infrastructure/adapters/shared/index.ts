export {
  assertSuccessStatus,
  sendUpstreamRequest,
  toUpstreamFailure,
  type UpstreamBody,
  type UpstreamResponse,
} from './http-client';
