export {
  UpstreamServiceError,
  type UpstreamErrorCode,
  type UpstreamSystem,
} from './upstream-service.error';
