export type UpstreamSystem = 'commerce' | 'tracking';

export type UpstreamErrorCode = 'network' | 'timeout' | 'http' | 'misconfigured';

/**
 * Raised by the upstream HTTP helpers and converted into an `UpstreamResult`
 * at the call site. Never rendered to callers.
 */
export class UpstreamServiceError extends Error {
  constructor(
    message: string,
    public readonly system: UpstreamSystem,
    public readonly statusCode: number,
    public readonly errorCode: UpstreamErrorCode,
  ) {
    super(message);
    this.name = 'UpstreamServiceError';
  }
}
