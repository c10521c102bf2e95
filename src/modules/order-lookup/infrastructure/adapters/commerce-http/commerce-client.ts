import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '../../../../../common/utils/logger';
import { gatewayConfig, type CommerceConfig, type GatewayConfig } from '../../../../../common/config/gateway.config';
import type { LookupMetricsPort } from '../../../application/ports/metrics.port';
import { LOOKUP_METRICS_PORT } from '../../../application/ports/tokens';
import type { UpstreamResult } from '../../../application/ports/upstream-result';
import { assertSuccessStatus, sendUpstreamRequest, toUpstreamFailure } from '../shared';

/**
 * GET-only JSON client for the commerce order system. Authenticates with
 * HTTP Basic (app id + secret) plus a tenant header. One attempt per call.
 */
@Injectable()
export class CommerceClient {
  private readonly logger = createLogger(CommerceClient.name);
  private readonly config: CommerceConfig;

  constructor(
    @Inject(gatewayConfig.KEY) gateway: GatewayConfig,
    @Inject(LOOKUP_METRICS_PORT) private readonly metrics: LookupMetricsPort,
  ) {
    this.config = gateway.commerce;
  }

  async getJson(path: string, requestId: string): Promise<UpstreamResult<unknown>> {
    const result = await this.fetchJson(path, requestId);
    this.metrics.incrementUpstreamCall({ system: 'commerce', result: result.status });

    if (result.status === 'error') {
      this.logger.warn('commerce_request_failed', {
        event: 'commerce_request_failed',
        request_id: requestId,
        endpoint: stripQuery(path),
        error_code: result.errorCode,
        status_code: result.statusCode,
      });
    }

    return result;
  }

  private async fetchJson(path: string, requestId: string): Promise<UpstreamResult<unknown>> {
    const headers = this.buildHeaders();
    if (!headers) {
      return { status: 'error', errorCode: 'misconfigured', statusCode: 0 };
    }

    const startedAt = Date.now();
    try {
      const response = await sendUpstreamRequest({
        system: 'commerce',
        url: `${this.config.baseUrl}${path}`,
        init: { method: 'GET', headers },
        timeoutMs: this.config.timeoutMs,
      });
      this.logger.performance('commerce_request', startedAt, {
        request_id: requestId,
        endpoint: stripQuery(path),
        status_code: response.status,
      });

      if (response.status === 404) {
        return { status: 'no_data' };
      }

      assertSuccessStatus('commerce', response);

      if (response.body.kind !== 'json') {
        return { status: 'no_data' };
      }

      return { status: 'ok', data: response.body.value };
    } catch (error: unknown) {
      return toUpstreamFailure(error);
    }
  }

  private buildHeaders(): Record<string, string> | undefined {
    const { appId, appSecret, tenant } = this.config;
    if (!appId || !appSecret || !tenant) {
      return undefined;
    }

    const token = Buffer.from(`${appId}:${appSecret}`, 'utf8').toString('base64');
    return {
      Accept: 'application/json',
      Authorization: `Basic ${token}`,
      tenant,
    };
  }
}

function stripQuery(path: string): string {
  const index = path.indexOf('?');
  return index === -1 ? path : path.slice(0, index);
}
