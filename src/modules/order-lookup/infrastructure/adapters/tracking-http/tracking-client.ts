import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '../../../../../common/utils/logger';
import { gatewayConfig, type GatewayConfig, type TrackingConfig } from '../../../../../common/config/gateway.config';
import type { LookupMetricsPort } from '../../../application/ports/metrics.port';
import { LOOKUP_METRICS_PORT } from '../../../application/ports/tokens';
import type { UpstreamResult } from '../../../application/ports/upstream-result';
import type { TrackingDetail } from '../../../domain/records';
import { assertSuccessStatus, sendUpstreamRequest, toUpstreamFailure } from '../shared';
import { classifyTrackingPayload, resolveTrackingDetail } from './tracking-payload';

/**
 * JSON POST client for the tracking system. 404 is "no data"; any other
 * non-2xx status is an upstream error.
 */
@Injectable()
export class TrackingClient {
  private readonly logger = createLogger(TrackingClient.name);
  readonly config: TrackingConfig;

  constructor(
    @Inject(gatewayConfig.KEY) gateway: GatewayConfig,
    @Inject(LOOKUP_METRICS_PORT) private readonly metrics: LookupMetricsPort,
  ) {
    this.config = gateway.tracking;
  }

  async postForDetail(input: {
    requestId: string;
    path: string;
    body: Record<string, unknown>;
    headers?: Record<string, string>;
  }): Promise<UpstreamResult<TrackingDetail>> {
    const result = await this.send(input);
    this.metrics.incrementUpstreamCall({ system: 'tracking', result: result.status });

    if (result.status === 'error') {
      this.logger.warn('tracking_request_failed', {
        event: 'tracking_request_failed',
        request_id: input.requestId,
        endpoint: input.path,
        error_code: result.errorCode,
        status_code: result.statusCode,
      });
    }

    return result;
  }

  private async send(input: {
    requestId: string;
    path: string;
    body: Record<string, unknown>;
    headers?: Record<string, string>;
  }): Promise<UpstreamResult<TrackingDetail>> {
    const startedAt = Date.now();
    try {
      const response = await sendUpstreamRequest({
        system: 'tracking',
        url: `${this.config.baseUrl}${input.path}`,
        init: {
          method: 'POST',
          headers: {
            Accept: 'application/json',
            'Content-Type': 'application/json',
            ...input.headers,
          },
          body: JSON.stringify(input.body),
        },
        timeoutMs: this.config.timeoutMs,
      });
      this.logger.performance('tracking_request', startedAt, {
        request_id: input.requestId,
        endpoint: input.path,
        status_code: response.status,
      });

      if (response.status === 404) {
        return { status: 'no_data' };
      }

      assertSuccessStatus('tracking', response);

      const payload = classifyTrackingPayload(response.body);
      if (payload.kind === 'unparseable') {
        this.logger.warn('tracking_payload_unparseable', {
          event: 'tracking_payload_unparseable',
          request_id: input.requestId,
          endpoint: input.path,
        });
      }

      const detail = resolveTrackingDetail(payload);
      return detail ? { status: 'ok', data: detail } : { status: 'no_data' };
    } catch (error: unknown) {
      return toUpstreamFailure(error);
    }
  }
}
