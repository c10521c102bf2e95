import { Inject, Injectable } from '@nestjs/common';
import { gatewayConfig, type GatewayConfig } from '../../../../../common/config/gateway.config';
import { createLogger } from '../../../../../common/utils/logger';
import type { LookupResult } from '../../../domain/lookup-result';
import { buildFoundContext, buildNotFoundContext } from '../../../domain/order-context';
import { normalizeOrderIdentifier } from '../../../domain/order-identifier';
import type { OrderRecord, TrackingDetail } from '../../../domain/records';
import { mapOrderStatus, mapTrackingStatus } from '../../../domain/status-vocabulary';
import type { LookupMetricsPort } from '../../ports/metrics.port';
import type { OrderResolverPort } from '../../ports/order-resolver.port';
import {
  LOOKUP_METRICS_PORT,
  ORDER_RESOLVER_PORT,
  ORDER_TRACKING_PORT,
  TRACKING_ENRICHMENT_PORT,
} from '../../ports/tokens';
import type { OrderTrackingPort, TrackingEnrichmentPort } from '../../ports/tracking.port';
import type { UpstreamResult } from '../../ports/upstream-result';
import { extractShipmentTracking } from './order-facts';

export interface LookupOrderInput {
  requestId: string;
  orderId: string;
  customerEmail?: string;
}

/**
 * Normalize -> resolve order -> (enrich tracking) -> compose.
 *
 * Every failure before composition ends in the same not-found sentence.
 * Enrichment failures only drop the tracking data.
 */
@Injectable()
export class LookupOrderUseCase {
  private readonly logger = createLogger(LookupOrderUseCase.name);

  constructor(
    @Inject(gatewayConfig.KEY) private readonly config: GatewayConfig,
    @Inject(ORDER_RESOLVER_PORT) private readonly orderResolver: OrderResolverPort,
    @Inject(TRACKING_ENRICHMENT_PORT) private readonly trackingEnrichment: TrackingEnrichmentPort,
    @Inject(ORDER_TRACKING_PORT) private readonly orderTracking: OrderTrackingPort,
    @Inject(LOOKUP_METRICS_PORT) private readonly metrics: LookupMetricsPort,
  ) {}

  async execute(input: LookupOrderInput): Promise<LookupResult> {
    const startedAt = Date.now();

    try {
      return await this.lookup(input);
    } finally {
      this.metrics.observeLookupLatency((Date.now() - startedAt) / 1000);
    }
  }

  private async lookup(input: LookupOrderInput): Promise<LookupResult> {
    const normalized = normalizeOrderIdentifier(input.orderId, this.config.orderIdPattern);
    if (!normalized.ok) {
      this.metrics.incrementLookup('invalid_identifier');
      this.logger.info('order_lookup_invalid_identifier', {
        event: 'order_lookup_invalid_identifier',
        request_id: input.requestId,
      });
      return this.notFound(input.orderId);
    }

    const { orderNumber } = normalized.identifier;
    const result =
      this.config.mode === 'tracking_only'
        ? await this.lookupByTracking(input, orderNumber)
        : await this.lookupByCommerce(input, orderNumber);

    this.metrics.incrementLookup(result.kind);
    this.logger.info('order_lookup_completed', {
      event: 'order_lookup_completed',
      request_id: input.requestId,
      mode: this.config.mode,
      outcome: result.kind,
      customer_email: input.customerEmail ?? null,
      has_tracking_url: result.kind === 'found' && result.trackingUrl !== null,
    });

    return result;
  }

  private async lookupByCommerce(
    input: LookupOrderInput,
    orderNumber: number,
  ): Promise<LookupResult> {
    const resolution = await this.orderResolver.resolveOrder({
      requestId: input.requestId,
      orderNumber,
      customerEmail: input.customerEmail,
    });

    if (!resolution.ok) {
      return this.notFound(input.orderId);
    }

    const detail = await this.enrichTracking(input.requestId, resolution.order);
    return this.found(input.orderId, resolution.order, detail);
  }

  private async lookupByTracking(
    input: LookupOrderInput,
    orderNumber: number,
  ): Promise<LookupResult> {
    const result = await this.orderTracking.lookupByOrderNumber({
      requestId: input.requestId,
      orderNumber,
    });

    const detail = this.unwrapTracking(input.requestId, result);
    return detail ? this.found(input.orderId, undefined, detail) : this.notFound(input.orderId);
  }

  private async enrichTracking(
    requestId: string,
    order: OrderRecord,
  ): Promise<TrackingDetail | undefined> {
    if (!this.config.tracking.enabled) {
      return undefined;
    }

    const { trackingNumbers } = extractShipmentTracking(order);
    if (trackingNumbers.length === 0) {
      return undefined;
    }

    const result = await this.trackingEnrichment.lookupByTrackingNumbers({
      requestId,
      trackingNumbers,
    });

    return this.unwrapTracking(requestId, result);
  }

  private unwrapTracking(
    requestId: string,
    result: UpstreamResult<TrackingDetail>,
  ): TrackingDetail | undefined {
    switch (result.status) {
      case 'ok':
        return result.data;
      case 'no_data':
        return undefined;
      case 'error':
        this.logger.warn('tracking_lookup_unavailable', {
          event: 'tracking_lookup_unavailable',
          request_id: requestId,
          mode: this.config.mode,
          error_code: result.errorCode,
          status_code: result.statusCode,
        });
        return undefined;
      default: {
        const exhaustive: never = result;
        return exhaustive;
      }
    }
  }

  private found(
    rawIdentifier: string,
    order: OrderRecord | undefined,
    detail: TrackingDetail | undefined,
  ): LookupResult {
    const statusLine = detail || !order ? mapTrackingStatus(detail) : mapOrderStatus(order);

    return {
      kind: 'found',
      context: buildFoundContext({
        rawIdentifier,
        lineItems: order?.lineItems,
        statusLine,
        supportContact: this.config.supportContact,
      }),
      trackingUrl: statusLine.trackingUrl ?? null,
    };
  }

  private notFound(rawIdentifier: string): LookupResult {
    return {
      kind: 'not_found',
      context: buildNotFoundContext(rawIdentifier, this.config.supportContact),
    };
  }
}
