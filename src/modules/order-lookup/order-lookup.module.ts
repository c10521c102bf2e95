import { type MiddlewareConsumer, Module, type NestModule, RequestMethod } from '@nestjs/common';
import { gatewayConfig, type GatewayConfig } from '../../common/config/gateway.config';
import {
  LOOKUP_METRICS_PORT,
  ORDER_RESOLVER_PORT,
  ORDER_TRACKING_PORT,
  TRACKING_ENRICHMENT_PORT,
} from './application/ports/tokens';
import type { OrderResolverPort } from './application/ports/order-resolver.port';
import { LookupOrderUseCase } from './application/use-cases/lookup-order';
import { MetricsController } from './controllers/metrics.controller';
import { OrderLookupController } from './controllers/order-lookup.controller';
import {
  CommerceClient,
  SearchInlineOrderResolver,
  SearchThenDetailOrderResolver,
} from './infrastructure/adapters/commerce-http';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics/prometheus-metrics.adapter';
import {
  OrderTrackingClient,
  TrackingClient,
  TrackingEnrichmentClient,
} from './infrastructure/adapters/tracking-http';
import { ApiKeyGuard } from './infrastructure/security/api-key.guard';
import { IpAllowlistMiddleware } from './infrastructure/security/ip-allowlist.middleware';

@Module({
  controllers: [OrderLookupController, MetricsController],
  providers: [
    ApiKeyGuard,
    LookupOrderUseCase,
    CommerceClient,
    SearchThenDetailOrderResolver,
    SearchInlineOrderResolver,
    TrackingClient,
    TrackingEnrichmentClient,
    OrderTrackingClient,
    PrometheusMetricsAdapter,
    {
      provide: ORDER_RESOLVER_PORT,
      inject: [gatewayConfig.KEY, SearchThenDetailOrderResolver, SearchInlineOrderResolver],
      useFactory: (
        config: GatewayConfig,
        searchThenDetail: SearchThenDetailOrderResolver,
        searchInline: SearchInlineOrderResolver,
      ): OrderResolverPort =>
        config.commerce.orderShape === 'search_inline' ? searchInline : searchThenDetail,
    },
    {
      provide: TRACKING_ENRICHMENT_PORT,
      useExisting: TrackingEnrichmentClient,
    },
    {
      provide: ORDER_TRACKING_PORT,
      useExisting: OrderTrackingClient,
    },
    {
      provide: LOOKUP_METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
  ],
})
export class OrderLookupModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(IpAllowlistMiddleware).forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
