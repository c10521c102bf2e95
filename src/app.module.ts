import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './common/config/env.validation';
import { gatewayConfig } from './common/config/gateway.config';
import { HealthModule } from './modules/health/health.module';
import { OrderLookupModule } from './modules/order-lookup/order-lookup.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
      load: [gatewayConfig],
    }),
    HealthModule,
    OrderLookupModule,
  ],
})
export class AppModule {}
