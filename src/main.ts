import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { validateEnv } from './common/config/env.validation';
import { configureApp } from './common/http/app-setup';
import { createLogger } from './common/utils/logger';

async function bootstrap(): Promise<void> {
  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create(AppModule, {
    logger: [nestLogLevel, 'warn', 'error'],
  });

  configureApp(app);

  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info('order_status_gateway_listening', {
    event: 'order_status_gateway_listening',
    port: validatedEnv.PORT,
    mode: validatedEnv.LOOKUP_MODE,
    ip_allowlist_enforced: validatedEnv.ENFORCE_IP_ALLOWLIST,
  });
}

bootstrap().catch((error: unknown) => {
  createLogger('Bootstrap').error(
    'Failed to bootstrap order status gateway',
    error instanceof Error ? error : undefined,
  );
  process.exit(1);
});
