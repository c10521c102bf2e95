import {
  type INestApplication,
  UnprocessableEntityException,
  ValidationPipe,
} from '@nestjs/common';
import helmet from 'helmet';
import { HttpExceptionFilter } from '../filters/http-exception.filter';
import { requestIdMiddleware } from '../middleware/request-id.middleware';

/**
 * Express-level setup shared by the server bootstrap and the HTTP tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  app.use(helmet());
  app.use(requestIdMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      exceptionFactory: () => new UnprocessableEntityException(),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());

  return app;
}
