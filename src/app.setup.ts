import {
  RequestMethod,
  ValidationPipe,
  type INestApplication,
} from '@nestjs/common';
import { ValidationHttpException } from './lib/errors/ValidationHttpException';

export const API_PREFIX = 'api';

/**
 * Prefix and global pipes, shared by main.ts and the e2e suites so both
 * serve the same routes with the same validation.
 */
export function configureApp(app: INestApplication): INestApplication {
  app.setGlobalPrefix(API_PREFIX, {
    exclude: [
      { path: 'health/live', method: RequestMethod.GET },
      { path: 'health/ready', method: RequestMethod.GET },
    ],
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
      exceptionFactory: (errors) =>
        ValidationHttpException.fromValidationErrors(errors),
    }),
  );

  return app;
}
