import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_CONFIG, type AppConfig } from './config/app.config';

type CorsOriginCallback = (err: Error | null, allow?: boolean) => void;

// http(s)://localhost:<any>, 127.0.0.1 and [::1]
const LOCALHOST_ORIGIN = /^https?:\/\/(localhost|\[::1\]|127\.0\.0\.1)(:\d+)?$/;

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    cors: false,
    bufferLogs: true,
  });
  const config = app.get<AppConfig>(APP_CONFIG);
  app.useLogger([...config.logLevels]);
  app.enableShutdownHooks();

  app.enableCors({
    origin(origin: string | undefined, cb: CorsOriginCallback): void {
      // No Origin: curl and server-to-server callers
      if (origin == null || LOCALHOST_ORIGIN.test(origin)) {
        cb(null, true);
        return;
      }
      cb(new Error(`CORS: origin not allowed: ${origin}`));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: false,
    maxAge: 86_400,
  });

  configureApp(app);

  await app.listen(config.port, config.host);
  Logger.log(
    `${config.serviceName} (${config.env}) listening on http://${config.host}:${config.port}`,
    'Bootstrap',
  );
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    'Failed to start',
    err instanceof Error ? err.stack : String(err),
    'Bootstrap',
  );
  process.exit(1);
});
