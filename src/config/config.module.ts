import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_CONFIG, loadAppConfig } from './app.config';
import { CLOCK, systemClock } from '../lib/time/clock';

/**
 * Global runtime settings: the AppConfig built once at startup (after
 * `.env` is merged by @nestjs/config) and the wall clock.
 */
@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: APP_CONFIG,
      useFactory: (config: ConfigService) =>
        loadAppConfig((key) => config.get<string>(key)),
      inject: [ConfigService],
    },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [APP_CONFIG, CLOCK],
})
export class AppConfigModule {}
