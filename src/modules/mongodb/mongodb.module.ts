import { Module } from '@nestjs/common';
import { MongodbService } from './mongodb.service';

/**
 * Internal-only MongoDB module: a thin bridge to the native driver.
 * No controllers; repositories in the entity modules consume the service.
 */
@Module({
  providers: [MongodbService],
  exports: [MongodbService],
})
export class MongodbModule {}
