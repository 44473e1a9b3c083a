import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { MongodbService } from '../mongodb/mongodb.service';
import { HealthController } from './health.controller';
import { HealthProbe } from './health.probe';
import { HealthService } from './health.service';
import { HEALTH_DEPENDENCIES, type HealthDependency } from './health.types';

@Module({
  imports: [MongodbModule],
  controllers: [HealthController],
  providers: [
    HealthProbe,
    HealthService,
    {
      provide: HEALTH_DEPENDENCIES,
      useFactory: (mongo: MongodbService): HealthDependency[] => [
        { name: 'database', check: () => mongo.ping() },
      ],
      inject: [MongodbService],
    },
  ],
})
export class HealthModule {}
