import { Module } from '@nestjs/common';
import { AppConfigModule } from './config/config.module';
import { MongodbModule } from './modules/mongodb/mongodb.module';
import { UsersModule } from './modules/users/users.module';
import { HivesModule } from './modules/hives/hives.module';
import { InspectionsModule } from './modules/inspections/inspections.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [
    AppConfigModule,
    MongodbModule,
    UsersModule,
    HivesModule,
    InspectionsModule,
    HealthModule,
  ],
})
export class AppModule {}
