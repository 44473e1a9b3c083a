import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { UsersModule } from '../users/users.module';
import { HivesController } from './hives.controller';
import { HivesService } from './hives.service';
import { HIVE_REPOSITORY, MongoHiveRepository } from './hives.repository';

@Module({
  imports: [MongodbModule, UsersModule],
  controllers: [HivesController],
  providers: [
    HivesService,
    { provide: HIVE_REPOSITORY, useClass: MongoHiveRepository },
  ],
  exports: [HivesService, HIVE_REPOSITORY],
})
export class HivesModule {}
