import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { HivesModule } from '../hives/hives.module';
import { InspectionsController } from './inspections.controller';
import { InspectionsService } from './inspections.service';
import {
  INSPECTION_REPOSITORY,
  MongoInspectionRepository,
} from './inspections.repository';

@Module({
  imports: [MongodbModule, HivesModule],
  controllers: [InspectionsController],
  providers: [
    InspectionsService,
    { provide: INSPECTION_REPOSITORY, useClass: MongoInspectionRepository },
  ],
  exports: [InspectionsService],
})
export class InspectionsModule {}
