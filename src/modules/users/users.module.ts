import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';
import { MongoUserRepository, USER_REPOSITORY } from './users.repository';

@Module({
  imports: [MongodbModule],
  controllers: [UsersController],
  providers: [
    UsersService,
    { provide: USER_REPOSITORY, useClass: MongoUserRepository },
  ],
  exports: [UsersService, USER_REPOSITORY],
})
export class UsersModule {}
