import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { SecurityModule } from '../security/security.module';
import { UsersController } from './users.controller';
import { UsersRepository } from './users.repository';
import { UsersService } from './users.service';

@Module({
  imports: [MongodbModule, SecurityModule],
  controllers: [UsersController],
  providers: [UsersRepository, UsersService],
  exports: [UsersService],
})
export class UsersModule {}
