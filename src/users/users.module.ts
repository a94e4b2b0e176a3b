// src/users/users.module.ts

import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { AuthModule } from '../auth/auth.module';
import { Role, RoleSchema } from './role.schema';
import { RolesGuard } from './roles.guard';
import { UserDirectory } from './user-directory';
import { User, UserSchema } from './user.schema';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';

@Module({
  imports: [
    AuthModule,
    MongooseModule.forFeature([
      { name: User.name, schema: UserSchema },
      { name: Role.name, schema: RoleSchema },
    ]),
  ],
  controllers: [UsersController],
  providers: [UsersService, { provide: UserDirectory, useExisting: UsersService }, RolesGuard],
  exports: [UsersService, UserDirectory, RolesGuard],
})
export class UsersModule {}
