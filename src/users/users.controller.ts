// src/users/users.controller.ts

import { Body, Controller, Get, HttpCode, Param, Post, UseGuards } from '@nestjs/common';

import { HttpAuthGuard } from '../auth/http-auth.guard';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import type { Principal } from '../auth/auth.types';
import { ok } from '../common/error-envelope';
import { NotFoundError } from '../common/errors';
import { EVT } from '../realtime/realtime.types';
import { UserChannelRegistry } from '../realtime/user-channel.registry';
import { Roles } from './roles.decorator';
import { RolesGuard } from './roles.guard';
import {
  AddUserDto,
  UpdateProfileDto,
  UpdateStatusDto,
  UpdateUserDto,
  UpdateUserStatusDto,
  UserIdDto,
} from './users.dto';
import { UsersService, UserView } from './users.service';

@Controller('api')
@UseGuards(HttpAuthGuard, RolesGuard)
export class UsersController {
  constructor(
    private readonly users: UsersService,
    private readonly channels: UserChannelRegistry,
  ) {}

  @Get('user/:id')
  async getUser(@Param('id') id: string) {
    return ok({ user: await this.users.getById(id) });
  }

  @Post('add-user')
  @HttpCode(201)
  @Roles('Admin')
  async addUser(@Body() body: AddUserDto) {
    const user = await this.users.create({
      username: body.username,
      email: body.email,
      fullName: body.full_name,
      password: body.password,
      role: body.role,
      phoneNumber: body.phone_number,
      extension: body.extension,
    });
    return ok({ message: 'User created successfully', user });
  }

  @Post('update-user')
  @HttpCode(200)
  @Roles('Admin')
  async updateUser(@Body() body: UpdateUserDto) {
    const user = await this.users.update(body.user_id, {
      email: body.email,
      fullName: body.full_name,
      phoneNumber: body.phone_number,
      extension: body.extension,
      role: body.role,
      isActive: body.is_active,
    });
    return ok({ message: 'User updated successfully', user });
  }

  @Post('toggle-user-status')
  @HttpCode(200)
  @Roles('Admin')
  async toggleUserStatus(@Body() body: UserIdDto) {
    const user = await this.users.toggleActive(body.user_id);
    return ok({ is_active: user.is_active });
  }

  @Post('delete-user')
  @HttpCode(200)
  @Roles('Admin')
  async deleteUser(@CurrentPrincipal() me: Principal, @Body() body: UserIdDto) {
    await this.users.remove(me.userId, body.user_id);
    return ok({ message: 'User deleted successfully' });
  }

  @Post('update-status')
  @HttpCode(200)
  async updateStatus(@CurrentPrincipal() me: Principal, @Body() body: UpdateStatusDto) {
    const user = await this.users.setStatus(me.userId, body.status);
    this.announceStatus(user);
    return ok({ status: user.status });
  }

  @Post('update-user-status')
  @HttpCode(200)
  @Roles('Admin')
  async updateUserStatus(@Body() body: UpdateUserStatusDto) {
    const user = await this.users.setStatus(body.user_id, body.status);
    this.announceStatus(user);
    return ok({ status: user.status });
  }

  @Post('update-profile')
  @HttpCode(200)
  async updateProfile(@CurrentPrincipal() me: Principal, @Body() body: UpdateProfileDto) {
    const user = await this.users.updateProfileField(me.userId, body.field, body.value);
    return ok({ user });
  }

  @Post('heartbeat')
  @HttpCode(200)
  async heartbeat(@CurrentPrincipal() me: Principal) {
    const user = await this.users.touch(me.userId);
    if (!user) throw new NotFoundError('User not found');
    return ok({ last_seen: user.last_seen });
  }

  @Get('online-users')
  async onlineUsers(@CurrentPrincipal() me: Principal) {
    return ok({ users: await this.users.onlineUsers(me.userId) });
  }

  private announceStatus(user: UserView) {
    this.channels.broadcast(EVT.USER_STATUS_UPDATE, {
      user_id: user.id,
      username: user.username,
      status: user.status,
    });
  }
}
