// src/admin/admin.controller.ts

import { Controller, Get, Param, Query, UseGuards } from '@nestjs/common';

import { HttpAuthGuard } from '../auth/http-auth.guard';
import { ListCallsQueryDto } from '../calls/calls.dto';
import { ok } from '../common/error-envelope';
import { Roles } from '../users/roles.decorator';
import { RolesGuard } from '../users/roles.guard';
import { AdminService } from './admin.service';

@Controller('api')
@UseGuards(HttpAuthGuard, RolesGuard)
@Roles('Admin')
export class AdminController {
  constructor(private readonly admin: AdminService) {}

  @Get('admin/dashboard')
  async dashboard() {
    return ok({ stats: await this.admin.dashboard() });
  }

  @Get('admin/calls')
  async calls(@Query() q: ListCallsQueryDto) {
    return ok({ calls: await this.admin.monitorCalls(q) });
  }

  @Get('user/:id/details')
  async userDetails(@Param('id') id: string) {
    return ok({ user: await this.admin.userDetails(id) });
  }
}
