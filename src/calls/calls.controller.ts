// src/calls/calls.controller.ts

import { Body, Controller, Get, HttpCode, Param, Post, Query, UseGuards } from '@nestjs/common';

import type { Principal } from '../auth/auth.types';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import { HttpAuthGuard } from '../auth/http-auth.guard';
import { ok } from '../common/error-envelope';
import { ValidationError } from '../common/errors';
import { RateLimitService } from '../infra/rate-limit/rate-limit.service';
import { Roles } from '../users/roles.decorator';
import { RolesGuard } from '../users/roles.guard';
import { toCallView } from './call-record';
import {
  CallIdDto,
  ExternalCallDto,
  InternationalCallDto,
  ListCallsQueryDto,
  SendSmsDto,
  ValidatePhoneDto,
} from './calls.dto';
import { CallsService } from './calls.service';
import { ExternalCallsService } from './external-calls.service';
import { InternationalRatesService } from './international-rates.service';
import { validatePhoneNumber } from './phone-number';
import { SmsService } from './sms.service';

@Controller('api')
@UseGuards(HttpAuthGuard, RolesGuard)
export class CallsController {
  constructor(
    private readonly calls: CallsService,
    private readonly external: ExternalCallsService,
    private readonly rates: InternationalRatesService,
    private readonly sms: SmsService,
    private readonly rate: RateLimitService,
  ) {}

  @Get('calls')
  async history(@CurrentPrincipal() me: Principal, @Query() q: ListCallsQueryDto) {
    const rows = await this.calls.listForUser(me.userId, { limit: q.limit, before: q.before });
    return ok({ calls: rows.map(toCallView) });
  }

  @Get('calls/:callId')
  async getCall(@CurrentPrincipal() me: Principal, @Param('callId') callId: string) {
    const call = await this.calls.getForParty(callId, me.userId);
    return ok({ call: toCallView(call) });
  }

  @Post(['make-external-call', 'call-external'])
  @HttpCode(200)
  async makeExternalCall(@CurrentPrincipal() me: Principal, @Body() body: ExternalCallDto) {
    this.rate.assert(me.userId, 'call');
    const { call, callerNumber } = await this.external.dial(me.userId, body.phone_number, body.call_type);
    return ok({
      call_id: call.callId,
      status: call.status,
      caller_number: callerNumber,
      destination: call.destinationNumber,
      call: toCallView(call),
    });
  }

  @Post('make-international-call')
  @HttpCode(200)
  async makeInternationalCall(@CurrentPrincipal() me: Principal, @Body() body: InternationalCallDto) {
    this.rate.assert(me.userId, 'call');
    const call = await this.external.dialInternational(me.userId, body.destination);
    return ok({ call_id: call.callId, destination_country: call.destinationCountry, call: toCallView(call) });
  }

  @Post('send-sms')
  @HttpCode(200)
  async sendSms(@CurrentPrincipal() me: Principal, @Body() body: SendSmsDto) {
    this.rate.assert(me.userId, 'sms');
    const { smsId, to } = await this.sms.send(me.userId, body.phone_number, body.message);
    return ok({ message: `SMS sent to ${to}`, sms_id: smsId });
  }

  @Get('international-rates')
  async internationalRates() {
    return ok({ rates: await this.rates.listActive() });
  }

  @Post('validate-phone-number')
  @HttpCode(200)
  validatePhone(@Body() body: ValidatePhoneDto) {
    const res = validatePhoneNumber(body.phone_number);
    if (!res.valid) throw new ValidationError(res.error);
    return ok({ valid: true, clean_number: res.clean, formatted_number: res.formatted });
  }

  @Post('delete-call')
  @HttpCode(200)
  @Roles('Admin')
  async deleteCall(@Body() body: CallIdDto) {
    await this.calls.delete(body.call_id);
    return ok({ message: 'Call deleted successfully' });
  }
}
