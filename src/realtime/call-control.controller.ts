// src/realtime/call-control.controller.ts

import { Body, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';

import type { Principal } from '../auth/auth.types';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import { HttpAuthGuard } from '../auth/http-auth.guard';
import { toCallView } from '../calls/call-record';
import { CallIdDto, EndCallDto, InitiateCallDto } from '../calls/calls.dto';
import { CallsService } from '../calls/calls.service';
import { ok } from '../common/error-envelope';
import { RateLimitService } from '../infra/rate-limit/rate-limit.service';
import { SignalingRelayService } from './signaling-relay.service';

/** HTTP call control. Same record changes and notifications as the socket relay. */
@Controller('api')
@UseGuards(HttpAuthGuard)
export class CallControlController {
  constructor(
    private readonly calls: CallsService,
    private readonly relay: SignalingRelayService,
    private readonly rate: RateLimitService,
  ) {}

  @Post('initiate-call')
  @HttpCode(200)
  async initiate(@CurrentPrincipal() me: Principal, @Body() body: InitiateCallDto) {
    this.rate.assert(me.userId, 'call');
    const created = await this.calls.create(me.userId, { calleeId: body.callee_id }, body.call_type ?? 'voice');
    await this.relay.announceIncomingCall(created, me);

    const call = await this.calls.getById(created.callId);
    return ok({ call_id: call.callId, call: toCallView(call) });
  }

  @Post('answer-call')
  @HttpCode(200)
  async answer(@CurrentPrincipal() me: Principal, @Body() body: CallIdDto) {
    return ok(await this.relay.answerCall(me, { callId: body.call_id }));
  }

  @Post('end-call')
  @HttpCode(200)
  async end(@CurrentPrincipal() me: Principal, @Body() body: EndCallDto) {
    return ok(await this.relay.endCall(me, { callId: body.call_id, reason: body.reason }));
  }
}
