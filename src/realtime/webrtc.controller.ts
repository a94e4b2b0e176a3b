// src/realtime/webrtc.controller.ts

import { Body, Controller, Get, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { Principal } from '../auth/auth.types';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import { HttpAuthGuard } from '../auth/http-auth.guard';
import { ok } from '../common/error-envelope';
import type { AppConfig } from '../config/configuration';
import { RateLimitService } from '../infra/rate-limit/rate-limit.service';
import { toIceServers } from './realtime.types';
import { SignalingRelayService } from './signaling-relay.service';
import { WebRtcAnswerDto, WebRtcIceDto, WebRtcOfferDto } from './webrtc.dto';

/** The relay over plain HTTP, for clients that post signaling instead of holding a socket. */
@Controller('api/webrtc')
@UseGuards(HttpAuthGuard)
export class WebRtcController {
  constructor(
    private readonly relay: SignalingRelayService,
    private readonly rate: RateLimitService,
    private readonly config: ConfigService<AppConfig, true>,
  ) {}

  @Post('offer')
  @HttpCode(200)
  async offer(@CurrentPrincipal() me: Principal, @Body() body: WebRtcOfferDto) {
    this.rate.assert(me.userId, 'signal');
    const res = await this.relay.offer(me, { callee: body.callee_id, payload: body.offer, kind: body.call_type });
    return ok(res);
  }

  @Post('answer')
  @HttpCode(200)
  async answer(@CurrentPrincipal() me: Principal, @Body() body: WebRtcAnswerDto) {
    this.rate.assert(me.userId, 'signal');
    return ok(await this.relay.answer(me, { callId: body.call_id, payload: body.answer }));
  }

  @Post('ice-candidate')
  @HttpCode(200)
  async iceCandidate(@CurrentPrincipal() me: Principal, @Body() body: WebRtcIceDto) {
    this.rate.assert(me.userId, 'signal');
    const res = await this.relay.iceCandidate(me, {
      callId: body.call_id,
      target: body.target_user_id,
      payload: body.candidate,
    });
    return ok(res);
  }

  @Get('ice-servers')
  iceServers() {
    return ok({ ice_servers: toIceServers(this.config.get('webrtc', { infer: true }).iceServers) });
  }
}
