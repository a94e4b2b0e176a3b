// src/realtime/internal.controller.ts

import { Body, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';

import { InternalAuthGuard } from '../auth/internal-auth.guard';
import { ok } from '../common/error-envelope';
import { DepositVoicemailDto } from '../voicemail/voicemail.dto';
import { VoicemailService } from '../voicemail/voicemail.service';
import { UserChannelRegistry } from './user-channel.registry';
import { NotifyDto } from './webrtc.dto';

/** Hooks for trusted back-office services; guarded by the shared internal secret. */
@Controller('internal')
@UseGuards(InternalAuthGuard)
export class RealtimeInternalController {
  constructor(
    private readonly voicemails: VoicemailService,
    private readonly channels: UserChannelRegistry,
  ) {}

  @Post('voicemails')
  @HttpCode(201)
  async depositVoicemail(@Body() body: DepositVoicemailDto) {
    const voicemail = await this.voicemails.deposit({
      recipientId: body.recipient_id,
      callerNumber: body.caller_number,
      callerName: body.caller_name,
      audioUrl: body.audio_url,
      duration: body.duration,
    });
    return ok({ voicemail });
  }

  @Post('notify')
  @HttpCode(200)
  notify(@Body() body: NotifyDto) {
    let delivered = 0;
    for (const userId of new Set(body.user_ids)) {
      delivered += this.channels.deliver(userId, body.event, body.payload ?? {});
    }
    return ok({ delivered });
  }
}
