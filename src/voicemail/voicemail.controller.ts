// src/voicemail/voicemail.controller.ts

import { Body, Controller, Get, HttpCode, Post, UseGuards } from '@nestjs/common';

import type { Principal } from '../auth/auth.types';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import { HttpAuthGuard } from '../auth/http-auth.guard';
import { ok } from '../common/error-envelope';
import { VoicemailIdDto, VoicemailSettingsDto } from './voicemail.dto';
import { VoicemailService } from './voicemail.service';

@Controller('api')
@UseGuards(HttpAuthGuard)
export class VoicemailController {
  constructor(private readonly voicemails: VoicemailService) {}

  @Get('voicemails')
  async list(@CurrentPrincipal() me: Principal) {
    return ok({ voicemails: await this.voicemails.listFor(me.userId) });
  }

  @Post('mark-voicemail-read')
  @HttpCode(200)
  async markRead(@CurrentPrincipal() me: Principal, @Body() body: VoicemailIdDto) {
    await this.voicemails.markRead(me.userId, body.voicemail_id);
    return ok();
  }

  @Post('delete-voicemail')
  @HttpCode(200)
  async remove(@CurrentPrincipal() me: Principal, @Body() body: VoicemailIdDto) {
    await this.voicemails.remove(me.userId, body.voicemail_id);
    return ok({ message: 'Voicemail deleted' });
  }

  @Get('voicemail-settings')
  async settings(@CurrentPrincipal() me: Principal) {
    return ok({ settings: await this.voicemails.settingsFor(me.userId) });
  }

  @Post('voicemail-settings')
  @HttpCode(200)
  async saveSettings(@CurrentPrincipal() me: Principal, @Body() body: VoicemailSettingsDto) {
    const settings = await this.voicemails.saveSettings(me.userId, {
      enabled: body.enabled,
      greetingUrl: body.greeting_url,
      maxDuration: body.max_duration,
    });
    return ok({ message: 'Voicemail settings saved successfully', settings });
  }
}
