// src/voicemail/voicemail.module.ts

import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { AuthModule } from '../auth/auth.module';
import { VoicemailController } from './voicemail.controller';
import { VoicemailSettings, VoicemailSettingsSchema } from './voicemail-settings.schema';
import { Voicemail, VoicemailSchema } from './voicemail.schema';
import { VoicemailService } from './voicemail.service';

@Module({
  imports: [
    AuthModule,
    MongooseModule.forFeature([
      { name: Voicemail.name, schema: VoicemailSchema },
      { name: VoicemailSettings.name, schema: VoicemailSettingsSchema },
    ]),
  ],
  controllers: [VoicemailController],
  providers: [VoicemailService],
  exports: [VoicemailService],
})
export class VoicemailModule {}
