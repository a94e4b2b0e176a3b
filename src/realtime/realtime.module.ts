// src/realtime/realtime.module.ts

import { Module } from '@nestjs/common';

import { AuthModule } from '../auth/auth.module';
import { CallsModule } from '../calls/calls.module';
import { UsersModule } from '../users/users.module';
import { VoicemailModule } from '../voicemail/voicemail.module';
import { CallControlController } from './call-control.controller';
import { RealtimeInternalController } from './internal.controller';
import { RelayGateway } from './relay.gateway';
import { SignalingRelayService } from './signaling-relay.service';
import { WebRtcController } from './webrtc.controller';

@Module({
  imports: [AuthModule, CallsModule, UsersModule, VoicemailModule],
  controllers: [CallControlController, WebRtcController, RealtimeInternalController],
  providers: [SignalingRelayService, RelayGateway],
  exports: [SignalingRelayService],
})
export class RealtimeModule {}
