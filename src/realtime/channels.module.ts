// src/realtime/channels.module.ts

import { Global, Module } from '@nestjs/common';
import { UserChannelRegistry } from './user-channel.registry';

@Global()
@Module({
  providers: [UserChannelRegistry],
  exports: [UserChannelRegistry],
})
export class ChannelsModule {}
