// src/admin/admin.module.ts

import { Module } from '@nestjs/common';

import { AuthModule } from '../auth/auth.module';
import { CallsModule } from '../calls/calls.module';
import { ChatModule } from '../chat/chat.module';
import { ContactsModule } from '../contacts/contacts.module';
import { UsersModule } from '../users/users.module';
import { VoicemailModule } from '../voicemail/voicemail.module';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';

@Module({
  imports: [AuthModule, UsersModule, CallsModule, VoicemailModule, ChatModule, ContactsModule],
  controllers: [AdminController],
  providers: [AdminService],
})
export class AdminModule {}
