// src/chat/chats.controller.ts

import { Body, Controller, Get, HttpCode, Param, Post, UseGuards } from '@nestjs/common';

import type { Principal } from '../auth/auth.types';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import { HttpAuthGuard } from '../auth/http-auth.guard';
import { ok } from '../common/error-envelope';
import { RateLimitService } from '../infra/rate-limit/rate-limit.service';
import { CreateChatDto, SendMessageDto } from './chats.dto';
import { ChatsService } from './chats.service';

@Controller('api')
@UseGuards(HttpAuthGuard)
export class ChatsController {
  constructor(
    private readonly chats: ChatsService,
    private readonly rate: RateLimitService,
  ) {}

  @Post('create-chat')
  @HttpCode(201)
  async create(@CurrentPrincipal() me: Principal, @Body() body: CreateChatDto) {
    const chat = await this.chats.create(me.userId, {
      participantIds: body.participant_ids,
      chatType: body.chat_type,
      name: body.name,
    });
    return ok({ chat });
  }

  @Post('send-message')
  @HttpCode(200)
  async send(@CurrentPrincipal() me: Principal, @Body() body: SendMessageDto) {
    this.rate.assert(me.userId, 'message');
    const message = await this.chats.send(me.userId, {
      chatId: body.chat_id,
      content: body.content,
      messageType: body.message_type,
      fileUrl: body.file_url,
    });
    return ok({ message_id: message.id, message });
  }

  @Get('chats')
  async list(@CurrentPrincipal() me: Principal) {
    return ok({ chats: await this.chats.listFor(me.userId) });
  }

  @Get('chats/:chatId/messages')
  async messages(@CurrentPrincipal() me: Principal, @Param('chatId') chatId: string) {
    return ok({ messages: await this.chats.messagesOf(chatId, me.userId) });
  }
}
