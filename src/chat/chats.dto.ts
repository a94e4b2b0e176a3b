// src/chat/chats.dto.ts

import { Transform } from 'class-transformer';
import { ArrayMaxSize, IsArray, IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

import { CHAT_TYPES, ChatType } from './chat.schema';
import { MESSAGE_TYPES, MessageType } from './message.schema';

export class CreateChatDto {
  @Transform(({ value }: { value: unknown }) =>
    Array.isArray(value) ? value.map((v) => (typeof v === 'number' ? String(v) : v)) : value,
  )
  @IsArray({ message: 'participant_ids must be a list' })
  @ArrayMaxSize(100)
  @IsString({ each: true })
  participant_ids!: string[];

  @IsOptional()
  @IsIn(CHAT_TYPES, { message: 'Invalid chat type' })
  chat_type?: ChatType;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  name?: string;
}

export class SendMessageDto {
  @IsString({ message: 'Chat ID and content required' })
  @IsNotEmpty({ message: 'Chat ID and content required' })
  chat_id!: string;

  @IsString({ message: 'Chat ID and content required' })
  @IsNotEmpty({ message: 'Chat ID and content required' })
  @MaxLength(10_000)
  content!: string;

  @IsOptional()
  @IsIn(MESSAGE_TYPES, { message: 'Invalid message type' })
  message_type?: MessageType;

  @IsOptional()
  @IsString()
  file_url?: string;
}
