// src/chat/chat.schema.ts

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export const CHAT_TYPES = ['direct', 'group'] as const;
export type ChatType = (typeof CHAT_TYPES)[number];

export type ChatDocument = HydratedDocument<Chat>;

@Schema({ collection: 'chats', timestamps: true })
export class Chat {
  @Prop({ type: String, default: '' })
  name!: string;

  @Prop({ type: String, enum: CHAT_TYPES, default: 'direct' })
  chatType!: ChatType;

  @Prop({ type: String, required: true })
  createdBy!: string;

  @Prop({ type: [String], required: true, index: true })
  participantIds!: string[];

  @Prop({ type: Boolean, default: true })
  isActive!: boolean;

  createdAt?: Date;
  updatedAt?: Date;
}

export const ChatSchema = SchemaFactory.createForClass(Chat);

ChatSchema.index({ participantIds: 1, updatedAt: -1 });
