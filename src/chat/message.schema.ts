// src/chat/message.schema.ts

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export const MESSAGE_TYPES = ['text', 'file', 'image', 'audio'] as const;
export type MessageType = (typeof MESSAGE_TYPES)[number];

export type MessageDocument = HydratedDocument<Message>;

@Schema({ collection: 'messages', timestamps: { createdAt: true, updatedAt: false } })
export class Message {
  @Prop({ type: String, required: true, index: true })
  chatId!: string;

  @Prop({ type: String, required: true, index: true })
  senderId!: string;

  @Prop({ type: String, required: true })
  content!: string;

  @Prop({ type: String, enum: MESSAGE_TYPES, default: 'text' })
  messageType!: MessageType;

  @Prop({ type: String, default: null })
  fileUrl?: string | null;

  @Prop({ type: Boolean, default: false })
  isRead!: boolean;

  createdAt?: Date;
}

export const MessageSchema = SchemaFactory.createForClass(Message);

MessageSchema.index({ chatId: 1, createdAt: 1 });
