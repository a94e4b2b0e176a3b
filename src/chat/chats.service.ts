// src/chat/chats.service.ts

import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model, Types } from 'mongoose';

import { NotFoundError, UnauthorizedError, ValidationError } from '../common/errors';
import { EVT } from '../realtime/realtime.types';
import { UserChannelRegistry } from '../realtime/user-channel.registry';
import { PublicProfile, UserDirectory } from '../users/user-directory';
import { Chat, ChatDocument, ChatType } from './chat.schema';
import { Message, MessageDocument, MessageType } from './message.schema';

type ChatRow = Chat & { _id: Types.ObjectId };
type MessageRow = Message & { _id: Types.ObjectId };

export type ChatView = {
  id: string;
  name: string;
  chat_type: ChatType;
  created_by: string;
  participants: { id: string; name: string }[];
  updated_at: string | null;
};

export type MessageView = {
  id: string;
  chat_id: string;
  content: string;
  message_type: MessageType;
  file_url: string | null;
  sender: { id: string; name: string; username: string };
  created_at: string | null;
};

function toMessageView(m: MessageRow, sender: PublicProfile | null): MessageView {
  return {
    id: m._id.toHexString(),
    chat_id: m.chatId,
    content: m.content,
    message_type: m.messageType,
    file_url: m.fileUrl ?? null,
    sender: { id: m.senderId, name: sender?.name ?? '', username: sender?.username ?? '' },
    created_at: m.createdAt ? m.createdAt.toISOString() : null,
  };
}

@Injectable()
export class ChatsService {
  private readonly logger = new Logger(ChatsService.name);

  constructor(
    @InjectModel(Chat.name) private readonly chats: Model<ChatDocument>,
    @InjectModel(Message.name) private readonly messages: Model<MessageDocument>,
    private readonly users: UserDirectory,
    private readonly channels: UserChannelRegistry,
  ) {}

  async create(
    creatorId: string,
    input: { participantIds: string[]; chatType?: ChatType; name?: string },
  ): Promise<ChatView> {
    const chatType = input.chatType ?? 'direct';
    const others = [...new Set(input.participantIds.map((id) => id.trim()).filter((id) => id && id !== creatorId))];

    if (chatType === 'direct' && others.length !== 1) {
      throw new ValidationError('Direct chat requires exactly one participant');
    }
    if (!others.length) throw new ValidationError('A chat needs at least one other participant');

    const profiles = await this.profilesOf([creatorId, ...others]);
    for (const id of others) {
      if (!profiles.has(id)) throw new NotFoundError('User not found');
    }

    const doc = await this.chats.create({
      name: input.name?.trim() ?? '',
      chatType,
      createdBy: creatorId,
      participantIds: [creatorId, ...others],
      isActive: true,
    });
    this.logger.log(`chat ${doc.id} (${chatType}) created by=${creatorId} participants=${others.length + 1}`);
    return this.toChatView(doc.toObject(), profiles);
  }

  async listFor(userId: string): Promise<ChatView[]> {
    const rows = await this.chats
      .find({ participantIds: userId, isActive: true })
      .sort({ updatedAt: -1 })
      .lean<ChatRow[]>()
      .exec();

    const profiles = await this.profilesOf(rows.flatMap((c) => c.participantIds));
    return rows.map((c) => this.toChatView(c, profiles));
  }

  async send(
    senderId: string,
    input: { chatId: string; content: string; messageType?: MessageType; fileUrl?: string },
  ): Promise<MessageView> {
    const chat = await this.chatForParticipant(input.chatId, senderId, 'Not authorized to send message to this chat');

    const content = input.content.trim();
    if (!content) throw new ValidationError('Message content required');

    const doc = await this.messages.create({
      chatId: input.chatId,
      senderId,
      content,
      messageType: input.messageType ?? 'text',
      fileUrl: input.fileUrl ?? null,
    });
    await this.chats.updateOne({ _id: chat._id }, { $set: { updatedAt: new Date() } }).exec();

    const view = toMessageView(doc.toObject(), await this.users.findProfile(senderId));

    let delivered = 0;
    for (const participantId of chat.participantIds) {
      if (participantId === senderId) continue;
      delivered += this.channels.deliver(participantId, EVT.NEW_MESSAGE, { chat_id: input.chatId, message: view });
    }
    this.logger.debug(`message ${view.id} in chat ${input.chatId} delivered to ${delivered} session(s)`);
    return view;
  }

  /** Oldest first, the order a conversation is read in. */
  async messagesOf(chatId: string, userId: string, opts: { limit?: number } = {}): Promise<MessageView[]> {
    await this.chatForParticipant(chatId, userId, 'Not authorized to view this chat');

    const rows = await this.messages
      .find({ chatId })
      .sort({ createdAt: 1 })
      .limit(Math.min(Math.max(opts.limit ?? 200, 1), 500))
      .lean<MessageRow[]>()
      .exec();

    const senders = await this.profilesOf(rows.map((m) => m.senderId));
    return rows.map((m) => toMessageView(m, senders.get(m.senderId) ?? null));
  }

  countBySender(senderId: string): Promise<number> {
    return this.messages.countDocuments({ senderId }).exec();
  }

  private async chatForParticipant(chatId: string, userId: string, denied: string): Promise<ChatRow> {
    const chat = isValidObjectId(chatId) ? await this.chats.findById(chatId).lean<ChatRow>().exec() : null;
    if (!chat) throw new NotFoundError('Chat not found');
    if (!chat.participantIds.includes(userId)) throw new UnauthorizedError(denied);
    return chat;
  }

  private async profilesOf(ids: string[]): Promise<Map<string, PublicProfile>> {
    const unique = [...new Set(ids)];
    const found = await Promise.all(unique.map((id) => this.users.findProfile(id)));
    const out = new Map<string, PublicProfile>();
    for (const p of found) if (p) out.set(p.id, p);
    return out;
  }

  private toChatView(c: ChatRow, profiles: Map<string, PublicProfile>): ChatView {
    return {
      id: c._id.toHexString(),
      name: c.name,
      chat_type: c.chatType,
      created_by: c.createdBy,
      participants: c.participantIds.map((id) => ({ id, name: profiles.get(id)?.name ?? '' })),
      updated_at: c.updatedAt ? c.updatedAt.toISOString() : null,
    };
  }
}
