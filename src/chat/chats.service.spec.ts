import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { Types } from 'mongoose';

import { NotFoundError, UnauthorizedError, ValidationError } from '../common/errors';
import { EVT } from '../realtime/realtime.types';
import { UserChannelRegistry } from '../realtime/user-channel.registry';
import { FakeSession, FakeUserDirectory } from '../testing/fakes';
import { UserDirectory } from '../users/user-directory';
import { Chat } from './chat.schema';
import { ChatsService } from './chats.service';
import { Message } from './message.schema';

const CHAT_ID = new Types.ObjectId('65b000000000000000000001');
const MESSAGE_ID = new Types.ObjectId('65c000000000000000000001');
const SENT_AT = new Date('2026-01-01T00:00:00.000Z');

const groupChat = {
  _id: CHAT_ID,
  name: 'Support',
  chatType: 'group' as const,
  createdBy: 'u1',
  participantIds: ['u1', 'u2', 'u3'],
  isActive: true,
};

function query<T>(value: T) {
  const exec = async () => value;
  return { exec, lean: () => ({ exec }) };
}

function created<T extends object>(row: T) {
  return { id: 'generated', toObject: () => row };
}

describe('ChatsService', () => {
  let service: ChatsService;
  let channels: UserChannelRegistry;
  let chats: {
    create: jest.Mock<ReturnType<typeof created>, [Record<string, unknown>]>;
    findById: jest.Mock<ReturnType<typeof query>, [string]>;
    updateOne: jest.Mock<ReturnType<typeof query>, [object, object]>;
  };
  let messages: { create: jest.Mock<ReturnType<typeof created>, [Record<string, unknown>]> };

  beforeEach(async () => {
    channels = new UserChannelRegistry();
    chats = {
      create: jest.fn<ReturnType<typeof created>, [Record<string, unknown>]>((doc) =>
        created({ _id: CHAT_ID, ...doc }),
      ),
      findById: jest.fn<ReturnType<typeof query>, [string]>().mockReturnValue(query(groupChat)),
      updateOne: jest.fn<ReturnType<typeof query>, [object, object]>().mockReturnValue(query({})),
    };
    messages = {
      create: jest.fn<ReturnType<typeof created>, [Record<string, unknown>]>((doc) =>
        created({ _id: MESSAGE_ID, createdAt: SENT_AT, ...doc }),
      ),
    };

    const moduleRef = await Test.createTestingModule({
      providers: [
        ChatsService,
        { provide: getModelToken(Chat.name), useValue: chats },
        { provide: getModelToken(Message.name), useValue: messages },
        { provide: UserDirectory, useValue: new FakeUserDirectory().add('u1').add('u2').add('u3') },
        { provide: UserChannelRegistry, useValue: channels },
      ],
    }).compile();
    service = moduleRef.get(ChatsService);
  });

  describe('create', () => {
    it('opens a direct chat with the creator listed first', async () => {
      const view = await service.create('u1', { participantIds: ['u2', 'u1', 'u2'] });

      expect(chats.create).toHaveBeenCalledWith({
        name: '',
        chatType: 'direct',
        createdBy: 'u1',
        participantIds: ['u1', 'u2'],
        isActive: true,
      });
      expect(view.participants).toEqual([
        { id: 'u1', name: 'User u1' },
        { id: 'u2', name: 'User u2' },
      ]);
    });

    it('needs exactly one other party for a direct chat', async () => {
      await expect(service.create('u1', { participantIds: ['u1'] })).rejects.toThrow(
        new ValidationError('Direct chat requires exactly one participant'),
      );
      await expect(service.create('u1', { participantIds: ['u2', 'u3'] })).rejects.toThrow(
        'Direct chat requires exactly one participant',
      );
    });

    it('refuses an unknown participant', async () => {
      await expect(service.create('u1', { participantIds: ['u2', 'ghost'], chatType: 'group' })).rejects.toThrow(
        new NotFoundError('User not found'),
      );
      expect(chats.create).not.toHaveBeenCalled();
    });
  });

  describe('send', () => {
    it('stores the message and pushes it to the other participants only', async () => {
      const own = new FakeSession('s1');
      const bob = new FakeSession('s2');
      channels.attach('u1', own);
      channels.attach('u2', bob);

      const view = await service.send('u1', { chatId: CHAT_ID.toHexString(), content: '  hello  ' });

      expect(view).toEqual({
        id: MESSAGE_ID.toHexString(),
        chat_id: CHAT_ID.toHexString(),
        content: 'hello',
        message_type: 'text',
        file_url: null,
        sender: { id: 'u1', name: 'User u1', username: 'useru1' },
        created_at: '2026-01-01T00:00:00.000Z',
      });
      expect(bob.payloadsOf(EVT.NEW_MESSAGE)).toEqual([{ chat_id: CHAT_ID.toHexString(), message: view }]);
      expect(own.received).toEqual([]);
      expect(chats.updateOne).toHaveBeenCalledWith({ _id: CHAT_ID }, { $set: { updatedAt: expect.any(Date) } });
    });

    it('refuses a sender outside the chat', async () => {
      await expect(service.send('u4', { chatId: CHAT_ID.toHexString(), content: 'hi' })).rejects.toThrow(
        new UnauthorizedError('Not authorized to send message to this chat'),
      );
      expect(messages.create).not.toHaveBeenCalled();
    });

    it('refuses an empty message', async () => {
      await expect(service.send('u1', { chatId: CHAT_ID.toHexString(), content: '   ' })).rejects.toThrow(
        'Message content required',
      );
    });

    it('reports a missing chat', async () => {
      chats.findById.mockReturnValueOnce(query(null));
      await expect(service.send('u1', { chatId: CHAT_ID.toHexString(), content: 'hi' })).rejects.toThrow(
        'Chat not found',
      );
      await expect(service.send('u1', { chatId: 'nope', content: 'hi' })).rejects.toThrow('Chat not found');
    });
  });

  it('only lets participants read the history', async () => {
    await expect(service.messagesOf(CHAT_ID.toHexString(), 'u4')).rejects.toThrow('Not authorized to view this chat');
  });
});
