import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { Types } from 'mongoose';

import { NotFoundError, ValidationError } from '../common/errors';
import { Query, query } from '../testing/fakes';
import { VoicemailSettings } from './voicemail-settings.schema';
import { Voicemail } from './voicemail.schema';
import { DEFAULT_VOICEMAIL_SETTINGS, VoicemailService } from './voicemail.service';

const VOICEMAIL_ID = new Types.ObjectId('65d000000000000000000001');
const LEFT_AT = new Date('2026-01-05T10:00:00.000Z');

type CreatedDoc = { id: string; toObject(): Record<string, unknown> };

describe('VoicemailService', () => {
  let service: VoicemailService;
  let voicemails: {
    create: jest.Mock<Promise<CreatedDoc>, [Record<string, unknown>]>;
    updateOne: jest.Mock<Query<unknown>, [object, object]>;
    deleteOne: jest.Mock<Query<unknown>, [object]>;
  };
  let settings: {
    findOne: jest.Mock<Query<unknown>, [object]>;
    findOneAndUpdate: jest.Mock<Query<unknown>, [object, object, object]>;
  };

  beforeEach(async () => {
    voicemails = {
      create: jest.fn<Promise<CreatedDoc>, [Record<string, unknown>]>(async (data) => {
        const row = { _id: VOICEMAIL_ID, isRead: false, isArchived: false, createdAt: LEFT_AT, ...data };
        return { id: VOICEMAIL_ID.toHexString(), toObject: () => row };
      }),
      updateOne: jest.fn<Query<unknown>, [object, object]>().mockReturnValue(query({ matchedCount: 0 })),
      deleteOne: jest.fn<Query<unknown>, [object]>().mockReturnValue(query({ deletedCount: 0 })),
    };
    settings = {
      findOne: jest.fn<Query<unknown>, [object]>().mockReturnValue(query(null)),
      findOneAndUpdate: jest.fn<Query<unknown>, [object, object, object]>().mockReturnValue(query(null)),
    };

    const moduleRef = await Test.createTestingModule({
      providers: [
        VoicemailService,
        { provide: getModelToken(Voicemail.name), useValue: voicemails },
        { provide: getModelToken(VoicemailSettings.name), useValue: settings },
      ],
    }).compile();
    service = moduleRef.get(VoicemailService);
  });

  it('treats another user voicemail as missing', async () => {
    await expect(service.markRead('u2', VOICEMAIL_ID.toHexString())).rejects.toThrow(
      new NotFoundError('Voicemail not found'),
    );
    expect(voicemails.updateOne).toHaveBeenCalledWith(
      { _id: VOICEMAIL_ID.toHexString(), recipientId: 'u2' },
      { $set: { isRead: true } },
    );

    await expect(service.remove('u2', VOICEMAIL_ID.toHexString())).rejects.toThrow(
      new NotFoundError('Voicemail not found'),
    );
  });

  it('does not query with a malformed id', async () => {
    await expect(service.markRead('u1', '42')).rejects.toThrow(NotFoundError);
    expect(voicemails.updateOne).not.toHaveBeenCalled();
  });

  it('marks an owned voicemail read', async () => {
    voicemails.updateOne.mockReturnValue(query({ matchedCount: 1 }));
    await expect(service.markRead('u1', VOICEMAIL_ID.toHexString())).resolves.toBeUndefined();
  });

  it('uses the defaults until settings are saved', async () => {
    await expect(service.settingsFor('u1')).resolves.toEqual(DEFAULT_VOICEMAIL_SETTINGS);
    expect(settings.findOne).toHaveBeenCalledWith({ userId: 'u1' });
  });

  it('upserts the settings that were given', async () => {
    settings.findOneAndUpdate.mockReturnValue(
      query({ userId: 'u1', enabled: false, greetingUrl: null, maxDuration: 60 }),
    );

    const saved = await service.saveSettings('u1', { enabled: false, greetingUrl: '   ', maxDuration: 60 });

    expect(settings.findOneAndUpdate).toHaveBeenCalledWith(
      { userId: 'u1' },
      { $set: { enabled: false, greetingUrl: null, maxDuration: 60 }, $setOnInsert: { userId: 'u1' } },
      { new: true, upsert: true },
    );
    expect(saved).toEqual({ enabled: false, greeting_url: null, max_duration: 60 });
  });

  it('refuses a deposit when voicemail is turned off', async () => {
    settings.findOne.mockReturnValue(query({ userId: 'u1', enabled: false, greetingUrl: null, maxDuration: 120 }));

    await expect(
      service.deposit({ recipientId: 'u1', callerNumber: '5550100', audioUrl: 'https://media.example.test/vm/1.wav' }),
    ).rejects.toThrow(new ValidationError('Voicemail is disabled for this user'));
    expect(voicemails.create).not.toHaveBeenCalled();
  });

  it('caps the recorded length at the configured maximum', async () => {
    settings.findOne.mockReturnValue(query({ userId: 'u1', enabled: true, greetingUrl: null, maxDuration: 30 }));

    const view = await service.deposit({
      recipientId: 'u1',
      callerNumber: '5550100',
      audioUrl: 'https://media.example.test/vm/1.wav',
      duration: 95.7,
    });

    expect(voicemails.create).toHaveBeenCalledWith({
      recipientId: 'u1',
      callerNumber: '5550100',
      callerName: null,
      audioUrl: 'https://media.example.test/vm/1.wav',
      duration: 30,
    });
    expect(view).toEqual({
      id: VOICEMAIL_ID.toHexString(),
      caller_number: '5550100',
      caller_name: null,
      audio_url: 'https://media.example.test/vm/1.wav',
      duration: 30,
      is_read: false,
      created_at: '2026-01-05T10:00:00.000Z',
    });
  });
});
