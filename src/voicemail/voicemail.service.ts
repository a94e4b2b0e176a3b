// src/voicemail/voicemail.service.ts

import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model, Types } from 'mongoose';

import { NotFoundError, ValidationError } from '../common/errors';
import { VoicemailSettings, VoicemailSettingsDocument } from './voicemail-settings.schema';
import { Voicemail, VoicemailDocument } from './voicemail.schema';

type VoicemailRow = Voicemail & { _id: Types.ObjectId };

export type VoicemailView = {
  id: string;
  caller_number: string;
  caller_name: string | null;
  audio_url: string;
  duration: number;
  is_read: boolean;
  created_at: string | null;
};

export type VoicemailSettingsView = {
  enabled: boolean;
  greeting_url: string | null;
  max_duration: number;
};

export type VoicemailSettingsPatch = { enabled?: boolean; greetingUrl?: string; maxDuration?: number };

export const DEFAULT_VOICEMAIL_SETTINGS: VoicemailSettingsView = {
  enabled: true,
  greeting_url: null,
  max_duration: 120,
};

function toSettingsView(s: VoicemailSettings): VoicemailSettingsView {
  return { enabled: s.enabled, greeting_url: s.greetingUrl ?? null, max_duration: s.maxDuration };
}

export type NewVoicemail = Pick<Voicemail, 'recipientId' | 'callerNumber' | 'audioUrl'> &
  Partial<Pick<Voicemail, 'callerName' | 'duration'>>;

export function toVoicemailView(v: VoicemailRow): VoicemailView {
  return {
    id: v._id.toHexString(),
    caller_number: v.callerNumber,
    caller_name: v.callerName ?? null,
    audio_url: v.audioUrl,
    duration: v.duration,
    is_read: v.isRead,
    created_at: v.createdAt ? v.createdAt.toISOString() : null,
  };
}

@Injectable()
export class VoicemailService {
  private readonly logger = new Logger(VoicemailService.name);

  constructor(
    @InjectModel(Voicemail.name) private readonly model: Model<VoicemailDocument>,
    @InjectModel(VoicemailSettings.name) private readonly settingsModel: Model<VoicemailSettingsDocument>,
  ) {}

  async listFor(recipientId: string): Promise<VoicemailView[]> {
    const rows = await this.model
      .find({ recipientId, isArchived: false })
      .sort({ createdAt: -1 })
      .lean<VoicemailRow[]>()
      .exec();
    return rows.map(toVoicemailView);
  }

  async deposit(input: NewVoicemail): Promise<VoicemailView> {
    const settings = await this.settingsFor(input.recipientId);
    if (!settings.enabled) throw new ValidationError('Voicemail is disabled for this user');

    const doc = await this.model.create({
      recipientId: input.recipientId,
      callerNumber: input.callerNumber,
      callerName: input.callerName ?? null,
      audioUrl: input.audioUrl,
      duration: Math.min(settings.max_duration, Math.max(0, Math.floor(input.duration ?? 0))),
    });
    this.logger.log(`voicemail ${doc.id} for user=${input.recipientId} from ${input.callerNumber}`);
    return toVoicemailView(doc.toObject());
  }

  async markRead(recipientId: string, voicemailId: string): Promise<void> {
    const res = isValidObjectId(voicemailId)
      ? await this.model.updateOne({ _id: voicemailId, recipientId }, { $set: { isRead: true } }).exec()
      : null;
    // someone else's voicemail looks exactly like a missing one
    if (!res?.matchedCount) throw new NotFoundError('Voicemail not found');
  }

  async remove(recipientId: string, voicemailId: string): Promise<void> {
    const res = isValidObjectId(voicemailId)
      ? await this.model.deleteOne({ _id: voicemailId, recipientId }).exec()
      : null;
    if (!res?.deletedCount) throw new NotFoundError('Voicemail not found');
  }

  async settingsFor(userId: string): Promise<VoicemailSettingsView> {
    const row = await this.settingsModel.findOne({ userId }).lean<VoicemailSettings>().exec();
    return row ? toSettingsView(row) : { ...DEFAULT_VOICEMAIL_SETTINGS };
  }

  async saveSettings(userId: string, patch: VoicemailSettingsPatch): Promise<VoicemailSettingsView> {
    const $set: Partial<VoicemailSettings> = {};
    if (patch.enabled !== undefined) $set.enabled = patch.enabled;
    if (patch.greetingUrl !== undefined) $set.greetingUrl = patch.greetingUrl.trim() || null;
    if (patch.maxDuration !== undefined) $set.maxDuration = patch.maxDuration;

    const row = await this.settingsModel
      .findOneAndUpdate({ userId }, { $set, $setOnInsert: { userId } }, { new: true, upsert: true })
      .lean<VoicemailSettings>()
      .exec();
    this.logger.log(`voicemail settings saved for user=${userId}`);
    return row ? toSettingsView(row) : { ...DEFAULT_VOICEMAIL_SETTINGS };
  }

  countFor(recipientId: string, filter: { unread?: boolean } = {}): Promise<number> {
    return this.model.countDocuments({ recipientId, ...(filter.unread ? { isRead: false } : {}) }).exec();
  }

  count(): Promise<number> {
    return this.model.countDocuments({}).exec();
  }
}
