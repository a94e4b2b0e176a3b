// src/voicemail/voicemail-settings.schema.ts

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type VoicemailSettingsDocument = HydratedDocument<VoicemailSettings>;

export const MIN_GREETING_SECONDS = 10;
export const MAX_GREETING_SECONDS = 600;

/** One row per user; a user without a row gets the defaults below. */
@Schema({ collection: 'voicemail_settings', timestamps: true })
export class VoicemailSettings {
  @Prop({ type: String, required: true, unique: true })
  userId!: string;

  @Prop({ type: Boolean, default: true })
  enabled!: boolean;

  @Prop({ type: String, default: null })
  greetingUrl?: string | null;

  // longest message a caller may leave, in seconds
  @Prop({ type: Number, default: 120, min: MIN_GREETING_SECONDS, max: MAX_GREETING_SECONDS })
  maxDuration!: number;
}

export const VoicemailSettingsSchema = SchemaFactory.createForClass(VoicemailSettings);
