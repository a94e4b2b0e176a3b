// src/users/user.schema.ts

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export const USER_STATUSES = ['Available', 'Away', 'DND', 'Busy', 'Offline'] as const;
export type UserStatus = (typeof USER_STATUSES)[number];

/** Statuses a user may pick; Offline is only ever set by the system. */
export const SELECTABLE_STATUSES = ['Available', 'Away', 'DND', 'Busy'] as const;
export type SelectableStatus = (typeof SELECTABLE_STATUSES)[number];

export type UserDocument = HydratedDocument<User>;

@Schema({ collection: 'users', timestamps: true })
export class User {
  @Prop({ type: String, required: true, unique: true, trim: true })
  username!: string;

  @Prop({ type: String, required: true, unique: true, lowercase: true, trim: true })
  email!: string;

  @Prop({ type: String, required: true })
  passwordHash!: string;

  @Prop({ type: String, default: '' })
  firstName!: string;

  @Prop({ type: String, default: '' })
  lastName!: string;

  @Prop({ type: String, default: null })
  phoneNumber?: string | null;

  @Prop({ type: String, default: undefined, unique: true, sparse: true })
  extension?: string;

  @Prop({ type: String, enum: USER_STATUSES, default: 'Offline' })
  status!: UserStatus;

  @Prop({ type: String, default: null })
  avatar?: string | null;

  @Prop({ type: Boolean, default: true, index: true })
  isActive!: boolean;

  @Prop({ type: Date, default: null, index: true })
  lastSeen?: Date | null;

  @Prop({ type: [String], default: [] })
  roles!: string[];

  createdAt?: Date;
}

export const UserSchema = SchemaFactory.createForClass(User);
