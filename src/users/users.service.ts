// src/users/users.service.ts

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import { hash } from 'bcryptjs';
import { isValidObjectId, Model, Types } from 'mongoose';

import { NotFoundError, ValidationError } from '../common/errors';
import { joinName, splitFullName } from '../common/names';
import type { AppConfig } from '../config/configuration';
import { DEFAULT_ROLES, Role, RoleDocument } from './role.schema';
import { PublicProfile, UserDirectory } from './user-directory';
import { SELECTABLE_STATUSES, SelectableStatus, User, UserDocument, UserStatus } from './user.schema';

type UserRow = User & { _id: Types.ObjectId };

export type UserView = {
  id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  full_name: string;
  phone_number: string | null;
  extension: string | null;
  status: UserStatus;
  avatar: string | null;
  is_active: boolean;
  last_seen: string | null;
  roles: string[];
};

export type NewUserInput = {
  username: string;
  email: string;
  fullName: string;
  password: string;
  role: string;
  phoneNumber?: string;
  extension?: string;
};

export type UserPatch = {
  email?: string;
  fullName?: string;
  phoneNumber?: string;
  extension?: string;
  role?: string;
  isActive?: boolean;
};

export type ProfileField = 'phone_number' | 'extension';

export function fullNameOf(u: Pick<User, 'firstName' | 'lastName'>): string {
  return joinName(u.firstName, u.lastName);
}

export function toUserView(u: UserRow): UserView {
  return {
    id: u._id.toHexString(),
    username: u.username,
    email: u.email,
    first_name: u.firstName ?? '',
    last_name: u.lastName ?? '',
    full_name: fullNameOf(u),
    phone_number: u.phoneNumber ?? null,
    extension: u.extension ?? null,
    status: u.status,
    avatar: u.avatar ?? null,
    is_active: u.isActive,
    last_seen: u.lastSeen ? u.lastSeen.toISOString() : null,
    roles: u.roles ?? [],
  };
}

export function isSelectableStatus(v: unknown): v is SelectableStatus {
  return SELECTABLE_STATUSES.some((s) => s === v);
}

@Injectable()
export class UsersService extends UserDirectory implements OnModuleInit {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectModel(User.name) private readonly users: Model<UserDocument>,
    @InjectModel(Role.name) private readonly roles: Model<RoleDocument>,
    private readonly config: ConfigService<AppConfig, true>,
  ) {
    super();
  }

  async onModuleInit() {
    await this.roles.bulkWrite(
      DEFAULT_ROLES.map((r) => ({
        updateOne: { filter: { name: r.name }, update: { $setOnInsert: r }, upsert: true },
      })),
    );
    this.logger.log(`roles ready: ${DEFAULT_ROLES.map((r) => r.name).join(', ')}`);
  }

  async findProfile(userId: string): Promise<PublicProfile | null> {
    const u = await this.findRow(userId);
    if (!u) return null;
    return {
      id: u._id.toHexString(),
      name: fullNameOf(u) || u.username,
      username: u.username,
      phoneNumber: u.phoneNumber ?? null,
    };
  }

  async getById(userId: string): Promise<UserView> {
    const u = await this.findRow(userId);
    if (!u) throw new NotFoundError('User not found');
    return toUserView(u);
  }

  async rolesOf(userId: string): Promise<string[]> {
    const u = await this.findRow(userId);
    return u?.roles ?? [];
  }

  async create(input: NewUserInput): Promise<UserView> {
    const username = input.username.trim();
    const email = input.email.trim().toLowerCase();

    if (await this.users.exists({ username })) throw new ValidationError('Username already exists');
    if (await this.users.exists({ email })) throw new ValidationError('Email already exists');
    await this.assertRole(input.role);
    if (input.extension) await this.assertExtensionFree(input.extension);

    const { bcryptRounds } = this.config.get('users', { infer: true });
    const doc = await this.users.create({
      username,
      email,
      passwordHash: await hash(input.password, bcryptRounds),
      ...splitFullName(input.fullName),
      phoneNumber: input.phoneNumber?.trim() || null,
      extension: input.extension?.trim() || undefined,
      roles: [input.role],
      isActive: true,
      status: 'Offline',
    });

    this.logger.log(`user created id=${doc.id} username=${username} role=${input.role}`);
    return this.getById(doc.id);
  }

  async update(userId: string, patch: UserPatch): Promise<UserView> {
    const u = await this.findRow(userId);
    if (!u) throw new NotFoundError('User not found');

    const $set: Partial<User> = {};
    if (patch.email !== undefined) {
      const email = patch.email.trim().toLowerCase();
      if (email !== u.email && (await this.users.exists({ email }))) {
        throw new ValidationError('Email already exists');
      }
      $set.email = email;
    }
    if (patch.fullName !== undefined) Object.assign($set, splitFullName(patch.fullName));
    if (patch.phoneNumber !== undefined) $set.phoneNumber = patch.phoneNumber.trim() || null;
    if (patch.extension !== undefined && patch.extension !== u.extension) {
      await this.assertExtensionFree(patch.extension, u._id);
      $set.extension = patch.extension.trim();
    }
    if (patch.role !== undefined) {
      await this.assertRole(patch.role);
      $set.roles = [patch.role];
    }
    if (patch.isActive !== undefined) $set.isActive = patch.isActive;

    await this.users.updateOne({ _id: u._id }, { $set }).exec();
    return this.getById(userId);
  }

  async toggleActive(userId: string): Promise<UserView> {
    const u = await this.findRow(userId);
    if (!u) throw new NotFoundError('User not found');

    await this.users.updateOne({ _id: u._id }, { $set: { isActive: !u.isActive } }).exec();
    this.logger.log(`user ${userId} ${u.isActive ? 'deactivated' : 'activated'}`);
    return { ...toUserView(u), is_active: !u.isActive };
  }

  async remove(actorId: string, userId: string): Promise<void> {
    if (actorId === userId) throw new ValidationError('Cannot delete yourself');
    const u = await this.findRow(userId);
    if (!u) throw new NotFoundError('User not found');

    await this.users.deleteOne({ _id: u._id }).exec();
    this.logger.log(`user deleted id=${userId} by=${actorId}`);
  }

  async setStatus(userId: string, status: unknown): Promise<UserView> {
    if (!isSelectableStatus(status)) throw new ValidationError('Invalid status');
    return this.writeStatus(userId, status);
  }

  /** Presence driven by the socket layer; Offline is allowed here. */
  async writeStatus(userId: string, status: UserStatus): Promise<UserView> {
    const u = await this.findRow(userId);
    if (!u) throw new NotFoundError('User not found');

    await this.users.updateOne({ _id: u._id }, { $set: { status, lastSeen: new Date() } }).exec();
    return { ...toUserView(u), status };
  }

  async updateProfileField(userId: string, field: ProfileField, value: string): Promise<UserView> {
    const u = await this.findRow(userId);
    if (!u) throw new NotFoundError('User not found');

    const v = value.trim();
    if (field === 'extension') {
      if (!v) throw new ValidationError('Extension required');
      if (v !== u.extension) await this.assertExtensionFree(v, u._id);
      await this.users.updateOne({ _id: u._id }, { $set: { extension: v } }).exec();
    } else {
      await this.users.updateOne({ _id: u._id }, { $set: { phoneNumber: v || null } }).exec();
    }
    return this.getById(userId);
  }

  /** Heartbeat and socket connect/disconnect all land here. */
  async touch(userId: string): Promise<UserView | null> {
    if (!isValidObjectId(userId)) return null;
    const row = await this.users
      .findByIdAndUpdate(userId, { $set: { lastSeen: new Date() } }, { new: true })
      .lean<UserRow>()
      .exec();
    return row ? toUserView(row) : null;
  }

  async onlineUsers(excludeUserId: string): Promise<UserView[]> {
    const { onlineWindowMs } = this.config.get('users', { infer: true });
    const since = new Date(Date.now() - onlineWindowMs);

    const rows = await this.users
      .find({
        isActive: true,
        lastSeen: { $gte: since },
        ...(isValidObjectId(excludeUserId) ? { _id: { $ne: excludeUserId } } : {}),
      }).sort({ username: 1 }).lean<UserRow[]>().exec();
    return rows.map(toUserView);
  }

  async list(opts: { limit?: number } = {}): Promise<UserView[]> {
    const rows = await this.users
      .find({})
      .sort({ createdAt: -1 })
      .limit(opts.limit ?? 100)
      .lean<UserRow[]>()
      .exec();
    return rows.map(toUserView);
  }

  count(filter: { isActive?: boolean } = {}): Promise<number> {
    return this.users.countDocuments(filter).exec();
  }

  private async findRow(userId: string): Promise<UserRow | null> {
    if (!isValidObjectId(userId)) return null;
    return this.users.findById(userId).lean<UserRow>().exec();
  }

  private async assertRole(role: string) {
    if (!(await this.roles.exists({ name: role }))) throw new ValidationError('Invalid role');
  }

  private async assertExtensionFree(extension: string, self?: Types.ObjectId) {
    const taken = await this.users.exists({
      extension: extension.trim(),
      ...(self ? { _id: { $ne: self } } : {}),
    });
    if (taken) throw new ValidationError('Extension already in use');
  }
}
