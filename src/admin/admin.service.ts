// src/admin/admin.service.ts

import { Injectable } from '@nestjs/common';

import { CallView, toCallView } from '../calls/call-record';
import type { CallStatus } from '../calls/call-state.machine';
import { CallsService } from '../calls/calls.service';
import { ChatsService } from '../chat/chats.service';
import { ContactsService } from '../contacts/contacts.service';
import { UsersService, UserView } from '../users/users.service';
import { VoicemailService } from '../voicemail/voicemail.service';

export type DashboardStats = {
  total_users: number;
  active_users: number;
  total_calls: number;
  today_calls: number;
  total_voicemails: number;
  calls_by_status: Record<CallStatus, number>;
  recent_calls: CallView[];
  recent_users: UserView[];
};

export type UserDetails = UserView & {
  total_calls: number;
  total_messages: number;
  voicemails: number;
  contacts: number;
};

function startOfDay(now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate());
}

@Injectable()
export class AdminService {
  constructor(
    private readonly users: UsersService,
    private readonly calls: CallsService,
    private readonly voicemails: VoicemailService,
    private readonly chats: ChatsService,
    private readonly contacts: ContactsService,
  ) {}

  async dashboard(now = new Date()): Promise<DashboardStats> {
    const [totalUsers, activeUsers, byStatus, todayCalls, totalVoicemails, recentCalls, recentUsers] =
      await Promise.all([
        this.users.count(),
        this.users.count({ isActive: true }),
        this.calls.countByStatus(),
        this.calls.countSince(startOfDay(now)),
        this.voicemails.count(),
        this.calls.list({ limit: 10 }),
        this.users.list({ limit: 5 }),
      ]);

    return {
      total_users: totalUsers,
      active_users: activeUsers,
      total_calls: Object.values(byStatus).reduce((a, b) => a + b, 0),
      today_calls: todayCalls,
      total_voicemails: totalVoicemails,
      calls_by_status: byStatus,
      recent_calls: recentCalls.map(toCallView),
      recent_users: recentUsers,
    };
  }

  async monitorCalls(q: { limit?: number; before?: string; status?: string }): Promise<CallView[]> {
    const rows = await this.calls.list(q);
    return rows.map(toCallView);
  }

  async userDetails(userId: string): Promise<UserDetails> {
    const user = await this.users.getById(userId);
    const [totalCalls, totalMessages, voicemails, contacts] = await Promise.all([
      this.calls.countForUser(user.id),
      this.chats.countBySender(user.id),
      this.voicemails.countFor(user.id),
      this.contacts.countFor(user.id),
    ]);
    return { ...user, total_calls: totalCalls, total_messages: totalMessages, voicemails, contacts };
  }
}
