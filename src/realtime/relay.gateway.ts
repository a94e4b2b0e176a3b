// src/realtime/relay.gateway.ts

import { Logger } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  OnGatewayInit,
  SubscribeMessage,
  WebSocketGateway,
} from '@nestjs/websockets';
import { ConfigService } from '@nestjs/config';
import type { Server } from 'socket.io';

import type { AuthedSocket, Principal } from '../auth/auth.types';
import { SessionAuthService } from '../auth/session-auth.service';
import { wsHandshakeAuth } from '../auth/ws-handshake';
import { errorMessage, UnauthorizedError } from '../common/errors';
import { safeAck } from '../common/safe-ack';
import { AppConfig, loadConfig } from '../config/configuration';
import { UsersService } from '../users/users.service';
import { EVT, toIceServers } from './realtime.types';
import { SignalingRelayService } from './signaling-relay.service';
import { SessionHandle, UserChannelRegistry } from './user-channel.registry';

/** What the gateway needs from a connected socket. */
export type RelayClient = SessionHandle & { principal?: Principal; disconnect(close?: boolean): unknown };

// decorator options are fixed before DI exists, so they come straight from the loader
const { wsPath, origins } = loadConfig();

@WebSocketGateway({
  path: wsPath,
  // an empty list allows every origin, as the HTTP CORS hook does
  cors: { origin: origins.length ? origins : true, credentials: true },
})
export class RelayGateway implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(RelayGateway.name);

  constructor(
    private readonly auth: SessionAuthService,
    private readonly relay: SignalingRelayService,
    private readonly channels: UserChannelRegistry,
    private readonly users: UsersService,
    private readonly config: ConfigService<AppConfig, true>,
  ) {}

  afterInit(server: Server) {
    server.use(wsHandshakeAuth(this.auth));
  }

  async handleConnection(client: RelayClient) {
    const p = client.principal;
    if (!p?.userId) {
      client.disconnect(true);
      return;
    }

    const first = this.channels.attach(p.userId, client);
    const user = await this.seen(p);
    this.logger.log(`connected user=${p.userId} socket=${client.id} sessions=${this.channels.sessionsOf(p.userId).length}`);

    // a disconnect during the lastSeen write has already announced the user gone
    if (first && this.channels.isConnected(p.userId)) {
      this.channels.broadcast(EVT.USER_CONNECTED, {
        user_id: p.userId,
        username: p.username,
        status: user?.status ?? 'Available',
      });
    }
  }

  async handleDisconnect(client: RelayClient) {
    const p = client.principal;
    if (!p?.userId) return;

    const last = this.channels.detach(p.userId, client.id);
    if (last) {
      this.channels.broadcast(EVT.USER_DISCONNECTED, { user_id: p.userId, username: p.username });
    }

    await this.seen(p);
    this.logger.log(`disconnected user=${p.userId} socket=${client.id}`);
  }

  @SubscribeMessage(EVT.SIGNAL)
  async onSignal(@ConnectedSocket() client: AuthedSocket, @MessageBody() envelope: unknown) {
    return safeAck(async () => {
      const result = await this.relay.dispatch(this.requirePrincipal(client), envelope);
      return { success: true, ...result };
    });
  }

  @SubscribeMessage(EVT.ICE_SERVERS)
  async onIceServers(@ConnectedSocket() client: AuthedSocket) {
    return safeAck(async () => {
      this.requirePrincipal(client);
      return { success: true, ice_servers: toIceServers(this.config.get('webrtc', { infer: true }).iceServers) };
    });
  }

  private requirePrincipal(client: AuthedSocket): Principal {
    if (!client.principal) throw new UnauthorizedError('unauthorized');
    return client.principal;
  }

  // lastSeen is best effort
  private async seen(p: Principal) {
    try {
      return await this.users.touch(p.userId);
    } catch (e) {
      this.logger.warn(`lastSeen update failed user=${p.userId}: ${errorMessage(e)}`);
      return null;
    }
  }
}
