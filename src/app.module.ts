// src/app.module.ts

import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';

import { AdminModule } from './admin/admin.module';
import { AuthModule } from './auth/auth.module';
import { CallsModule } from './calls/calls.module';
import { ChatModule } from './chat/chat.module';
import configuration, { AppConfig } from './config/configuration';
import { ContactsModule } from './contacts/contacts.module';
import { RateLimitModule } from './infra/rate-limit/rate-limit.module';
import { ObservabilityModule } from './observability/observability.module';
import { ChannelsModule } from './realtime/channels.module';
import { RealtimeModule } from './realtime/realtime.module';
import { UsersModule } from './users/users.module';
import { VoicemailModule } from './voicemail/voicemail.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [configuration] }),

    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<AppConfig, true>) => {
        const { uri, dbName } = cfg.get('mongo', { infer: true });
        const env = cfg.get('env', { infer: true });
        const isSrv = uri.startsWith('mongodb+srv://');

        // never log credentials
        const masked = uri.replace(/:\/\/([^:]+):([^@]+)@/, '://$1:*****@');
        if (env !== 'production') new Logger('Mongo').log(`MONGODB_URI = ${masked} db=${dbName}`);

        return {
          uri,
          dbName,
          serverSelectionTimeoutMS: 8000,
          // single host (local, docker) skips replica discovery
          directConnection: !isSrv,
          tls: isSrv,
          maxPoolSize: 10,
          autoIndex: env !== 'production',
          appName: 'unified-comms-backend',
        };
      },
    }),

    ObservabilityModule,
    RateLimitModule,
    ChannelsModule,
    AuthModule,
    UsersModule,
    CallsModule,
    RealtimeModule,
    ContactsModule,
    VoicemailModule,
    ChatModule,
    AdminModule,
  ],
})
export class AppModule {}
