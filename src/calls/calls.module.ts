// src/calls/calls.module.ts

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getModelToken, MongooseModule } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { AuthModule } from '../auth/auth.module';
import type { AppConfig } from '../config/configuration';
import { UsersModule } from '../users/users.module';
import { Call, CallDocument, CallSchema } from './call.schema';
import { CallRecordStore } from './call-record.store';
import { CallsController } from './calls.controller';
import { CallsService } from './calls.service';
import { ExternalCallsService } from './external-calls.service';
import { InternationalRate, InternationalRateSchema } from './international-rate.schema';
import { InternationalRatesService } from './international-rates.service';
import { MemoryCallRecordStore } from './memory-call-record.store';
import { MongoCallRecordStore } from './mongo-call-record.store';
import { SipTrunkSimulator } from './sip-trunk.simulator';
import { SmsGatewaySimulator } from './sms-gateway.simulator';
import { SmsService } from './sms.service';

@Module({
  imports: [
    AuthModule,
    UsersModule,
    MongooseModule.forFeature([
      { name: Call.name, schema: CallSchema },
      { name: InternationalRate.name, schema: InternationalRateSchema },
    ]),
  ],
  controllers: [CallsController],
  providers: [
    {
      provide: CallRecordStore,
      inject: [ConfigService, getModelToken(Call.name)],
      useFactory: (config: ConfigService<AppConfig, true>, model: Model<CallDocument>): CallRecordStore =>
        config.get('calls', { infer: true }).store === 'memory'
          ? new MemoryCallRecordStore()
          : new MongoCallRecordStore(model),
    },
    CallsService,
    ExternalCallsService,
    InternationalRatesService,
    SipTrunkSimulator,
    SmsService,
    SmsGatewaySimulator,
  ],
  exports: [CallsService],
})
export class CallsModule {}
