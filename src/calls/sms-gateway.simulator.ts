// src/calls/sms-gateway.simulator.ts

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';

import type { AppConfig } from '../config/configuration';

export type OutboundSms = { smsId: string; to: string; body: string };

/** No SMS provider is wired in: sending waits for the configured delay and succeeds. */
@Injectable()
export class SmsGatewaySimulator {
  private readonly logger = new Logger(SmsGatewaySimulator.name);
  private readonly delayMs: number;

  constructor(config: ConfigService<AppConfig, true>) {
    this.delayMs = config.get('sms', { infer: true }).simulatedDelayMs;
  }

  async send(sms: OutboundSms): Promise<void> {
    this.logger.log(`sms ${sms.smsId} to ${sms.to} (${sms.body.length} chars, simulated, ${this.delayMs}ms)`);
    if (this.delayMs > 0) await sleep(this.delayMs);
  }
}
