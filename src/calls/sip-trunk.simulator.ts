// src/calls/sip-trunk.simulator.ts

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';

import type { AppConfig } from '../config/configuration';
import type { CallRecord } from './call-record';

/**
 * Stand-in for a SIP trunk provider. There is no SIP stack here: dialling waits
 * for the configured delay and reports the far end as ringing.
 */
@Injectable()
export class SipTrunkSimulator {
  private readonly logger = new Logger(SipTrunkSimulator.name);
  private readonly delayMs: number;

  constructor(config: ConfigService<AppConfig, true>) {
    this.delayMs = config.get('calls', { infer: true }).sipSimulatedDelayMs;
  }

  async dial(call: Pick<CallRecord, 'callId' | 'destinationNumber'>): Promise<void> {
    this.logger.log(`dialling ${call.destinationNumber ?? '-'} for call ${call.callId} (simulated, ${this.delayMs}ms)`);
    if (this.delayMs > 0) await sleep(this.delayMs);
  }
}
