// src/calls/sms.service.ts

import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';

import { errorMessage, InternalError, ValidationError } from '../common/errors';
import { MetricsService } from '../observability/metrics.service';
import { digitsOnly } from './phone-number';
import { SmsGatewaySimulator } from './sms-gateway.simulator';

export type SentSms = { smsId: string; to: string };

@Injectable()
export class SmsService {
  private readonly logger = new Logger(SmsService.name);

  constructor(
    private readonly gateway: SmsGatewaySimulator,
    private readonly metrics: MetricsService,
  ) {}

  async send(senderId: string, rawNumber: string, message: string): Promise<SentSms> {
    const body = message?.trim();
    if (!rawNumber?.trim() || !body) throw new ValidationError('Phone number and message required');

    const to = digitsOnly(rawNumber);
    if (!to) throw new ValidationError('Invalid phone number');

    const smsId = randomUUID();
    try {
      await this.gateway.send({ smsId, to, body });
    } catch (e) {
      this.metrics.inc('sms_failed_total');
      this.logger.error(`sms ${smsId} from user=${senderId} to ${to} failed: ${errorMessage(e)}`);
      throw new InternalError(`SMS failed: ${errorMessage(e)}`);
    }

    this.metrics.inc('sms_sent_total');
    this.logger.log(`sms ${smsId} sent by user=${senderId} to ${to}`);
    return { smsId, to };
  }
}
