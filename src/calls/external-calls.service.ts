// src/calls/external-calls.service.ts

import { Injectable, Logger } from '@nestjs/common';

import { errorMessage, InternalError, ValidationError } from '../common/errors';
import { UserDirectory } from '../users/user-directory';
import type { CallKind } from './call-state.machine';
import type { CallRecord } from './call-record';
import { CallsService } from './calls.service';
import { InternationalRatesService } from './international-rates.service';
import { digitsOnly, looksInternational } from './phone-number';
import { SipTrunkSimulator } from './sip-trunk.simulator';

export type ExternalCallResult = { call: CallRecord; callerNumber: string };

/** Calls that leave the platform through the (simulated) SIP trunk. */
@Injectable()
export class ExternalCallsService {
  private readonly logger = new Logger(ExternalCallsService.name);

  constructor(
    private readonly calls: CallsService,
    private readonly users: UserDirectory,
    private readonly rates: InternationalRatesService,
    private readonly trunk: SipTrunkSimulator,
  ) {}

  async dial(callerId: string, rawNumber: string, kind: CallKind = 'voice'): Promise<ExternalCallResult> {
    if (!rawNumber?.trim()) throw new ValidationError('Phone number required');

    const clean = digitsOnly(rawNumber);
    if (!clean) throw new ValidationError('Invalid phone number');

    const caller = await this.users.findProfile(callerId);
    if (!caller?.phoneNumber) {
      throw new ValidationError('Please set your phone number in profile settings');
    }

    const call = await this.calls.create(callerId, { destinationNumber: clean }, kind, {
      isInternational: looksInternational(rawNumber, clean),
    });

    return { call: await this.connect(call, callerId), callerNumber: caller.phoneNumber };
  }

  async dialInternational(callerId: string, destination: string): Promise<CallRecord> {
    if (!destination?.trim()) throw new ValidationError('Destination number required');

    const countryCode = await this.rates.resolveCountryCode(destination);
    if (!countryCode) throw new ValidationError('Unsupported country code');

    const call = await this.calls.create(callerId, { destinationNumber: destination.trim() }, 'voice', {
      isInternational: true,
      destinationCountry: countryCode,
    });
    this.logger.log(`international call ${call.callId} to ${countryCode}`);
    return call;
  }

  private async connect(call: CallRecord, callerId: string): Promise<CallRecord> {
    try {
      await this.trunk.dial(call);
    } catch (e) {
      this.logger.error(`trunk dial failed for call ${call.callId}: ${errorMessage(e)}`);
      await this.calls.updateStatus(call.callId, 'failed', callerId, 'trunk_error');
      throw new InternalError(`Call failed: ${errorMessage(e)}`);
    }
    const res = await this.calls.markRinging(call.callId, callerId);
    return res.call;
  }
}
