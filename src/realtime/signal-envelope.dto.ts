// src/realtime/signal-envelope.dto.ts

import { plainToInstance, Transform } from 'class-transformer';
import { IsIn, IsNotEmpty, IsObject, IsOptional, IsString, MaxLength, ValidateIf, validateSync } from 'class-validator';

import { CALL_KINDS, CallKind } from '../calls/call-state.machine';
import { ValidationError } from '../common/errors';
import { toIdString } from '../common/transforms';
import { SIGNAL_TYPES, SignalPayload, SignalType } from './realtime.types';

const carriesPayload = (o: SignalEnvelopeDto) =>
  o.type === 'offer' || o.type === 'answer' || o.type === 'ice_candidate';

const carriesTarget = (o: SignalEnvelopeDto) => o.type === 'offer' || o.type === 'ice_candidate';

/** Wire shape of one relay message. */
export class SignalEnvelopeDto {
  @IsIn(SIGNAL_TYPES, { message: `type must be one of ${SIGNAL_TYPES.join(', ')}` })
  type!: SignalType;

  // optional on offer, where the caller may pick its own id
  @ValidateIf((o: SignalEnvelopeDto) => o.type !== 'offer' || o.call_id !== undefined)
  @IsString({ message: 'call_id required' })
  @IsNotEmpty({ message: 'call_id required' })
  call_id?: string;

  @ValidateIf(carriesPayload)
  @IsObject({ message: 'payload must be an object' })
  payload?: SignalPayload;

  @ValidateIf(carriesTarget)
  @Transform(toIdString)
  @IsString({ message: 'target required' })
  @IsNotEmpty({ message: 'target required' })
  target?: string;

  @IsOptional()
  @IsIn(CALL_KINDS, { message: 'kind must be voice or video' })
  kind?: CallKind;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  reason?: string;
}

export type SignalEnvelope =
  | { type: 'offer'; callId?: string; target: string; payload: SignalPayload; kind: CallKind }
  | { type: 'answer'; callId: string; payload: SignalPayload }
  | { type: 'ice_candidate'; callId: string; target: string; payload: SignalPayload }
  | { type: 'answer_call'; callId: string }
  | { type: 'end_call'; callId: string; reason?: string };

function present<T>(v: T | undefined, field: string): T {
  if (v === undefined) throw new ValidationError(`${field} required`);
  return v;
}

/** Validates an inbound relay message and narrows it to the variant its type names. */
export function parseSignalEnvelope(raw: unknown): SignalEnvelope {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ValidationError('Malformed envelope');
  }

  const dto = plainToInstance(SignalEnvelopeDto, raw);
  const errors = validateSync(dto);
  if (errors.length) {
    const first = errors[0];
    const msg = first.constraints ? Object.values(first.constraints)[0] : `invalid ${first.property}`;
    throw new ValidationError(msg);
  }

  switch (dto.type) {
    case 'offer':
      return {
        type: 'offer',
        callId: dto.call_id,
        target: present(dto.target, 'target'),
        payload: present(dto.payload, 'payload'),
        kind: dto.kind ?? 'voice',
      };
    case 'answer':
      return { type: 'answer', callId: present(dto.call_id, 'call_id'), payload: present(dto.payload, 'payload') };
    case 'ice_candidate':
      return {
        type: 'ice_candidate',
        callId: present(dto.call_id, 'call_id'),
        target: present(dto.target, 'target'),
        payload: present(dto.payload, 'payload'),
      };
    case 'answer_call':
      return { type: 'answer_call', callId: present(dto.call_id, 'call_id') };
    case 'end_call':
      return { type: 'end_call', callId: present(dto.call_id, 'call_id'), reason: dto.reason };
  }
}
