// src/realtime/webrtc.dto.ts

import { Transform } from 'class-transformer';
import { IsArray, IsIn, IsNotEmpty, IsObject, IsOptional, IsString, MaxLength } from 'class-validator';

import { CALL_KINDS, CallKind } from '../calls/call-state.machine';
import { toIdString } from '../common/transforms';
import type { SignalPayload } from './realtime.types';

export class WebRtcOfferDto {
  @Transform(toIdString)
  @IsString({ message: 'Callee ID required' })
  @IsNotEmpty({ message: 'Callee ID required' })
  callee_id!: string;

  @IsObject({ message: 'offer must be an object' })
  offer!: SignalPayload;

  @IsOptional()
  @IsIn(CALL_KINDS, { message: 'Invalid call type' })
  call_type?: CallKind;
}

export class WebRtcAnswerDto {
  @IsString({ message: 'Call ID required' })
  @IsNotEmpty({ message: 'Call ID required' })
  call_id!: string;

  @IsObject({ message: 'answer must be an object' })
  answer!: SignalPayload;
}

export class WebRtcIceDto {
  @IsString({ message: 'Call ID required' })
  @IsNotEmpty({ message: 'Call ID required' })
  call_id!: string;

  @IsObject({ message: 'candidate must be an object' })
  candidate!: SignalPayload;

  @Transform(toIdString)
  @IsString({ message: 'Target user required' })
  @IsNotEmpty({ message: 'Target user required' })
  target_user_id!: string;
}

export class NotifyDto {
  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  user_ids!: string[];

  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  event!: string;

  @IsOptional()
  @IsObject()
  payload?: Record<string, unknown>;
}
