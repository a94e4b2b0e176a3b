// src/calls/calls.dto.ts

import { Transform, Type } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { CALL_KINDS, CALL_STATUSES, CallKind, CallStatus } from './call-state.machine';
import { toIdString } from '../common/transforms';

export class InitiateCallDto {
  @Transform(toIdString)
  @IsString({ message: 'Callee ID required' })
  @IsNotEmpty({ message: 'Callee ID required' })
  callee_id!: string;

  @IsOptional()
  @IsIn(CALL_KINDS, { message: 'Invalid call type' })
  call_type?: CallKind;
}

export class CallIdDto {
  @IsString({ message: 'Call ID required' })
  @IsNotEmpty({ message: 'Call ID required' })
  call_id!: string;
}

export class EndCallDto extends CallIdDto {
  @IsOptional()
  @IsString()
  @MaxLength(200)
  reason?: string;
}

export class SendSmsDto {
  @IsString({ message: 'Phone number and message required' })
  @IsNotEmpty({ message: 'Phone number and message required' })
  phone_number!: string;

  @IsString({ message: 'Phone number and message required' })
  @IsNotEmpty({ message: 'Phone number and message required' })
  @MaxLength(1600)
  message!: string;
}

export class ExternalCallDto {
  @IsString({ message: 'Phone number required' })
  @IsNotEmpty({ message: 'Phone number required' })
  phone_number!: string;

  @IsOptional()
  @IsIn(CALL_KINDS, { message: 'Invalid call type' })
  call_type?: CallKind;
}

export class InternationalCallDto {
  @IsString({ message: 'Destination number required' })
  @IsNotEmpty({ message: 'Destination number required' })
  destination!: string;
}

export class ValidatePhoneDto {
  @IsString({ message: 'Phone number required' })
  @IsNotEmpty({ message: 'Phone number required' })
  phone_number!: string;
}

export class ListCallsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number;

  @IsOptional()
  @IsString()
  before?: string;

  @IsOptional()
  @IsIn(CALL_STATUSES)
  status?: CallStatus;
}
