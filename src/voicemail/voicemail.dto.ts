// src/voicemail/voicemail.dto.ts

import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { toIdString } from '../common/transforms';
import { MAX_GREETING_SECONDS, MIN_GREETING_SECONDS } from './voicemail-settings.schema';

export class VoicemailIdDto {
  @IsString({ message: 'Voicemail ID required' })
  @IsNotEmpty({ message: 'Voicemail ID required' })
  voicemail_id!: string;
}

export class DepositVoicemailDto {
  @Transform(toIdString)
  @IsString()
  @IsNotEmpty()
  recipient_id!: string;

  @IsString()
  @IsNotEmpty()
  caller_number!: string;

  @IsOptional()
  @IsString()
  caller_name?: string;

  @IsString()
  @IsNotEmpty()
  audio_url!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  duration?: number;
}

export class VoicemailSettingsDto {
  @IsOptional()
  @IsBoolean()
  enabled?: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(2048)
  greeting_url?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(MIN_GREETING_SECONDS)
  @Max(MAX_GREETING_SECONDS)
  max_duration?: number;
}
