// src/users/users.dto.ts

import { Transform } from 'class-transformer';
import { IsBoolean, IsEmail, IsIn, IsNotEmpty, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';
import { SELECTABLE_STATUSES, SelectableStatus } from './user.schema';
import { toIdString } from '../common/transforms';

export class AddUserDto {
  @IsString()
  @IsNotEmpty({ message: 'username is required' })
  @MaxLength(150)
  username!: string;

  @IsEmail({}, { message: 'email must be a valid address' })
  email!: string;

  @IsString()
  @IsNotEmpty({ message: 'full_name is required' })
  full_name!: string;

  @IsString()
  @MinLength(6)
  password!: string;

  @IsString()
  @IsNotEmpty({ message: 'role is required' })
  role!: string;

  @IsOptional()
  @IsString()
  phone_number?: string;

  @IsOptional()
  @IsString()
  extension?: string;
}

export class UserIdDto {
  @Transform(toIdString)
  @IsString({ message: 'User ID required' })
  @IsNotEmpty({ message: 'User ID required' })
  user_id!: string;
}

export class UpdateUserDto extends UserIdDto {
  @IsOptional()
  @IsEmail()
  email?: string;

  @IsOptional()
  @IsString()
  full_name?: string;

  @IsOptional()
  @IsString()
  phone_number?: string;

  @IsOptional()
  @IsString()
  extension?: string;

  @IsOptional()
  @IsString()
  role?: string;

  @IsOptional()
  @IsBoolean()
  is_active?: boolean;
}

export class UpdateStatusDto {
  @IsIn(SELECTABLE_STATUSES, { message: 'Invalid status' })
  status!: SelectableStatus;
}

export class UpdateUserStatusDto extends UpdateStatusDto {
  @Transform(toIdString)
  @IsString({ message: 'User ID required' })
  @IsNotEmpty({ message: 'User ID required' })
  user_id!: string;
}

export class UpdateProfileDto {
  @IsIn(['phone_number', 'extension'], { message: 'Invalid field' })
  field!: 'phone_number' | 'extension';

  @IsString()
  value!: string;
}
