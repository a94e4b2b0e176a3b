// src/contacts/contacts.dto.ts

import { IsEmail, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class AddContactDto {
  @IsString({ message: 'Name and phone are required' })
  @IsNotEmpty({ message: 'Name and phone are required' })
  @MaxLength(200)
  name!: string;

  @IsString({ message: 'Name and phone are required' })
  @IsNotEmpty({ message: 'Name and phone are required' })
  phone!: string;

  @IsOptional()
  @IsEmail()
  email?: string;

  @IsOptional()
  @IsString()
  company?: string;

  @IsOptional()
  @IsString()
  position?: string;

  @IsOptional()
  @IsString()
  notes?: string;
}

export class ContactIdDto {
  @IsString({ message: 'Contact ID required' })
  @IsNotEmpty({ message: 'Contact ID required' })
  contact_id!: string;
}

export class UpdateContactDto extends ContactIdDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  phone?: string;

  @IsOptional()
  @IsEmail()
  email?: string;

  @IsOptional()
  @IsString()
  company?: string;

  @IsOptional()
  @IsString()
  position?: string;

  @IsOptional()
  @IsString()
  notes?: string;
}
