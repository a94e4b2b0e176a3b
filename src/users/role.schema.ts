// src/users/role.schema.ts

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type RoleDocument = HydratedDocument<Role>;

@Schema({ collection: 'roles', timestamps: true })
export class Role {
  @Prop({ type: String, required: true, unique: true })
  name!: string;

  @Prop({ type: String, default: '' })
  description!: string;
}

export const RoleSchema = SchemaFactory.createForClass(Role);

export const DEFAULT_ROLES: ReadonlyArray<Pick<Role, 'name' | 'description'>> = [
  { name: 'Admin', description: 'System Administrator' },
  { name: 'Agent', description: 'Customer Service Agent' },
  { name: 'User', description: 'Regular User' },
];
