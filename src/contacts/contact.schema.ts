// src/contacts/contact.schema.ts

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type ContactDocument = HydratedDocument<Contact>;

@Schema({ collection: 'contacts', timestamps: true })
export class Contact {
  @Prop({ type: String, required: true, index: true })
  ownerId!: string;

  @Prop({ type: String, required: true })
  firstName!: string;

  @Prop({ type: String, default: '' })
  lastName!: string;

  @Prop({ type: String, default: null })
  email?: string | null;

  @Prop({ type: String, required: true })
  phoneNumber!: string;

  @Prop({ type: String, default: null })
  company?: string | null;

  @Prop({ type: String, default: null })
  position?: string | null;

  @Prop({ type: String, default: null })
  notes?: string | null;

  @Prop({ type: String, default: null })
  avatar?: string | null;
}

export const ContactSchema = SchemaFactory.createForClass(Contact);

ContactSchema.index({ ownerId: 1, firstName: 1, lastName: 1 });
