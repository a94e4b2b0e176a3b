// src/contacts/contacts.service.ts

import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model, Types } from 'mongoose';

import { NotFoundError } from '../common/errors';
import { joinName, splitFullName } from '../common/names';
import { Contact, ContactDocument } from './contact.schema';

type ContactRow = Contact & { _id: Types.ObjectId };

export type ContactView = {
  id: string;
  first_name: string;
  last_name: string;
  full_name: string;
  email: string | null;
  phone_number: string;
  company: string | null;
  position: string | null;
  notes: string | null;
  avatar: string | null;
};

export type ContactInput = {
  name?: string;
  phone?: string;
  email?: string;
  company?: string;
  position?: string;
  notes?: string;
};

export function toContactView(c: ContactRow): ContactView {
  return {
    id: c._id.toHexString(),
    first_name: c.firstName,
    last_name: c.lastName ?? '',
    full_name: joinName(c.firstName, c.lastName),
    email: c.email ?? null,
    phone_number: c.phoneNumber,
    company: c.company ?? null,
    position: c.position ?? null,
    notes: c.notes ?? null,
    avatar: c.avatar ?? null,
  };
}

function fieldsOf(input: ContactInput): Partial<Contact> {
  const out: Partial<Contact> = {};
  if (input.name !== undefined) Object.assign(out, splitFullName(input.name));
  if (input.phone !== undefined) out.phoneNumber = input.phone.trim();
  if (input.email !== undefined) out.email = input.email.trim() || null;
  if (input.company !== undefined) out.company = input.company.trim() || null;
  if (input.position !== undefined) out.position = input.position.trim() || null;
  if (input.notes !== undefined) out.notes = input.notes.trim() || null;
  return out;
}

/** Each user's private address book. Other owners' contacts are indistinguishable from missing ones. */
@Injectable()
export class ContactsService {
  private readonly logger = new Logger(ContactsService.name);

  constructor(@InjectModel(Contact.name) private readonly model: Model<ContactDocument>) {}

  async list(ownerId: string): Promise<ContactView[]> {
    const rows = await this.model.find({ ownerId }).sort({ firstName: 1, lastName: 1 }).lean<ContactRow[]>().exec();
    return rows.map(toContactView);
  }

  async add(ownerId: string, input: ContactInput & { name: string; phone: string }): Promise<ContactView> {
    const doc = await this.model.create({ ownerId, ...fieldsOf(input) });
    this.logger.log(`contact ${doc.id} added for user=${ownerId}`);
    return toContactView(doc.toObject());
  }

  async update(ownerId: string, contactId: string, input: ContactInput): Promise<ContactView> {
    const row = isValidObjectId(contactId)
      ? await this.model
          .findOneAndUpdate({ _id: contactId, ownerId }, { $set: fieldsOf(input) }, { new: true })
          .lean<ContactRow>()
          .exec()
      : null;
    if (!row) throw new NotFoundError('Contact not found');
    return toContactView(row);
  }

  async remove(ownerId: string, contactId: string): Promise<void> {
    const res = isValidObjectId(contactId) ? await this.model.deleteOne({ _id: contactId, ownerId }).exec() : null;
    if (!res?.deletedCount) throw new NotFoundError('Contact not found');
  }

  countFor(ownerId: string): Promise<number> {
    return this.model.countDocuments({ ownerId }).exec();
  }
}
