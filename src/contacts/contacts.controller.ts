// src/contacts/contacts.controller.ts

import { Body, Controller, Get, HttpCode, Post, UseGuards } from '@nestjs/common';

import type { Principal } from '../auth/auth.types';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import { HttpAuthGuard } from '../auth/http-auth.guard';
import { ok } from '../common/error-envelope';
import { AddContactDto, ContactIdDto, UpdateContactDto } from './contacts.dto';
import { ContactsService } from './contacts.service';

@Controller('api')
@UseGuards(HttpAuthGuard)
export class ContactsController {
  constructor(private readonly contacts: ContactsService) {}

  @Get('contacts')
  async list(@CurrentPrincipal() me: Principal) {
    return ok({ contacts: await this.contacts.list(me.userId) });
  }

  @Post('add-contact')
  @HttpCode(201)
  async add(@CurrentPrincipal() me: Principal, @Body() body: AddContactDto) {
    const contact = await this.contacts.add(me.userId, body);
    return ok({ message: 'Contact added successfully', contact });
  }

  @Post('update-contact')
  @HttpCode(200)
  async update(@CurrentPrincipal() me: Principal, @Body() body: UpdateContactDto) {
    const { contact_id, ...fields } = body;
    const contact = await this.contacts.update(me.userId, contact_id, fields);
    return ok({ message: 'Contact updated successfully', contact });
  }

  @Post('delete-contact')
  @HttpCode(200)
  async remove(@CurrentPrincipal() me: Principal, @Body() body: ContactIdDto) {
    await this.contacts.remove(me.userId, body.contact_id);
    return ok({ message: 'Contact deleted successfully' });
  }
}
