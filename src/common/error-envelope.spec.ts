import { BadRequestException, HttpException, HttpStatus } from '@nestjs/common';

import { ok, toErrorEnvelope } from './error-envelope';
import { InternalError, InvalidTransitionError, NotFoundError, UnauthorizedError, ValidationError } from './errors';
import { safeAck } from './safe-ack';

describe('toErrorEnvelope', () => {
  it.each([
    [new ValidationError('Callee ID required'), 400, 'VALIDATION_ERROR'],
    [new NotFoundError('Call not found'), 404, 'NOT_FOUND'],
    [new UnauthorizedError('Not authorized to access this call'), 403, 'UNAUTHORIZED'],
    [new InvalidTransitionError('Cannot move call from ended to answered'), 409, 'INVALID_TRANSITION'],
    [new InternalError('Call failed: trunk down'), 500, 'INTERNAL_ERROR'],
  ])('keeps the message and code of %s', (err, status, code) => {
    expect(toErrorEnvelope(err)).toEqual({ status, body: { error: err.message, code } });
  });

  it('joins the messages of a validation pipe failure', () => {
    const err = new BadRequestException(['name must be a string', 'phone should not be empty']);
    expect(toErrorEnvelope(err)).toEqual({
      status: 400,
      body: { error: 'name must be a string; phone should not be empty', code: 'VALIDATION_ERROR' },
    });
  });

  it('labels a rate limit rejection', () => {
    const err = new HttpException('Too many requests', HttpStatus.TOO_MANY_REQUESTS);
    expect(toErrorEnvelope(err)).toEqual({ status: 429, body: { error: 'Too many requests', code: 'RATE_LIMITED' } });
  });

  it('hides the message of an unexpected error', () => {
    expect(toErrorEnvelope(new Error('connection reset by peer'))).toEqual({
      status: 500,
      body: { error: 'Internal server error', code: 'INTERNAL_ERROR' },
    });
  });
});

describe('ok', () => {
  it('wraps data in a success envelope', () => {
    expect(ok({ call_id: 'c1' })).toEqual({ success: true, call_id: 'c1' });
    expect(ok()).toEqual({ success: true });
  });
});

describe('safeAck', () => {
  it('passes the handler result through', async () => {
    await expect(safeAck(async () => ({ success: true }))).resolves.toEqual({ success: true });
  });

  it('turns a thrown error into an error ack', async () => {
    const ack = await safeAck(async () => {
      throw new NotFoundError('Call not found');
    });
    expect(ack).toEqual({ error: 'Call not found', code: 'NOT_FOUND' });
  });
});
