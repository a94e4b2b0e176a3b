// src/common/safe-ack.ts

import { Logger } from '@nestjs/common';
import { ErrorEnvelope, toErrorEnvelope } from './error-envelope';

const logger = new Logger('WsAck');

/** Runs a ws handler body and turns anything it throws into an ack the client can read. */
export async function safeAck<T>(fn: () => Promise<T>): Promise<T | ErrorEnvelope> {
  try {
    return await fn();
  } catch (e) {
    const { status, body } = toErrorEnvelope(e);
    if (status >= 500) {
      logger.error(`ws handler failed: ${e instanceof Error ? e.stack : String(e)}`);
    } else {
      logger.debug(`ws handler rejected: ${body.code} ${body.error}`);
    }
    return body;
  }
}
