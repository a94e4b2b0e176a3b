// src/common/transforms.ts

import type { TransformFnParams } from 'class-transformer';

/** Clients send numeric ids as JSON numbers; everything here keys on strings. */
export const toIdString = ({ value }: TransformFnParams): unknown =>
  typeof value === 'number' ? String(value) : value;
