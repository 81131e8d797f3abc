import type { Resource } from './types/errors';
import type { U16 } from './types/primitives';
import { createError } from './errors/factory';

export const U16_MAX = 0xffff;

export function isU16(v: unknown): v is U16 {
  return typeof v === 'number' && Number.isInteger(v) && v >= 0 && v <= U16_MAX;
}

export function assertU16(
  v: unknown,
  at: { resource: Resource; operation: string },
  label = 'value',
): asserts v is U16 {
  if (!isU16(v)) {
    throw createError('VALIDATION', {
      ...at,
      message: `Invalid ${label}: expected an integer in 0..=${U16_MAX}.`,
      context: { value: v },
    });
  }
}
