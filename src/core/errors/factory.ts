// src/core/errors/factory.ts
import { ChainIdError, type ErrorEnvelope, type ErrorType } from '../types/errors';

export function createError(type: ErrorType, input: Omit<ErrorEnvelope, 'type'>): ChainIdError {
  return new ChainIdError({ ...input, type });
}

export function shapeCause(err: unknown) {
  if (!err || typeof err !== 'object') return { message: String(err) };
  return {
    name: 'name' in err && typeof err.name === 'string' ? err.name : undefined,
    message: 'message' in err && typeof err.message === 'string' ? err.message : undefined,
    code: 'code' in err && typeof err.code === 'string' ? err.code : undefined,
  };
}
