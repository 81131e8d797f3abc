// src/core/index.ts
export * as errors from './errors/factory';
export { formatEnvelopePretty } from './errors/formatter';

export { ChainIdError, InvalidChainError, isChainIdError, isInvalidChainError } from './types/errors';
export { OP_CHAIN, OP_WIRE } from './types/errors';
export { isU16, assertU16, U16_MAX } from './validation';

// Core types (type-only)
export type { ErrorEnvelope, ErrorType, Resource, TryResult } from './types/errors';
export type * from './types/primitives';
