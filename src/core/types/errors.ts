// src/core/types/errors.ts
import util from 'node:util';
import { formatEnvelopePretty } from '../errors/formatter';

export type ErrorType = 'VALIDATION';

/** Resource surface */
export type Resource = 'chain' | 'wire';

export const OP_CHAIN = {
  fromU16: 'chain.fromU16',
  parse: 'chain.parse',
  name: 'chain.name',
  deserialize: 'chain.deserialize',
  revive: 'chain.revive',
} as const;

export const OP_WIRE = {
  decode: 'wire.decodeChain',
  decodeHex: 'wire.decodeChainHex',
} as const;

/** Envelope carried by every error this library throws. */
export interface ErrorEnvelope {
  /** Resource surface that raised the error. */
  resource: Resource;
  /** Operation, e.g. 'chain.parse' */
  operation: string;
  /** Broad category */
  type: ErrorType;
  /** Human-readable, stable message for developers. */
  message: string;

  /** Offending values and positions */
  context?: Record<string, unknown>;

  /** Original thrown error  */
  cause?: unknown;
}

export class ChainIdError extends Error {
  constructor(public readonly envelope: ErrorEnvelope) {
    super(formatEnvelopePretty(envelope), envelope.cause ? { cause: envelope.cause } : undefined);
    this.name = 'ChainIdError';
  }

  [util.inspect.custom]() {
    return `${this.name}: ${formatEnvelopePretty(this.envelope)}`;
  }

  toJSON() {
    return { name: this.name, ...this.envelope };
  }
}

/**
 * Raised when text does not name a chain. `input` is the string exactly as
 * it was handed to the parser.
 */
export class InvalidChainError extends ChainIdError {
  constructor(public readonly input: string) {
    super({
      resource: 'chain',
      operation: OP_CHAIN.parse,
      type: 'VALIDATION',
      message: `invalid chain: ${input}`,
      context: { input },
    });
    this.name = 'InvalidChainError';
  }
}

//  ---- Type guards ----
export function isChainIdError(e: unknown): e is ChainIdError {
  if (e instanceof ChainIdError) return true;
  if (!e || typeof e !== 'object' || !('envelope' in e)) return false;
  const env = e.envelope;
  return (
    !!env &&
    typeof env === 'object' &&
    'type' in env &&
    typeof env.type === 'string' &&
    'message' in env &&
    typeof env.message === 'string'
  );
}

export function isInvalidChainError(e: unknown): e is InvalidChainError {
  return e instanceof InvalidChainError;
}

export type TryResult<T> = { ok: true; value: T } | { ok: false; error: ChainIdError };
