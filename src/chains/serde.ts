// src/chains/serde.ts
import { fromU16, toU16, type Chain } from './chain';
import type { U16 } from '../core/types/primitives';
import { OP_CHAIN } from '../core/types/errors';
import { assertU16 } from '../core/validation';

/** Structured form: the bare numeric value, no tag and no nesting. */
export function serializeChain(chain: Chain): U16 {
  return toU16(chain);
}

/**
 * Read the structured form back.
 *
 * @throws ChainIdError (`VALIDATION`) unless `v` is an integer in `0..=65535`.
 */
export function deserializeChain(v: unknown): Chain {
  assertU16(v, { resource: 'chain', operation: OP_CHAIN.deserialize }, 'serialized chain');
  return fromU16(v);
}

/**
 * Build a `JSON.parse` reviver that turns the listed keys back into chains.
 *
 * @example
 * const msg = JSON.parse(raw, chainReviver(['emitterChain', 'targetChain']));
 */
export function chainReviver(keys: readonly string[]) {
  const wanted = new Set(keys);
  return function revive(key: string, value: unknown): unknown {
    if (!wanted.has(key)) return value;
    assertU16(value, { resource: 'chain', operation: OP_CHAIN.revive }, `chain at "${key}"`);
    return fromU16(value);
  };
}
