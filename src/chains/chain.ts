// src/chains/chain.ts
import type { ChainKind, U16 } from '../core/types/primitives';
import { OP_CHAIN } from '../core/types/errors';
import { assertU16 } from '../core/validation';
import { createError } from '../core/errors/factory';

/** Chains with a named variant, keyed by lowercase name. */
export const CHAINS = {
  any: 0,
  solana: 1,
} as const;

export type ChainName = keyof typeof CHAINS;

const CHAIN_NAMES: readonly ChainName[] = ['any', 'solana'];

/** Inverse of {@link CHAINS}: numeric id to lowercase name. */
export const CHAIN_ID_TO_NAME: ReadonlyMap<U16, ChainName> = new Map(
  CHAIN_NAMES.map((name): [U16, ChainName] => [CHAINS[name], name]),
);

/**
 * Identifier of a network participating in cross-chain messaging.
 *
 * One of three variants:
 * - `Any` (0): the message is not bound to a specific origin or destination chain.
 * - `Solana` (1).
 * - `Unknown(n)`: any other 16-bit value, kept as-is so that chains without a
 *   named variant still round-trip.
 *
 * Instances cannot be constructed directly. {@link Chain.fromU16} is the single
 * entry point, so `Unknown` never holds 0 or 1, and instances are interned:
 * two chains with the same numeric encoding are the same object.
 *
 * @example
 * const c = Chain.fromU16(42);
 * c.kind;        // 'Unknown'
 * c.toString();  // 'Unknown(42)'
 * c.toU16();     // 42
 */
export class Chain {
  private static readonly interned = new Map<U16, Chain>();

  static readonly Any: Chain = Chain.intern('Any', CHAINS.any);
  static readonly Solana: Chain = Chain.intern('Solana', CHAINS.solana);

  private constructor(
    readonly kind: ChainKind,
    readonly value: U16,
  ) {
    Object.freeze(this);
  }

  private static intern(kind: ChainKind, value: U16): Chain {
    const chain = new Chain(kind, value);
    Chain.interned.set(value, chain);
    return chain;
  }

  /**
   * Decode the numeric wire value.
   *
   * @throws ChainIdError (`VALIDATION`) if `n` is not an integer in `0..=65535`.
   */
  static fromU16(n: number): Chain {
    assertU16(n, { resource: 'chain', operation: OP_CHAIN.fromU16 }, 'chain id');
    return Chain.interned.get(n) ?? Chain.intern('Unknown', n);
  }

  static default(): Chain {
    return Chain.Any;
  }

  toU16(): U16 {
    return this.value;
  }

  /** Canonical text: `Any`, `Solana` or `Unknown(<decimal>)`. */
  toString(): string {
    switch (this.kind) {
      case 'Any':
        return 'Any';
      case 'Solana':
        return 'Solana';
      case 'Unknown':
        return `Unknown(${this.value})`;
    }
  }

  /** Structured form is the bare numeric value. */
  toJSON(): U16 {
    return this.value;
  }

  equals(other: Chain): boolean {
    return this.value === other.value;
  }
}

export const fromU16 = (n: number): Chain => Chain.fromU16(n);

export const toU16 = (chain: Chain): U16 => chain.toU16();

export const defaultChain = (): Chain => Chain.default();

export function isChainInstance(v: unknown): v is Chain {
  return v instanceof Chain;
}

export function chainEquals(a: Chain, b: Chain): boolean {
  return a.toU16() === b.toU16();
}

/** Orders chains by numeric encoding; usable with `Array.prototype.sort`. */
export function compareChains(a: Chain, b: Chain): number {
  return a.toU16() - b.toU16();
}

/** True for chains with a named variant (`Any`, `Solana`). */
export function isKnownChain(chain: Chain): boolean {
  return chain.kind !== 'Unknown';
}

export function chainFromName(name: ChainName): Chain {
  return Chain.fromU16(CHAINS[name]);
}

/** Name of a chain with a named variant; `undefined` for `Unknown(n)`. */
export function chainName(chain: Chain): ChainName | undefined {
  return CHAIN_ID_TO_NAME.get(chain.toU16());
}

/** Exact, lowercase match against the keys of {@link CHAINS}. */
export function isChainName(s: string): s is ChainName {
  return Object.hasOwn(CHAINS, s);
}

export function assertChainName(s: string): asserts s is ChainName {
  if (!isChainName(s)) {
    throw createError('VALIDATION', {
      resource: 'chain',
      operation: OP_CHAIN.name,
      message: `Unknown chain name: ${s}`,
      context: { name: s },
    });
  }
}

/**
 * Accept whichever form a caller holds: a chain, its numeric id or its name.
 *
 * @throws ChainIdError (`VALIDATION`) for a number outside `0..=65535`.
 */
export function coalesceChain(chain: Chain | ChainName | U16): Chain {
  if (chain instanceof Chain) return chain;
  return typeof chain === 'number' ? Chain.fromU16(chain) : chainFromName(chain);
}
