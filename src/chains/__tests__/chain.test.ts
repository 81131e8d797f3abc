import { describe, it, expect } from 'vitest';
import {
  Chain,
  CHAINS,
  fromU16,
  toU16,
  defaultChain,
  isChainInstance,
  chainEquals,
  compareChains,
  isKnownChain,
  chainFromName,
  CHAIN_ID_TO_NAME,
  chainName,
  isChainName,
  assertChainName,
  coalesceChain,
} from '../chain';
import { ChainIdError, OP_CHAIN } from '../../core/types/errors';

describe('chains/fromU16 + toU16', () => {
  it('round-trips every u16', () => {
    for (let n = 0; n <= 0xffff; n++) {
      expect(toU16(fromU16(n))).toBe(n);
    }
  });

  it('collapses 0 and 1 onto the named variants', () => {
    expect(fromU16(0)).toBe(Chain.Any);
    expect(fromU16(1)).toBe(Chain.Solana);
    expect(fromU16(0).kind).toBe('Any');
    expect(fromU16(1).kind).toBe('Solana');
  });

  it('never builds Unknown(0) or Unknown(1)', () => {
    for (let n = 0; n <= 0xffff; n++) {
      const c = fromU16(n);
      if (c.kind === 'Unknown') expect(c.value).toBeGreaterThan(1);
    }
  });

  it('returns Unknown(n) for other values', () => {
    const c = fromU16(42);
    expect(c.kind).toBe('Unknown');
    expect(c.value).toBe(42);
    expect(toU16(c)).toBe(42);
    expect(fromU16(0xffff).value).toBe(65535);
  });

  it('interns instances so equal encodings are the same object', () => {
    expect(fromU16(42)).toBe(fromU16(42));
    expect(fromU16(toU16(fromU16(777)))).toBe(fromU16(777));
  });

  it('normalizes -0 to Any', () => {
    expect(fromU16(-0)).toBe(Chain.Any);
  });

  it('rejects numbers outside the u16 domain', () => {
    for (const bad of [-1, 65536, 1.5, Number.NaN, Number.POSITIVE_INFINITY]) {
      expect(() => fromU16(bad)).toThrow(ChainIdError);
    }
    try {
      fromU16(70000);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ChainIdError);
      if (!(e instanceof ChainIdError)) return;
      expect(e.envelope.type).toBe('VALIDATION');
      expect(e.envelope.operation).toBe(OP_CHAIN.fromU16);
      expect(e.envelope.context).toEqual({ value: 70000 });
    }
  });

  it('freezes instances', () => {
    expect(Object.isFrozen(fromU16(9))).toBe(true);
    expect(Object.isFrozen(Chain.Any)).toBe(true);
  });
});

describe('chains/defaults and helpers', () => {
  it('defaults to Any', () => {
    expect(defaultChain()).toBe(Chain.Any);
    expect(Chain.default()).toBe(Chain.Any);
  });

  it('compares by encoding', () => {
    expect(chainEquals(fromU16(5), fromU16(5))).toBe(true);
    expect(chainEquals(Chain.Any, Chain.Solana)).toBe(false);
    expect(fromU16(1).equals(Chain.Solana)).toBe(true);
  });

  it('orders by encoding', () => {
    const sorted = [fromU16(300), Chain.Solana, fromU16(2), Chain.Any].sort(compareChains);
    expect(sorted.map(toU16)).toEqual([0, 1, 2, 300]);
  });

  it('recognizes chain instances', () => {
    expect(isChainInstance(Chain.Solana)).toBe(true);
    expect(isChainInstance(1)).toBe(false);
    expect(isChainInstance({ kind: 'Solana', value: 1 })).toBe(false);
  });

  it('tells named chains from unknown ones', () => {
    expect(isKnownChain(Chain.Any)).toBe(true);
    expect(isKnownChain(Chain.Solana)).toBe(true);
    expect(isKnownChain(fromU16(2))).toBe(false);
  });

  it('looks chains up by name', () => {
    expect(chainFromName('solana')).toBe(Chain.Solana);
    expect(chainFromName('any')).toBe(Chain.Any);
    expect(CHAINS).toEqual({ any: 0, solana: 1 });
  });
});

describe('chains/names', () => {
  it('maps ids back to names', () => {
    expect(CHAIN_ID_TO_NAME.get(0)).toBe('any');
    expect(CHAIN_ID_TO_NAME.get(1)).toBe('solana');
    expect(CHAIN_ID_TO_NAME.size).toBe(2);
  });

  it('names named chains and leaves Unknown unnamed', () => {
    expect(chainName(Chain.Any)).toBe('any');
    expect(chainName(Chain.Solana)).toBe('solana');
    expect(chainName(fromU16(42))).toBeUndefined();
  });

  it('inverts chainFromName', () => {
    for (const c of [Chain.Any, Chain.Solana]) {
      const name = chainName(c);
      if (name === undefined) throw new Error(`no name for ${c.toString()}`);
      expect(chainFromName(name)).toBe(c);
    }
  });

  it('guards raw strings', () => {
    expect(isChainName('solana')).toBe(true);
    expect(isChainName('any')).toBe(true);
    expect(isChainName('Solana')).toBe(false);
    expect(isChainName('unknown')).toBe(false);
    expect(isChainName('toString')).toBe(false);
  });

  it('asserts a raw string names a chain', () => {
    const raw: string = 'solana';
    assertChainName(raw);
    expect(chainFromName(raw)).toBe(Chain.Solana);

    try {
      assertChainName('solna');
      expect.unreachable();
    } catch (e) {
      if (!(e instanceof ChainIdError)) throw e;
      expect(e.envelope.type).toBe('VALIDATION');
      expect(e.envelope.operation).toBe(OP_CHAIN.name);
      expect(e.envelope.message).toBe('Unknown chain name: solna');
      expect(e.envelope.context).toEqual({ name: 'solna' });
    }
  });

  it('coalesces a chain, an id or a name', () => {
    expect(coalesceChain(Chain.Solana)).toBe(Chain.Solana);
    expect(coalesceChain(1)).toBe(Chain.Solana);
    expect(coalesceChain('solana')).toBe(Chain.Solana);
    expect(coalesceChain(42)).toBe(fromU16(42));
    expect(() => coalesceChain(70000)).toThrow(ChainIdError);
  });
});
