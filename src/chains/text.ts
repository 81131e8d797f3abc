// src/chains/text.ts
import { Chain } from './chain';
import { InvalidChainError, isChainIdError, type TryResult } from '../core/types/errors';
import { isU16 } from '../core/validation';

// Same shape an unsigned integer parser takes: optional plus sign, decimal digits.
const UINT_RE = /^\+?[0-9]+$/;

function eqIgnoreAsciiCase(s: string, lower: string): boolean {
  return s.length === lower.length && s.replace(/[A-Z]/g, (c) => c.toLowerCase()) === lower;
}

export function formatChain(chain: Chain): string {
  return chain.toString();
}

/**
 * Parse the textual form of a chain.
 *
 * Accepts `any` and `solana` in any ASCII case, and `unknown(<n>)` with the
 * keyword in any case and `n` a decimal `u16`. The number goes through
 * {@link Chain.fromU16}, so `Unknown(1)` parses to `Solana`.
 *
 * @throws InvalidChainError carrying `input` unchanged.
 */
export function parseChain(input: string): Chain {
  if (eqIgnoreAsciiCase(input, 'any')) return Chain.Any;
  if (eqIgnoreAsciiCase(input, 'solana')) return Chain.Solana;

  const [name, num] = input.split(/[()]/);
  if (name === undefined || !eqIgnoreAsciiCase(name, 'unknown')) {
    throw new InvalidChainError(input);
  }
  if (num === undefined || !UINT_RE.test(num)) throw new InvalidChainError(input);

  const n = Number(num);
  if (!isU16(n)) throw new InvalidChainError(input);
  return Chain.fromU16(n);
}

export function tryParseChain(input: string): TryResult<Chain> {
  try {
    return { ok: true, value: parseChain(input) };
  } catch (e) {
    if (isChainIdError(e)) return { ok: false, error: e };
    throw e;
  }
}
