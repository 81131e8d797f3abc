// src/encoding/wire.ts
import { fromU16, toU16, type Chain } from '../chains/chain';
import type { Hex } from '../core/types/primitives';
import { OP_WIRE } from '../core/types/errors';
import { createError, shapeCause } from '../core/errors/factory';
import { bytesToHex, hexToBytes } from '../internal/hex';

/** Width of a chain id in binary framing. */
export const CHAIN_BYTES = 2;

export type Endian = 'big' | 'little';

export interface WireOptions {
  /** Byte order of the embedding frame. Defaults to `'big'` (network order). */
  endian?: Endian;
}

/**
 * Encode a chain as its 2-byte wire value.
 *
 * The chain id contract is the integer; byte order belongs to the frame that
 * embeds it, hence the `endian` option.
 *
 * @example
 * encodeChain(Chain.Solana);                       // Uint8Array [0x00, 0x01]
 * encodeChain(Chain.Solana, { endian: 'little' }); // Uint8Array [0x01, 0x00]
 */
export function encodeChain(chain: Chain, opts: WireOptions = {}): Uint8Array {
  const out = new Uint8Array(CHAIN_BYTES);
  new DataView(out.buffer).setUint16(0, toU16(chain), opts.endian === 'little');
  return out;
}

/**
 * Read a chain id from `bytes` at `offset`.
 *
 * @throws ChainIdError (`VALIDATION`) if fewer than two bytes are available at `offset`.
 */
export function decodeChain(bytes: Uint8Array, offset = 0, opts: WireOptions = {}): Chain {
  if (!Number.isInteger(offset) || offset < 0 || offset + CHAIN_BYTES > bytes.length) {
    throw createError('VALIDATION', {
      resource: 'wire',
      operation: OP_WIRE.decode,
      message: `Need ${CHAIN_BYTES} bytes to read a chain id.`,
      context: { offset, length: bytes.length },
    });
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return fromU16(view.getUint16(offset, opts.endian === 'little'));
}

export function encodeChainHex(chain: Chain, opts: WireOptions = {}): Hex {
  return bytesToHex(encodeChain(chain, opts));
}

export function decodeChainHex(hex: string, opts: WireOptions = {}): Chain {
  let bytes: Uint8Array;
  try {
    bytes = hexToBytes(hex);
  } catch (e) {
    throw createError('VALIDATION', {
      resource: 'wire',
      operation: OP_WIRE.decodeHex,
      message: 'Malformed hex for chain id.',
      context: { hex },
      cause: shapeCause(e),
    });
  }
  if (bytes.length !== CHAIN_BYTES) {
    throw createError('VALIDATION', {
      resource: 'wire',
      operation: OP_WIRE.decodeHex,
      message: `Expected exactly ${CHAIN_BYTES} bytes for a chain id.`,
      context: { hex, length: bytes.length },
    });
  }
  return decodeChain(bytes, 0, opts);
}
