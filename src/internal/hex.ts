// src/internal/hex.ts
import { hexToBytes as nobleHexToBytes, bytesToHex as nobleBytesToHex } from '@noble/hashes/utils';
import type { Hex } from '../core/types/primitives';

export const strip0x = (h: string) => (h.startsWith('0x') || h.startsWith('0X') ? h.slice(2) : h);

export const hexToBytes = (h: string): Uint8Array => nobleHexToBytes(strip0x(h));
export const bytesToHex = (u8: Uint8Array): Hex => `0x${nobleBytesToHex(u8)}`;
