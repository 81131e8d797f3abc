// Primitive types shared by the chain modules.

/** Unsigned 16-bit integer, `0..=65535`. */
export type U16 = number;

export type Hex = `0x${string}`;

/** Variant tag of a {@link Chain}. */
export type ChainKind = 'Any' | 'Solana' | 'Unknown';
