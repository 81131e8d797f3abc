/** @packageDocumentation
 * Public API for the chain identifier library.
 */

// ---- Chain identifier ----
export {
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
} from './chains/chain';
export type { ChainName } from './chains/chain';

// ---- Text / structured forms ----
export { formatChain, parseChain, tryParseChain } from './chains/text';
export { serializeChain, deserializeChain, chainReviver } from './chains/serde';

// ---- Wire helpers ----
export * from './encoding/wire';

// ---- Errors, validation, shared types ----
export * from './core';
