/**
 * @subnetkit/types
 *
 * Shared primitives for chains, networks and subnet ownership.
 */

export type {
  ChainTag,
  DefinedChainTag,
  NetworkId,
  Address,
  Cb58Id,
  SubnetId,
  TxId,
} from "./chain.js";
export {
  UNDEFINED_CHAIN,
  DEFINED_CHAIN_TAGS,
  UNKNOWN_NETWORK_ID,
} from "./chain.js";

export type { Ownership } from "./ownership.js";

export type { Network, NetworkKind } from "./network.js";
export {
  networkFromId,
  hrpFromNetworkId,
  FALLBACK_HRP,
  MAINNET_ID,
  CASCADE_ID,
  DENALI_ID,
  EVEREST_ID,
  FUJI_ID,
  UNIT_TEST_ID,
  LOCAL_ID,
} from "./network.js";

export {
  isChainTag,
  isDefinedChainTag,
  isNetworkId,
  isAddress,
  isOwnership,
} from "./guards.js";
