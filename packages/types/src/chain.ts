/**
 * Chain Types
 *
 * The platform runs three chains that share one account model but
 * serialize their transactions in different binary formats:
 *
 * - P: platform chain (subnets, validators, L1s)
 * - X: exchange chain (assets, UTXO transfers)
 * - C: contract chain (atomic import/export only)
 */

/**
 * Chain a transaction belongs to. "undefined" means the bytes could not be
 * attributed to exactly one chain.
 */
export type ChainTag = "P" | "X" | "C" | "undefined";

/** A chain tag that names an actual chain. */
export type DefinedChainTag = Exclude<ChainTag, "undefined">;

export const UNDEFINED_CHAIN = "undefined" satisfies ChainTag;

export const DEFINED_CHAIN_TAGS: readonly DefinedChainTag[] = ["P", "X", "C"];

/**
 * Numeric network identifier embedded in every transaction.
 * 0 is never assigned and means "unknown".
 */
export type NetworkId = number;

export const UNKNOWN_NETWORK_ID: NetworkId = 0;

/**
 * Formatted address: `<chain alias>-<bech32(hrp, shortId)>`,
 * e.g. "P-fuji1...".
 */
export type Address = string;

/** CB58-encoded 32-byte identifier (subnet, chain, transaction). */
export type Cb58Id = string;

export type SubnetId = Cb58Id;

export type TxId = Cb58Id;
