/**
 * Subnet Ownership
 *
 * A subnet is governed by an ordered list of control keys and a threshold.
 * The order defines the index space that a transaction's subnet
 * authorization refers to.
 */

import type { Address } from "./chain.js";

export interface Ownership {
  /** Control-key addresses, unique and order-significant */
  readonly controlKeys: readonly Address[];

  /** Number of control-key signatures required to authorize a change */
  readonly threshold: number;
}
