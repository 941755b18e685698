/**
 * Network catalogue.
 *
 * Maps the numeric network ID embedded in transactions to the
 * human-readable part (HRP) used in bech32 addresses.
 */

import type { NetworkId } from "./chain.js";

export type NetworkKind = "mainnet" | "fuji" | "local" | "undefined";

export interface Network {
  readonly kind: NetworkKind;
  readonly id: NetworkId;
  readonly name: string;
  readonly hrp: string;
}

export const MAINNET_ID = 1;
export const CASCADE_ID = 2;
export const DENALI_ID = 3;
export const EVEREST_ID = 4;
export const FUJI_ID = 5;
export const UNIT_TEST_ID = 10;
export const LOCAL_ID = 12345;

/** HRP used for any network ID outside the catalogue. */
export const FALLBACK_HRP = "custom";

const KNOWN_NETWORKS: ReadonlyMap<NetworkId, Network> = new Map<NetworkId, Network>([
  [MAINNET_ID, { kind: "mainnet", id: MAINNET_ID, name: "mainnet", hrp: "avax" }],
  [CASCADE_ID, { kind: "undefined", id: CASCADE_ID, name: "cascade", hrp: "cascade" }],
  [DENALI_ID, { kind: "undefined", id: DENALI_ID, name: "denali", hrp: "denali" }],
  [EVEREST_ID, { kind: "undefined", id: EVEREST_ID, name: "everest", hrp: "everest" }],
  [FUJI_ID, { kind: "fuji", id: FUJI_ID, name: "fuji", hrp: "fuji" }],
  [UNIT_TEST_ID, { kind: "undefined", id: UNIT_TEST_ID, name: "testing", hrp: "testing" }],
  [LOCAL_ID, { kind: "local", id: LOCAL_ID, name: "local", hrp: "local" }],
]);

/**
 * Resolve a network ID to its catalogue entry.
 * Unknown IDs yield kind "undefined" with the fallback HRP.
 */
export function networkFromId(id: NetworkId): Network {
  return (
    KNOWN_NETWORKS.get(id) ?? {
      kind: "undefined",
      id,
      name: `network-${id}`,
      hrp: FALLBACK_HRP,
    }
  );
}

export function hrpFromNetworkId(id: NetworkId): string {
  return networkFromId(id).hrp;
}
