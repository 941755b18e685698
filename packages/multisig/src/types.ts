/**
 * Capabilities the coordinator consumes, and the values it returns.
 */

import type { Address, Ownership, SubnetId } from "@subnetkit/types";
import type { PChainUnsignedTx } from "@subnetkit/codec";

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Looks up a subnet's control keys and threshold on chain.
 * Rejects when the subnet is unknown or the query fails.
 */
export interface OwnershipResolver {
  resolve(subnetId: SubnetId): Promise<Ownership>;
}

/**
 * One auth slot to be signed.
 */
export interface SlotSigningRequest {
  readonly unsignedTx: PChainUnsignedTx;
  /** Exact unsigned bytes; signatures cover their sha256 */
  readonly unsignedBytes: Uint8Array;
  readonly credentialIndex: number;
  readonly signatureIndex: number;
  /** Control key expected to produce this slot's signature */
  readonly address: Address;
}

export interface SigningCapability {
  canSign(address: Address): boolean;
  /** Resolves to the 65-byte recoverable signature for the slot. */
  signSlot(request: SlotSigningRequest): Promise<Uint8Array>;
}

export interface SubmitOptions {
  /** Deadline of this attempt */
  readonly timeoutMs: number;
  /** Wait until the network reports the transaction accepted */
  readonly waitForAcceptance: boolean;
  /** Aborted when the attempt's deadline expires */
  readonly signal: AbortSignal;
}

export interface SubmitResult {
  readonly accepted: boolean;
  /** Rejection reason reported by the network, if any */
  readonly reason?: string;
}

export interface SubmissionCapability {
  submit(signedTx: Uint8Array, options: SubmitOptions): Promise<SubmitResult>;
}

// =============================================================================
// Results
// =============================================================================

export type MultisigState = "unsigned" | "partially-signed" | "ready-to-commit" | "committed";

export interface RemainingSigners {
  /** Auth signers, position for position with the auth credential's slots */
  readonly required: readonly Address[];
  /** Signers whose slot is still empty, in slot order */
  readonly missing: readonly Address[];
}

export interface CommitOptions {
  readonly submitter: SubmissionCapability;
  /** Default: true */
  readonly waitForAcceptance?: boolean;
}

export interface SignOptions {
  /** Fail with NO_USABLE_SIGNER before signing when nothing can be contributed. Default: true */
  readonly checkAuthFirst?: boolean;
  /** Commit right away when signing completes the transaction */
  readonly commit?: CommitOptions;
}

export interface SignResult {
  readonly ready: boolean;
  readonly committed: boolean;
  readonly txId: string;
  /** Number of slots filled by this call */
  readonly signedSlots: number;
}
