/**
 * Multisig Coordinator
 *
 * Drives one subnet-governance transaction from "built, no auth
 * signatures" to "fully signed and accepted", across signers that may run
 * on different machines and never share keys.
 *
 * The signed transaction carries one credential per funding input plus a
 * trailing auth credential whose slots line up with the transaction's
 * subnet-auth indices. Those indices point into the subnet's control keys,
 * which are resolved once through the ownership cache and then pinned for
 * the coordinator's lifetime.
 *
 * CreateSubnetTx is driven too. It has no subnet to authorize against yet,
 * so it carries funding credentials only and is ready once they are signed.
 *
 * Design:
 * - Funding credentials must already be complete; anything else is a
 *   malformed artifact, not a signing-in-progress state
 * - Readiness is derived from the slots, never stored
 * - Commit retries sequentially with a fixed backoff
 */

import type { Address, Network, Ownership, SubnetId } from "@subnetkit/types";
import { networkFromId } from "@subnetkit/types";
import type { CreateSubnetTx, SignedPChainTx, SubnetAuthTx } from "@subnetkit/codec";
import {
  SIGNATURE_LEN,
  cb58Encode,
  computeTxId,
  encodeSignedPChainTx,
  getSubnetAuth,
  getSubnetId,
  isAllZero,
  isSubnetAuthTx,
  unsignedBytesOf,
} from "@subnetkit/codec";
import { CommitError, MultisigError, SubmissionRejectedError } from "./errors.js";
import { readSignedTxFile, signedTxFromBytes, writeSignedTxFile } from "./exchange.js";
import { componentLogger, type Logger } from "./logger.js";
import { mergeSignedTxs } from "./merge.js";
import type { OwnershipCache } from "./ownership-cache.js";
import {
  DEFAULT_COMMIT_RETRY_POLICY,
  RetryExhaustedError,
  runWithRetry,
  type RetryPolicy,
  type SleepFn,
} from "./retry.js";
import type {
  CommitOptions,
  MultisigState,
  RemainingSigners,
  SignOptions,
  SignResult,
  SigningCapability,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

/** Kinds a coordinator accepts. */
export type CoordinatedTx = SubnetAuthTx | CreateSubnetTx;
export type CoordinatedTxType = CoordinatedTx["type"];

export interface CoordinatorDeps {
  /** Shared ownership lookups; the coordinator pins the first result */
  readonly ownership: OwnershipCache;
  readonly logger?: Logger;
  /** Default: DEFAULT_COMMIT_RETRY_POLICY */
  readonly retryPolicy?: RetryPolicy;
  /** Sleep between commit attempts (injectable for testing) */
  readonly sleep?: SleepFn;
}

interface SubnetAuthorization {
  readonly subnetId: SubnetId;
  /** Control-key index per auth slot */
  readonly indices: readonly number[];
}

function isFilled(slot: Uint8Array): boolean {
  return !isAllZero(slot);
}

// =============================================================================
// MultisigCoordinator
// =============================================================================

export class MultisigCoordinator {
  private readonly unsigned: CoordinatedTx;
  private readonly unsignedBytes: Uint8Array;
  private readonly credentials: Uint8Array[][];
  // undefined for CreateSubnetTx
  private readonly auth: SubnetAuthorization | undefined;
  private readonly cache: OwnershipCache;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleepFn: SleepFn | undefined;
  private readonly log: Logger;
  private pinnedOwnership: Promise<Ownership> | undefined;
  private committedTxId: string | undefined;

  /**
   * @throws MultisigError UNSUPPORTED_TRANSACTION for kinds other than
   *   CreateSubnetTx that carry no subnet authorization
   */
  constructor(tx: SignedPChainTx, deps: CoordinatorDeps) {
    const unsigned = tx.unsigned;
    if (unsigned.type === "CreateSubnetTx") {
      this.unsigned = unsigned;
      this.auth = undefined;
    } else {
      const subnetAuth = getSubnetAuth(unsigned);
      const subnetIdBytes = getSubnetId(unsigned);
      if (!isSubnetAuthTx(unsigned) || subnetAuth === undefined || subnetIdBytes === undefined) {
        throw new MultisigError(
          "UNSUPPORTED_TRANSACTION",
          `${unsigned.type} does not carry a subnet authorization`,
        );
      }
      this.unsigned = unsigned;
      this.auth = { subnetId: cb58Encode(subnetIdBytes), indices: [...subnetAuth.sigIndices] };
    }

    this.unsignedBytes = unsignedBytesOf(tx);
    this.credentials = tx.credentials.map((c) => c.signatures.map((s) => s.slice()));
    this.cache = deps.ownership;
    this.retryPolicy = deps.retryPolicy ?? DEFAULT_COMMIT_RETRY_POLICY;
    this.sleepFn = deps.sleep;
    this.log = componentLogger(deps.logger, "multisig-coordinator").child({
      kind: unsigned.type,
      subnetId: this.auth?.subnetId,
    });
  }

  static fromBytes(bytes: Uint8Array, deps: CoordinatorDeps): MultisigCoordinator {
    return new MultisigCoordinator(signedTxFromBytes(bytes), deps);
  }

  static async fromFile(path: string, deps: CoordinatorDeps): Promise<MultisigCoordinator> {
    return new MultisigCoordinator(await readSignedTxFile(path), deps);
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  getTxKind(): CoordinatedTxType {
    return this.unsigned.type;
  }

  getNetworkId(): number {
    return this.unsigned.baseTx.networkId;
  }

  getNetwork(): Network {
    return networkFromId(this.getNetworkId());
  }

  /** Undefined for CreateSubnetTx, whose subnet does not exist yet. */
  getSubnetId(): SubnetId | undefined {
    return this.auth?.subnetId;
  }

  getUnsignedBytes(): Uint8Array {
    return this.unsignedBytes.slice();
  }

  /** Content-derived; changes as slots are filled until committed. */
  getTxId(): string {
    return this.committedTxId ?? computeTxId(this.toBytes());
  }

  getState(): MultisigState {
    if (this.committedTxId !== undefined) return "committed";
    const slots = this.authSlots();
    const filled = slots.filter(isFilled).length;
    if (filled === slots.length) return "ready-to-commit";
    return filled === 0 ? "unsigned" : "partially-signed";
  }

  /**
   * @throws MultisigError when the credentials are malformed
   */
  isReadyToCommit(): boolean {
    this.assertWellFormed();
    return this.authSlots().every(isFilled);
  }

  /**
   * Control keys and threshold of the subnet, resolved once per coordinator.
   *
   * @throws MultisigError UNSUPPORTED_TRANSACTION for CreateSubnetTx
   */
  getSubnetOwners(): Promise<Ownership> {
    if (this.auth === undefined) {
      return Promise.reject(
        new MultisigError("UNSUPPORTED_TRANSACTION", `${this.unsigned.type} has no subnet owners yet`),
      );
    }
    if (this.pinnedOwnership === undefined) {
      const subnetId = this.auth.subnetId;
      const pending: Promise<Ownership> = this.cache.get(subnetId).catch((err: unknown) => {
        if (this.pinnedOwnership === pending) {
          this.pinnedOwnership = undefined;
        }
        throw err;
      });
      this.pinnedOwnership = pending;
    }
    return this.pinnedOwnership;
  }

  // ===========================================================================
  // Signers
  // ===========================================================================

  /**
   * Addresses required by the auth credential, slot for slot. Empty for
   * CreateSubnetTx, without an ownership lookup.
   *
   * @throws MultisigError CORRUPT_TRANSACTION for an auth index outside the
   *   control keys
   */
  async getAuthSigners(): Promise<Address[]> {
    const auth = this.auth;
    if (auth === undefined) return [];
    const { controlKeys } = await this.getSubnetOwners();
    return auth.indices.map((index, slot) => {
      const address = controlKeys[index];
      if (address === undefined) {
        throw new MultisigError(
          "CORRUPT_TRANSACTION",
          `Auth slot ${slot} refers to control key ${index}, but subnet ${auth.subnetId} has ${controlKeys.length}`,
        );
      }
      return address;
    });
  }

  /**
   * @throws MultisigError MALFORMED_PARTIAL_SIGNATURES, SLOT_COUNT_MISMATCH
   *   or CORRUPT_TRANSACTION
   */
  async getRemainingAuthSigners(): Promise<RemainingSigners> {
    this.assertWellFormed();
    const required = await this.getAuthSigners();
    const slots = this.authSlots();
    const missing = required.filter((_, slot) => {
      const sig = slots[slot];
      return sig === undefined || !isFilled(sig);
    });
    return { required, missing };
  }

  // ===========================================================================
  // Sign / Commit
  // ===========================================================================

  /**
   * Fill every empty auth slot the capability can sign, then commit if
   * asked to and the transaction is complete.
   *
   * @throws MultisigError NO_USABLE_SIGNER when `checkAuthFirst` is set and
   *   the capability can sign none of the missing slots
   * @throws MultisigError INVALID_SIGNATURE when the capability returns an
   *   empty or wrongly sized signature
   */
  async sign(signer: SigningCapability, options: SignOptions = {}): Promise<SignResult> {
    const checkAuthFirst = options.checkAuthFirst ?? true;
    const { required, missing } = await this.getRemainingAuthSigners();
    const slots = this.authSlots();
    const credentialIndex = this.credentials.length - 1;

    const signable = required
      .map((address, signatureIndex) => ({ address, signatureIndex }))
      .filter(({ address, signatureIndex }) => {
        const sig = slots[signatureIndex];
        return sig !== undefined && !isFilled(sig) && signer.canSign(address);
      });

    if (checkAuthFirst && missing.length > 0 && signable.length === 0) {
      throw new MultisigError(
        "NO_USABLE_SIGNER",
        `None of the missing signers (${missing.join(", ")}) can be signed for`,
      );
    }

    for (const { address, signatureIndex } of signable) {
      const signature = await signer.signSlot({
        unsignedTx: this.unsigned,
        unsignedBytes: this.unsignedBytes.slice(),
        credentialIndex,
        signatureIndex,
        address,
      });
      if (signature.length !== SIGNATURE_LEN || !isFilled(signature)) {
        throw new MultisigError(
          "INVALID_SIGNATURE",
          `Signer returned an unusable signature for ${address} (${signature.length} bytes)`,
        );
      }
      slots[signatureIndex] = signature.slice();
      this.log.debug({ address, signatureIndex }, "auth slot signed");
    }

    const ready = this.isReadyToCommit();
    this.log.debug(
      { signedSlots: signable.length, remaining: missing.length - signable.length },
      "signing pass complete",
    );

    if (ready && options.commit !== undefined) {
      const txId = await this.commit(options.commit);
      return { ready, committed: true, txId, signedSlots: signable.length };
    }

    return {
      ready,
      committed: this.committedTxId !== undefined,
      txId: this.getTxId(),
      signedSlots: signable.length,
    };
  }

  /**
   * Submit the fully signed transaction.
   *
   * Returns the transaction ID. After one successful commit, later calls
   * return the same ID without resubmitting.
   *
   * @throws MultisigError NOT_FULLY_SIGNED before any submission when an
   *   auth slot is still empty
   * @throws CommitError when every attempt fails
   */
  async commit(options: CommitOptions): Promise<string> {
    if (this.committedTxId !== undefined) {
      this.log.debug({ txId: this.committedTxId }, "already committed");
      return this.committedTxId;
    }
    if (!this.isReadyToCommit()) {
      const empty = this.authSlots().filter((s) => !isFilled(s)).length;
      throw new MultisigError(
        "NOT_FULLY_SIGNED",
        `Cannot commit: ${empty} auth signature(s) missing`,
      );
    }

    const signedBytes = this.toBytes();
    const txId = computeTxId(signedBytes);
    const waitForAcceptance = options.waitForAcceptance ?? true;
    const { attemptTimeoutMs } = this.retryPolicy;

    try {
      await runWithRetry(
        async (signal, attempt) => {
          this.log.info({ txId, attempt }, "submitting transaction");
          const result = await options.submitter.submit(signedBytes.slice(), {
            timeoutMs: attemptTimeoutMs,
            waitForAcceptance,
            signal,
          });
          if (!result.accepted) {
            throw new SubmissionRejectedError(result.reason);
          }
        },
        this.retryPolicy,
        {
          sleep: this.sleepFn,
          onAttemptFailed: ({ attempt, error, timedOut }) => {
            this.log.warn({ txId, attempt, timedOut, err: error }, "submission attempt failed");
          },
        },
      );
    } catch (err: unknown) {
      if (err instanceof RetryExhaustedError) {
        this.log.error({ txId, attempts: err.attempts, timedOut: err.timedOut }, "commit failed");
        throw new CommitError(txId, err.attempts, err.timedOut, err.lastError);
      }
      throw err;
    }

    this.committedTxId = txId;
    this.log.info({ txId }, "transaction committed");
    return txId;
  }

  // ===========================================================================
  // Exchange
  // ===========================================================================

  toSignedTx(): SignedPChainTx {
    return {
      unsigned: this.unsigned,
      credentials: this.credentials.map((slots) => ({
        signatures: slots.map((s) => s.slice()),
      })),
    };
  }

  toBytes(): Uint8Array {
    return encodeSignedPChainTx(this.toSignedTx());
  }

  async toFile(path: string): Promise<void> {
    await writeSignedTxFile(path, this.toSignedTx());
  }

  /**
   * Fold in the signatures of another copy of the same transaction.
   *
   * @throws MultisigError MERGE_CONFLICT for a different transaction or a
   *   different credential shape
   */
  merge(other: MultisigCoordinator | SignedPChainTx): void {
    const theirs = other instanceof MultisigCoordinator ? other.toSignedTx() : other;
    const merged = mergeSignedTxs(this.toSignedTx(), theirs);
    merged.credentials.forEach((credential, i) => {
      this.credentials[i] = credential.signatures.map((s) => s.slice());
    });
    this.log.debug({ state: this.getState() }, "merged signatures");
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private authSlots(): Uint8Array[] {
    if (this.auth === undefined) return [];
    return this.credentials[this.credentials.length - 1] ?? [];
  }

  /**
   * Funding credentials complete, one per input, and an auth credential
   * sized to the auth indices unless the kind has none.
   */
  private assertWellFormed(): void {
    const inputs = this.unsigned.baseTx.inputs;
    const authCount = this.auth === undefined ? 0 : 1;
    const expected = inputs.length + authCount;
    if (this.credentials.length !== expected) {
      throw new MultisigError(
        "MALFORMED_PARTIAL_SIGNATURES",
        `Expected ${expected} credentials (${inputs.length} funding + ${authCount} auth), found ${this.credentials.length}`,
      );
    }

    inputs.forEach((input, i) => {
      const slots = this.credentials[i] ?? [];
      if (slots.length !== input.input.sigIndices.length) {
        throw new MultisigError(
          "MALFORMED_PARTIAL_SIGNATURES",
          `Funding credential ${i} has ${slots.length} slots for ${input.input.sigIndices.length} signers`,
        );
      }
      if (!slots.every(isFilled)) {
        throw new MultisigError(
          "MALFORMED_PARTIAL_SIGNATURES",
          `Funding credential ${i} is not fully signed`,
        );
      }
    });

    if (this.auth === undefined) return;
    const authSlots = this.authSlots().length;
    if (authSlots !== this.auth.indices.length) {
      throw new MultisigError(
        "SLOT_COUNT_MISMATCH",
        `Auth credential has ${authSlots} slots but the transaction requires ${this.auth.indices.length} signers`,
      );
    }
  }
}
