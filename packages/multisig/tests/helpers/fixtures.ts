/**
 * Shared multisig fixtures: three control keys on fuji, a CreateChainTx
 * with one signed funding input and an auth credential sized to the given
 * indices.
 */

import { vi } from "vitest";
import type { Mock } from "vitest";
import type { Ownership } from "@subnetkit/types";
import { EMPTY_SIGNATURE, cb58Encode } from "@subnetkit/codec";
import type { CreateChainTx, CreateSubnetTx, SignedPChainTx } from "@subnetkit/codec";
import { InMemoryOwnershipResolver } from "../../src/in-memory-resolver.js";
import { OwnershipCache } from "../../src/ownership-cache.js";
import { SoftKeychain } from "../../src/soft-keychain.js";
import type { CoordinatorDeps } from "../../src/coordinator.js";
import type { RetryPolicy } from "../../src/retry.js";
import type { SubmissionCapability, SubmitOptions, SubmitResult } from "../../src/types.js";

export const filled = (length: number, byte: number): Uint8Array => new Uint8Array(length).fill(byte);

export const SUBNET_ID_BYTES = filled(32, 0x66);
export const SUBNET_ID = cb58Encode(SUBNET_ID_BYTES);

export const KEYCHAIN0 = new SoftKeychain([filled(32, 1)]);
export const KEYCHAIN1 = new SoftKeychain([filled(32, 2)]);
export const KEYCHAIN2 = new SoftKeychain([filled(32, 3)]);

function firstAddress(keychain: SoftKeychain): string {
  const [address] = keychain.addresses("P", "fuji");
  if (address === undefined) throw new Error("empty keychain");
  return address;
}

export const KEY0 = firstAddress(KEYCHAIN0);
export const KEY1 = firstAddress(KEYCHAIN1);
export const KEY2 = firstAddress(KEYCHAIN2);

export const OWNERSHIP: Ownership = { controlKeys: [KEY0, KEY1, KEY2], threshold: 2 };

export function createChainTx(authIndices: number[], networkId = 5): CreateChainTx {
  return {
    type: "CreateChainTx",
    baseTx: {
      networkId,
      blockchainId: filled(32, 0x00),
      outputs: [],
      inputs: [
        {
          utxoId: { txId: filled(32, 0x44), outputIndex: 0 },
          assetId: filled(32, 0x11),
          input: { amount: 1_000_000n, sigIndices: [0] },
        },
      ],
      memo: new Uint8Array(0),
    },
    subnetId: SUBNET_ID_BYTES,
    chainName: "testchain",
    vmId: filled(32, 0x77),
    fxIds: [],
    genesisData: Uint8Array.of(0x7b, 0x7d),
    subnetAuth: { sigIndices: authIndices },
  };
}

export function createSubnetTx(networkId = 5): CreateSubnetTx {
  return {
    type: "CreateSubnetTx",
    baseTx: createChainTx([], networkId).baseTx,
    owner: { locktime: 0n, threshold: 2, addresses: [filled(20, 1), filled(20, 2)] },
  };
}

/** Funding credential only; there is no auth credential. */
export function signedCreateSubnetTx(): SignedPChainTx {
  return { unsigned: createSubnetTx(), credentials: [{ signatures: [filled(65, 0xf0)] }] };
}

/** Funding credential filled, auth slots empty. */
export function freshSignedTx(authIndices: number[] = [0, 2]): SignedPChainTx {
  return {
    unsigned: createChainTx(authIndices),
    credentials: [
      { signatures: [filled(65, 0xf0)] },
      { signatures: authIndices.map(() => EMPTY_SIGNATURE) },
    ],
  };
}

export interface TestDeps extends CoordinatorDeps {
  readonly resolver: InMemoryOwnershipResolver;
  readonly sleep: Mock<[number], Promise<void>>;
}

export const TEST_POLICY: RetryPolicy = { maxAttempts: 3, backoffMs: 2_000, attemptTimeoutMs: 50 };

/** Fixed 2 s backoff with a short attempt deadline; sleeps return at once. */
export function makeDeps(retryPolicy: RetryPolicy = TEST_POLICY): TestDeps {
  const resolver = new InMemoryOwnershipResolver([[SUBNET_ID, OWNERSHIP]]);
  return {
    resolver,
    ownership: new OwnershipCache(resolver),
    retryPolicy,
    sleep: vi.fn(async (_ms: number) => {}),
  };
}

/** Resolves the way each scripted step says, one step per call. */
export type SubmitStep = "timeout" | "accept" | "reject" | Error;

export function scriptedSubmitter(steps: SubmitStep[]): SubmissionCapability & {
  submit: Mock<[Uint8Array, SubmitOptions], Promise<SubmitResult>>;
} {
  let call = 0;
  const submit = vi.fn<[Uint8Array, SubmitOptions], Promise<SubmitResult>>(
    (_bytes, options) => {
      const step = steps[Math.min(call, steps.length - 1)] ?? "accept";
      call++;
      if (step === "timeout") {
        return new Promise<SubmitResult>((_, reject) => {
          options.signal.addEventListener("abort", () => reject(options.signal.reason));
        });
      }
      if (step === "accept") return Promise.resolve({ accepted: true });
      if (step === "reject") return Promise.resolve({ accepted: false, reason: "conflict" });
      return Promise.reject(step);
    },
  );
  return { submit };
}
