/**
 * @subnetkit/multisig
 *
 * Multi-party authorization of subnet-governance transactions: signer
 * tracking, commit with retry, offline exchange and merge.
 */

// Coordinator
export { MultisigCoordinator } from "./coordinator.js";
export type { CoordinatorDeps, CoordinatedTx, CoordinatedTxType } from "./coordinator.js";

// Capabilities and results
export type {
  OwnershipResolver,
  SigningCapability,
  SlotSigningRequest,
  SubmissionCapability,
  SubmitOptions,
  SubmitResult,
  MultisigState,
  RemainingSigners,
  CommitOptions,
  SignOptions,
  SignResult,
} from "./types.js";

// Errors
export { MultisigError, CommitError, SubmissionRejectedError } from "./errors.js";
export type { MultisigErrorCode } from "./errors.js";

// Ownership
export { OwnershipCache } from "./ownership-cache.js";
export { InMemoryOwnershipResolver } from "./in-memory-resolver.js";

// Retry
export {
  runWithRetry,
  withDeadline,
  sleep,
  DEFAULT_COMMIT_RETRY_POLICY,
  AttemptTimeoutError,
  RetryExhaustedError,
} from "./retry.js";
export type { RetryPolicy, SleepFn, AttemptFailure, RunWithRetryOptions } from "./retry.js";

// Exchange and merge
export {
  signedTxToBytes,
  signedTxFromBytes,
  signedTxToText,
  signedTxFromText,
  writeSignedTxFile,
  readSignedTxFile,
} from "./exchange.js";
export { mergeSignedTxs, mergeCredentials, mergeSlot } from "./merge.js";

// Keys
export {
  SoftKeychain,
  parsePrivateKey,
  formatPrivateKey,
  recoverSigner,
  shortIdFromPublicKey,
} from "./soft-keychain.js";

// Configuration and logging
export { ConfigSchema, loadConfig, retryPolicyFromConfig } from "./config.js";
export type { MultisigConfig } from "./config.js";
export { createLogger, componentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
