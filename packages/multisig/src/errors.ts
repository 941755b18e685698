/**
 * Multisig errors.
 *
 * Structural problems, caller contract violations and unusable signers are
 * `MultisigError`s distinguished by `code`. Submission that fails after the
 * whole retry budget is a `CommitError`, which keeps the transaction ID so
 * the caller can poll for eventual acceptance.
 */

export type MultisigErrorCode =
  | "CORRUPT_TRANSACTION"
  | "SLOT_COUNT_MISMATCH"
  | "MALFORMED_PARTIAL_SIGNATURES"
  | "UNSUPPORTED_TRANSACTION"
  | "NO_USABLE_SIGNER"
  | "NOT_FULLY_SIGNED"
  | "OWNERSHIP_UNAVAILABLE"
  | "MERGE_CONFLICT"
  | "INVALID_SIGNATURE"
  | "INVALID_PRIVATE_KEY";

export class MultisigError extends Error {
  public readonly code: MultisigErrorCode;

  constructor(code: MultisigErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MultisigError";
    this.code = code;
  }
}

/**
 * Thrown when every commit attempt failed.
 */
export class CommitError extends Error {
  constructor(
    /** Content-derived ID of the transaction that was submitted */
    public readonly txId: string,
    /** Number of attempts made */
    public readonly attempts: number,
    /** Whether the last attempt failed because its deadline expired */
    public readonly timedOut: boolean,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Commit of ${txId} failed after ${attempts} attempt(s)${timedOut ? " (timed out)" : ""}: ${reason}`,
      { cause },
    );
    this.name = "CommitError";
  }
}

/**
 * The submission capability answered but did not accept the transaction.
 */
export class SubmissionRejectedError extends Error {
  constructor(public readonly reason: string | undefined) {
    super(`Transaction rejected${reason === undefined ? "" : `: ${reason}`}`);
    this.name = "SubmissionRejectedError";
  }
}
