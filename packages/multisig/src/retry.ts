/**
 * Fixed-backoff retry with per-attempt deadlines.
 *
 * Attempts run strictly one after another. Each gets its own AbortSignal
 * that fires when the attempt's deadline expires; an attempt still pending
 * at its deadline fails with AttemptTimeoutError whether or not the work
 * honours the signal.
 */

/**
 * Retry policy for commit submission.
 */
export interface RetryPolicy {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
  /** Fixed delay in ms between attempts. Default: 2000 */
  readonly backoffMs: number;
  /** Deadline in ms for a single attempt. Default: 120000 */
  readonly attemptTimeoutMs: number;
}

export const DEFAULT_COMMIT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 2_000,
  attemptTimeoutMs: 120_000,
};

export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class AttemptTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

export interface AttemptFailure {
  /** One-based attempt number */
  readonly attempt: number;
  readonly error: unknown;
  readonly timedOut: boolean;
}

/**
 * Thrown when all attempts fail.
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
    /** Whether the last attempt hit its deadline */
    public readonly timedOut: boolean,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} attempts exhausted. Last error: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}

export interface RunWithRetryOptions {
  readonly sleep?: SleepFn;
  readonly onAttemptFailed?: (failure: AttemptFailure) => void;
}

/**
 * Run `fn` under a deadline. The signal passed to `fn` aborts at the
 * deadline with an AttemptTimeoutError as its reason.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<{ value: T } | { error: unknown; timedOut: boolean }> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const reason = new AttemptTimeoutError(timeoutMs);
      controller.abort(reason);
      reject(reason);
    }, timeoutMs);
  });

  try {
    const value = await Promise.race([fn(controller.signal), deadline]);
    return { value };
  } catch (error: unknown) {
    return { error, timedOut: controller.signal.aborted };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Execute `fn` until it succeeds or the policy's attempts run out.
 *
 * @throws RetryExhaustedError carrying the last failure
 */
export async function runWithRetry<T>(
  fn: (signal: AbortSignal, attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_COMMIT_RETRY_POLICY,
  options: RunWithRetryOptions = {},
): Promise<T> {
  const sleepFn = options.sleep ?? sleep;
  let lastError: unknown;
  let lastTimedOut = false;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    const outcome = await withDeadline((signal) => fn(signal, attempt), policy.attemptTimeoutMs);
    if ("value" in outcome) {
      return outcome.value;
    }

    lastError = outcome.error;
    lastTimedOut = outcome.timedOut;
    options.onAttemptFailed?.({ attempt, error: outcome.error, timedOut: outcome.timedOut });

    if (attempt < policy.maxAttempts) {
      await sleepFn(policy.backoffMs);
    }
  }

  throw new RetryExhaustedError(policy.maxAttempts, lastError, lastTimedOut);
}
