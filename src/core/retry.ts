import {
  PermanentRemoteError,
  RemoteOperationFailed,
  TransientRemoteError,
  errorMessage,
} from "../types/errors";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 5_000,
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelayMs(attempt: number, policy: RetryPolicy): number {
  const base = policy.baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(base, policy.maxDelayMs);
}

/**
 * Runs `fn` until it succeeds, retrying only on {@link TransientRemoteError}.
 * Exhausting the attempts turns the last transient error into
 * {@link RemoteOperationFailed}; permanent and unexpected errors propagate untouched.
 */
export async function withRetry<T>(
  label: string,
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Promise<T> {
  const wait = policy.sleep ?? sleep;
  let attempt = 1;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof PermanentRemoteError || !(error instanceof TransientRemoteError)) {
        throw error;
      }

      if (attempt >= policy.maxAttempts) {
        throw new RemoteOperationFailed(
          `${label} failed after ${attempt} attempt(s): ${errorMessage(error)}`,
          attempt,
          { cause: error }
        );
      }

      const delay =
        error.retryAfterMs !== undefined
          ? Math.min(error.retryAfterMs, policy.maxDelayMs)
          : backoffDelayMs(attempt, policy);
      await wait(delay);
      attempt += 1;
    }
  }
}
