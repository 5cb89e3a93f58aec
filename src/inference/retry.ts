import { setTimeout as sleep } from 'timers/promises';
import { ModerationAbortedError, ProviderError } from '../errors.js';

export interface RetryPolicy {
  /** Additional attempts after the first one */
  retries: number;
  /** Per-attempt ceiling in milliseconds */
  attemptTimeoutMs: number;
  /** Base delay between attempts; grows linearly with the attempt number */
  delayMs: number;
}

export interface AttemptFailure {
  attempt: number;
  error: ProviderError;
}

export interface RetryOptions {
  /** Caller cancellation */
  signal?: AbortSignal;
  /** Absolute epoch-ms after which no attempt may start or continue */
  deadline?: number;
  /** Label used in abort errors */
  stage?: string;
  onAttemptFailed?: (failure: AttemptFailure) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 2,
  attemptTimeoutMs: 15000,
  delayMs: 250
};

export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  if (error instanceof Error) return new ProviderError(error.message, false, undefined, { cause: error });
  return new ProviderError(String(error), false);
}

// Rejects as soon as the signal fires, even if the wrapped call ignores it
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

async function runAttempt<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(outer?.reason);
  outer?.addEventListener('abort', forwardAbort, { once: true });

  const timer = setTimeout(() => {
    controller.abort(new ProviderError(`Attempt timed out after ${timeoutMs}ms`, true));
  }, timeoutMs);

  try {
    return await abortable(operation(controller.signal), controller.signal);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Runs `operation` with a timeout per attempt, retrying only failures marked
 * retryable. Throws the last ProviderError once attempts or the deadline run
 * out, or ModerationAbortedError if the caller cancels.
 */
export async function withRetry<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const { signal, deadline, stage = 'provider call', onAttemptFailed } = options;
  const maxAttempts = Math.max(1, policy.retries + 1);
  let lastError: ProviderError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) throw new ModerationAbortedError(stage);

    const remaining = deadline === undefined ? Infinity : deadline - Date.now();
    if (remaining <= 0) {
      throw lastError ?? new ProviderError('Time budget exhausted before the first attempt', false);
    }

    try {
      return await runAttempt(operation, Math.min(policy.attemptTimeoutMs, remaining), signal);
    } catch (error) {
      if (signal?.aborted) throw new ModerationAbortedError(stage);

      lastError = toProviderError(error);
      onAttemptFailed?.({ attempt, error: lastError });

      if (!lastError.retryable || attempt === maxAttempts) break;

      const delay = policy.delayMs * attempt;
      // No backoff into the deadline; what is left goes back to the caller
      if (deadline !== undefined && Date.now() + delay >= deadline) break;
      if (delay > 0) {
        try {
          await sleep(delay, undefined, { signal });
        } catch {
          throw new ModerationAbortedError(stage);
        }
      }
    }
  }

  throw lastError ?? new ProviderError('No attempt was made', false);
}
