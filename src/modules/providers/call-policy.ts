import { ProviderTimeoutError, toGenerationFailure } from "./errors.js";

export interface CallPolicy {
  timeoutMs: number;
  /** Delay before the single retry of a transient network failure. */
  retryDelayMs: number;
}

export const DEFAULT_CALL_POLICY: CallPolicy = {
  timeoutMs: 15000,
  retryDelayMs: 500
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `operation` with an abort signal and rejects with ProviderTimeoutError
 * once `timeoutMs` elapses, whether or not the operation honours the signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new ProviderTimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

/**
 * Bounded provider call: timeout on every attempt, and one retry with backoff
 * only when the failure is a retryable transient (network / 5xx) one. Rejects
 * with a GenerationFailure.
 */
export async function callWithPolicy<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  policy: CallPolicy,
  label: string
): Promise<T> {
  try {
    return await withTimeout(operation, policy.timeoutMs, label);
  } catch (error) {
    const failure = toGenerationFailure(error);
    if (!failure.retryable) {
      throw failure;
    }
  }

  await delay(policy.retryDelayMs);
  try {
    return await withTimeout(operation, policy.timeoutMs, label);
  } catch (error) {
    throw toGenerationFailure(error);
  }
}
