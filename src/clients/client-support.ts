export type HealthStatus = "ok" | "error";

export interface ClientHealth {
  status: HealthStatus;
  details?: string;
}

export interface LazySingleton<T> {
  get(): Promise<T>;
  /** The instance, when initialization has already succeeded. */
  current(): T | null;
  reset(): void;
}

/**
 * Concurrent callers share one initialization. A rejected initialization is
 * forgotten so the next call connects again.
 */
export function lazySingleton<T>(initialize: () => Promise<T>): LazySingleton<T> {
  let instance: T | null = null;
  let pending: Promise<T> | null = null;

  return {
    async get() {
      if (instance) {
        return instance;
      }
      if (!pending) {
        pending = initialize();
      }
      const attempt = pending;
      try {
        instance = await attempt;
        return instance;
      } catch (error) {
        if (pending === attempt) {
          pending = null;
        }
        throw error;
      }
    },
    current() {
      return instance;
    },
    reset() {
      instance = null;
      pending = null;
    }
  };
}

export interface StartupRetryOptions {
  attempts: number;
  /** Multiplied by the attempt number before the next try. */
  delayMs: number;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export async function retryOnStartup<T>(operation: () => Promise<T>, options: StartupRetryOptions): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < options.attempts) {
        await sleep(options.delayMs * attempt);
      }
    }
  }
  throw lastError;
}

export async function probeHealth(probe: () => Promise<unknown>, details?: string): Promise<ClientHealth> {
  try {
    await probe();
    return details ? { status: "ok", details } : { status: "ok" };
  } catch (error) {
    return { status: "error", details: error instanceof Error ? error.message : "unknown error" };
  }
}
