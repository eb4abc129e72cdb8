import { CancelledError, GatewayError, throwIfAborted } from "../errors";

/** Outcome of a gateway call: either a value or a classified failure. */
export type GatewayResult<T> = { ok: true; value: T } | { ok: false; error: GatewayError };

export function ok<T>(value: T): GatewayResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: GatewayError): GatewayResult<T> {
  return { ok: false, error };
}

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles on each further attempt. */
  baseDelayMs: number;
  /** Upper bound for any single delay. */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
};

/** Sleep function; injectable so tests can skip real delays. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Delay before attempt `attempt + 1`, given `attempt` attempts already failed. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/** Abortable setTimeout-based sleep. */
export const sleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError("wait"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError("wait"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export interface RetryOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  sleeper?: Sleeper;
  /** Label used in log lines. */
  label: string;
  verbose?: boolean;
}

/**
 * Run a gateway call, retrying transient failures with exponential backoff
 * until it succeeds, fails permanently, or the attempt budget is spent. The
 * final failure carries the number of attempts made.
 *
 * @throws {CancelledError} when `signal` fires before or between attempts
 */
export async function withRetry<T>(
  call: () => Promise<GatewayResult<T>>,
  { policy, signal, sleeper = sleep, label, verbose }: RetryOptions,
): Promise<GatewayResult<T>> {
  const attempts = Math.max(1, policy.maxAttempts);
  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal, label);
    const result = await call();
    if (result.ok) return result;
    const { error } = result;
    if (!error.transient || attempt >= attempts) {
      if (error.transient) {
        console.error(`[RAG] ${label}: giving up after ${attempt} attempts (${error.detail})`);
      }
      return fail(error.withAttempts(attempt));
    }
    const delay = backoffDelay(policy, attempt);
    if (verbose) {
      console.error(
        `[RAG][verbose] ${label}: transient failure (${error.detail}); retry ${attempt + 1}/${attempts} in ${delay}ms`,
      );
    }
    try {
      await sleeper(delay, signal);
    } catch (e) {
      // Report the cancelled operation rather than the wait.
      if (e instanceof CancelledError) throw new CancelledError(label);
      throw e;
    }
  }
}
