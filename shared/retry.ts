import { logger } from "../config/logger.js";
import { AgentError, classifyError } from "./errors.js";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly backoffFactor: number;
  readonly maxDelayMs: number;
  readonly jitterFraction: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 4,
  initialDelayMs: 2_000,
  backoffFactor: 2,
  maxDelayMs: 30_000,
  jitterFraction: 0.2,
});

const MIN_DELAY_MS = 100;
const RATE_LIMIT_BUFFER_MS = 100;

export type RandomSource = () => number;
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Delay before retry number `attempt` (1 = first retry). `random` must return
 * a value in [0, 1); the result lands in [1 - jitter, 1 + jitter] of the
 * capped exponential delay.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: RandomSource = Math.random,
  retryAfterMs?: number,
): number {
  if (retryAfterMs !== undefined && retryAfterMs > 0) {
    return retryAfterMs + RATE_LIMIT_BUFFER_MS;
  }

  const exponent = Math.max(0, attempt - 1);
  const base = policy.initialDelayMs * policy.backoffFactor ** exponent;
  const capped = Math.min(base, policy.maxDelayMs);
  const jitter = 1 + policy.jitterFraction * (2 * random() - 1);

  return Math.max(MIN_DELAY_MS, Math.round(capped * jitter));
}

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AgentError("cancelled", "Cancelled before retry delay"));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AgentError("cancelled", "Cancelled during retry delay"));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });

export interface RetryOptions {
  readonly policy: RetryPolicy;
  readonly label: string;
  readonly signal?: AbortSignal;
  readonly sleep?: Sleep;
  readonly random?: RandomSource;
  readonly onRetry?: (attempt: number, error: AgentError, delayMs: number) => void;
}

/**
 * Runs `operation` until it succeeds, fails with a non-transient error, or the
 * attempt ceiling is reached. Always rejects with an `AgentError`; when the
 * ceiling is hit the error is re-raised as non-transient.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, label, signal } = options;
  const sleep = options.sleep ?? abortableSleep;
  const random = options.random ?? Math.random;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new AgentError("cancelled", `${label} cancelled`);
    }

    try {
      return await operation(attempt);
    } catch (error) {
      const classified = signal?.aborted
        ? new AgentError("cancelled", `${label} cancelled`, { cause: error })
        : classifyError(error);

      if (!classified.isTransient()) {
        throw classified;
      }

      if (attempt >= maxAttempts) {
        logger.warn({ label, attempts: attempt, kind: classified.kind }, "Retries exhausted");
        throw new AgentError(
          classified.kind,
          `${label} failed after ${String(attempt)} attempts: ${classified.message}`,
          { transient: false, httpStatus: classified.httpStatus, cause: classified },
        );
      }

      const delayMs = computeBackoffDelay(attempt, policy, random, classified.retryAfterMs);
      logger.warn(
        { label, attempt, kind: classified.kind, delayMs },
        "Transient failure, will retry",
      );
      options.onRetry?.(attempt, classified, delayMs);

      await sleep(delayMs, signal);
    }
  }
}
