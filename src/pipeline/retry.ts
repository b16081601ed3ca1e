/**
 * Bounded retry with exponential backoff, shared by every collaborator call site
 */

import { CollaboratorTimeoutError, JobCancelledError, isRetryable } from './errors';
import { type LogMeta, errorMessage, warn } from './log';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt in milliseconds */
  initialDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  exponentialBase: number;
  /** Add random jitter to delays */
  jitter: boolean;
  /** Watchdog per attempt; 0 disables */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  exponentialBase: 2,
  jitter: true,
  timeoutMs: 120000,
};

export interface RetryContext {
  label: string;
  meta?: LogMeta;
  signal?: AbortSignal;
}

/**
 * Calculate delay before the attempt following `attempt` (1-based)
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  let delay = Math.min(
    policy.initialDelayMs * Math.pow(policy.exponentialBase, attempt - 1),
    policy.maxDelayMs
  );
  if (policy.jitter) {
    // "equal jitter": random value between 50% and 100% of the delay
    delay = delay * (0.5 + Math.random() * 0.5);
  }
  return delay;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new JobCancelledError());
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(handle);
      reject(new JobCancelledError());
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

async function attemptOnce<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });
  let timeoutHandle: NodeJS.Timeout | null = null;
  let timedOut = false;
  const timeout = new Promise<never>((_, reject) => {
    if (timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        timedOut = true;
        controller.abort();
        reject(new CollaboratorTimeoutError(`Call exceeded ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);
    }
  });
  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } catch (e) {
    if (parent?.aborted) throw new JobCancelledError();
    if (timedOut) throw new CollaboratorTimeoutError(`Call exceeded ${timeoutMs}ms`, timeoutMs);
    throw e;
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Execute `fn` under the policy. Only retryable collaborator errors are retried; anything
 * else, and the last failure once attempts run out, is rethrown to the call site.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  ctx: RetryContext
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  for (let attempt = 1; ; attempt++) {
    if (ctx.signal?.aborted) throw new JobCancelledError();
    try {
      return await attemptOnce(fn, policy.timeoutMs, ctx.signal);
    } catch (e) {
      if (e instanceof JobCancelledError || !isRetryable(e) || attempt >= maxAttempts) {
        throw e;
      }
      const delay = backoffDelay(attempt, policy);
      warn(`${ctx.label}.retry`, {
        ...ctx.meta,
        attempt,
        maxAttempts,
        delayMs: Math.round(delay),
        error: errorMessage(e),
      });
      await sleep(delay, ctx.signal);
    }
  }
}
