import { GatewayError, GatewayErrorKind, toGatewayError } from "../errors.js";
import { sleep } from "../utils.js";
import type { RetryPolicy } from "./policy.js";
import type { RetryContext, RetryOptions } from "./types.js";

/**
 * Execute `fn` under `policy`. Returns the first result, throws a non-retryable error as soon
 * as it appears, and throws TIMED_OUT (caused by the last error) once the policy is exhausted.
 * Never performs more than `policy.maxAttempts` calls.
 */
export async function withRetry<T>(
  fn: (context: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  options?: RetryOptions,
): Promise<T> {
  const startTime = Date.now();
  let lastError: GatewayError | undefined;

  for (let attempt = 0; ; attempt++) {
    if (options?.signal?.aborted) {
      throw new GatewayError(GatewayErrorKind.CANCELLED, "Operation cancelled", {
        cause: lastError,
        context: { attempt },
      });
    }

    try {
      return await fn({ attempt, maxAttempts: policy.maxAttempts, elapsed: Date.now() - startTime, lastError });
    } catch (err) {
      const error = toGatewayError(err);
      lastError = error;

      if (!error.retryable) throw error;

      const delayMs = policy.nextDelay(attempt, {
        rateLimited: error.kind === GatewayErrorKind.RATE_LIMITED,
        minDelayMs: error.retryAfterMs,
      });
      if (delayMs === undefined) {
        throw new GatewayError(GatewayErrorKind.TIMED_OUT, `All ${attempt + 1} attempts failed: ${error.message}`, {
          code: error.code,
          status: error.status,
          cause: error,
          context: { attempts: attempt + 1, lastKind: error.kind, elapsed: Date.now() - startTime },
        });
      }

      if (options?.onRetry) {
        await options.onRetry(error, attempt, delayMs);
      }

      await sleep(delayMs, options?.signal);
    }
  }
}
