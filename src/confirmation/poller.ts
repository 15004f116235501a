import { DEFAULT_POLL_CONFIG } from "../constants.js";
import { GatewayError, GatewayErrorKind, toGatewayError } from "../errors.js";
import { GatewayEvent, type TypedEventEmitter } from "../events.js";
import type { NetworkProvider, TransactionOnNetwork } from "../proxy/types.js";
import { isNotFound, isRateLimited } from "../retry/error-classifier.js";
import { RetryPolicy } from "../retry/policy.js";
import type { Logger } from "../types.js";
import { sleep } from "../utils.js";
import type { PollConfig, PollOptions, PollResult, PollState } from "./types.js";

type TransactionSource = Pick<NetworkProvider, "getTransaction">;

/**
 * Polls a transaction until it reaches a terminal status.
 *
 * State machine:
 *   polling --[success status]----------------------> succeeded
 *   polling --[fail / invalid status]---------------> failed
 *   polling --[pending, not found, retryable error]--> polling (after nextDelay)
 *   polling --[policy exhausted or deadline passed]--> timed_out
 *   polling --[fatal or decode error]----------------> errored
 *   polling --[abort signal]-------------------------> cancelled
 *
 * A freshly broadcast transaction is often unknown to the queried node for a few rounds,
 * so a "not found" answer counts as pending rather than as a fatal error.
 * Queries for one hash never overlap.
 */
export class TransactionPoller {
  private readonly config: PollConfig;

  constructor(
    private readonly source: TransactionSource,
    config?: Partial<PollConfig>,
    private readonly logger?: Logger,
    private readonly events?: TypedEventEmitter,
  ) {
    this.config = { ...DEFAULT_POLL_CONFIG, ...config };
  }

  async awaitCompletion(hash: string, options?: PollOptions): Promise<PollResult> {
    const startTime = Date.now();
    const policy = options?.policy ?? this.buildPolicy(startTime);
    const signal = options?.signal;
    let lastSeen: TransactionOnNetwork | undefined;
    let lastError: GatewayError | undefined;

    const stop = (state: "timed_out" | "errored" | "cancelled", error: GatewayError, attempts: number): PollResult => {
      this.finish(hash, state, attempts);
      return { state, hash, error, attempts, latencyMs: Date.now() - startTime, lastSeen };
    };

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        return stop("cancelled", this.cancelled(hash, lastError), attempt);
      }

      let rateLimited = false;
      let retryAfterMs: number | undefined;
      try {
        const transaction = await this.source.getTransaction(hash, this.config.withResults, { signal, retry: false });
        this.events?.emit(GatewayEvent.POLLING, { hash, attempt, status: transaction.status.status });

        if (transaction.status.isSuccessful()) {
          return this.finalize("succeeded", hash, transaction, attempt + 1, startTime);
        }
        if (transaction.status.isFailed() || transaction.status.isInvalid()) {
          return this.finalize("failed", hash, transaction, attempt + 1, startTime);
        }
        lastSeen = transaction;
      } catch (err) {
        const error = toGatewayError(err);
        if (error.kind === GatewayErrorKind.CANCELLED) {
          return stop("cancelled", error, attempt + 1);
        }
        if (isNotFound(error)) {
          this.logger?.debug("Transaction not visible yet", { hash, attempt });
          this.events?.emit(GatewayEvent.POLLING, { hash, attempt, status: "not_found" });
        } else if (!error.retryable) {
          this.logger?.warn("Polling stopped on non-retryable error", { hash, kind: error.kind, error: error.message });
          return stop("errored", error, attempt + 1);
        } else {
          this.logger?.warn("Polling error, will retry", { hash, kind: error.kind, error: error.message });
          lastError = error;
          rateLimited = isRateLimited(error);
          retryAfterMs = error.retryAfterMs;
        }
      }

      const delayMs = policy.nextDelay(attempt, { rateLimited, minDelayMs: retryAfterMs });
      if (delayMs === undefined) {
        const error = new GatewayError(
          GatewayErrorKind.TIMED_OUT,
          `Transaction ${hash} not final after ${attempt + 1} queries`,
          { cause: lastError, context: { hash, attempts: attempt + 1, lastStatus: lastSeen?.status.status } },
        );
        return stop("timed_out", error, attempt + 1);
      }

      try {
        await sleep(delayMs, signal);
      } catch (err) {
        return stop("cancelled", toGatewayError(err, GatewayErrorKind.CANCELLED), attempt + 1);
      }
    }
  }

  /** Poll several hashes concurrently; each hash is polled independently and sequentially */
  async awaitMany(hashes: readonly string[], options?: PollOptions): Promise<Map<string, PollResult>> {
    const unique = [...new Set(hashes)];
    const results = await Promise.all(unique.map((hash) => this.awaitCompletion(hash, options)));
    return new Map(results.map((result) => [result.hash, result]));
  }

  private buildPolicy(startTime: number): RetryPolicy {
    const { maxAttempts, baseDelayMs, backoffMultiplier, maxDelayMs, jitter, timeoutMs } = this.config;
    return new RetryPolicy({
      maxAttempts,
      baseDelayMs,
      backoffMultiplier,
      maxDelayMs,
      jitter,
      deadline: timeoutMs === undefined ? undefined : startTime + timeoutMs,
    });
  }

  private finalize(
    state: "succeeded" | "failed",
    hash: string,
    transaction: TransactionOnNetwork,
    attempts: number,
    startTime: number,
  ): PollResult {
    this.logger?.info(`Transaction ${state}`, { hash, status: transaction.status.status, attempts });
    this.finish(hash, state, attempts);
    return { state, hash, transaction, attempts, latencyMs: Date.now() - startTime };
  }

  private finish(hash: string, state: PollState, attempts: number): void {
    this.events?.emit(GatewayEvent.FINALIZED, { hash, state, attempts });
  }

  private cancelled(hash: string, cause: GatewayError | undefined): GatewayError {
    return new GatewayError(GatewayErrorKind.CANCELLED, `Polling for ${hash} cancelled`, { cause, context: { hash } });
  }
}
