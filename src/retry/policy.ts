import { DEFAULT_RETRY_POLICY } from "../constants.js";
import { GatewayError, GatewayErrorKind } from "../errors.js";
import type { DelayOptions, RetryPolicyConfig } from "./types.js";

function invalid(message: string): GatewayError {
  return new GatewayError(GatewayErrorKind.FATAL, `Invalid retry policy: ${message}`);
}

/**
 * Immutable backoff schedule shared by every retrying call site.
 *
 * delay(i) = baseDelay * multiplier^i, times rateLimitMultiplier after a rate-limited attempt,
 * perturbed by ±jitter, raised to any server-requested wait, then capped by maxDelay and
 * by the time left before the deadline.
 * Without jitter the schedule is a pure function of the attempt index.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number | undefined;
  readonly jitter: number;
  readonly deadline: number | undefined;
  readonly rateLimitMultiplier: number;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(config?: Partial<RetryPolicyConfig>) {
    const resolved = { ...DEFAULT_RETRY_POLICY, ...config };

    if (!Number.isInteger(resolved.maxAttempts) || resolved.maxAttempts < 1) {
      throw invalid(`maxAttempts must be an integer >= 1, got ${resolved.maxAttempts}`);
    }
    if (!Number.isFinite(resolved.baseDelayMs) || resolved.baseDelayMs < 0) {
      throw invalid(`baseDelayMs must be >= 0, got ${resolved.baseDelayMs}`);
    }
    if (!Number.isFinite(resolved.backoffMultiplier) || resolved.backoffMultiplier < 1) {
      throw invalid(`backoffMultiplier must be >= 1, got ${resolved.backoffMultiplier}`);
    }
    const jitter = resolved.jitter ?? 0;
    if (!(jitter >= 0 && jitter <= 1)) {
      throw invalid(`jitter must be within [0, 1], got ${jitter}`);
    }
    const rateLimitMultiplier = resolved.rateLimitMultiplier ?? DEFAULT_RETRY_POLICY.rateLimitMultiplier;
    if (!Number.isFinite(rateLimitMultiplier) || rateLimitMultiplier < 1) {
      throw invalid(`rateLimitMultiplier must be >= 1, got ${rateLimitMultiplier}`);
    }
    if (resolved.maxDelayMs !== undefined && !(resolved.maxDelayMs >= 0)) {
      throw invalid(`maxDelayMs must be >= 0, got ${resolved.maxDelayMs}`);
    }

    this.maxAttempts = resolved.maxAttempts;
    this.baseDelayMs = resolved.baseDelayMs;
    this.backoffMultiplier = resolved.backoffMultiplier;
    this.maxDelayMs = resolved.maxDelayMs;
    this.jitter = jitter;
    this.deadline = resolved.deadline;
    this.rateLimitMultiplier = rateLimitMultiplier;
    this.random = resolved.random ?? Math.random;
    this.now = resolved.now ?? Date.now;
  }

  /** A policy that never retries */
  static once(): RetryPolicy {
    return new RetryPolicy({ maxAttempts: 1 });
  }

  /**
   * Delay in ms to wait after attempt `attempt` (0-based) failed,
   * or `undefined` when no further attempt is allowed.
   */
  nextDelay(attempt: number, options?: DelayOptions): number | undefined {
    if (!Number.isInteger(attempt) || attempt < 0) {
      throw invalid(`attempt index must be an integer >= 0, got ${attempt}`);
    }
    if (attempt + 1 >= this.maxAttempts) return undefined;

    let delay = this.baseDelayMs * this.backoffMultiplier ** attempt;
    if (options?.rateLimited) delay *= this.rateLimitMultiplier;
    if (this.jitter > 0) delay *= 1 + (this.random() * 2 - 1) * this.jitter;
    const requested = options?.minDelayMs ?? 0;
    delay = Math.max(delay, requested);
    if (this.maxDelayMs !== undefined) delay = Math.min(delay, this.maxDelayMs);

    if (this.deadline !== undefined) {
      const remaining = this.deadline - this.now();
      // a server-requested wait that outlives the deadline ends the schedule
      if (remaining <= 0 || requested > remaining) return undefined;
      delay = Math.min(delay, remaining);
    }

    return Math.max(0, Math.round(delay));
  }

  /** True once the absolute deadline, if any, has passed */
  isExpired(): boolean {
    return this.deadline !== undefined && this.now() >= this.deadline;
  }

  /** Copy of this policy with other settings replaced */
  with(overrides: Partial<RetryPolicyConfig>): RetryPolicy {
    return new RetryPolicy({ ...this.toConfig(), ...overrides });
  }

  toConfig(): RetryPolicyConfig {
    return {
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      backoffMultiplier: this.backoffMultiplier,
      maxDelayMs: this.maxDelayMs,
      jitter: this.jitter,
      deadline: this.deadline,
      rateLimitMultiplier: this.rateLimitMultiplier,
      random: this.random,
      now: this.now,
    };
  }
}
