import type { GatewayError } from "../errors.js";

export interface RetryPolicyConfig {
  /** Total number of attempts, first one included (default: 4) */
  maxAttempts: number;
  /** Delay after the first failed attempt in ms (default: 500) */
  baseDelayMs: number;
  /** Exponential multiplier applied per attempt (default: 2) */
  backoffMultiplier: number;
  /** Upper bound for a single delay in ms (default: 10_000) */
  maxDelayMs?: number | undefined;
  /** Random perturbation of each delay, as a fraction in [0, 1] (default: 0) */
  jitter?: number | undefined;
  /** Absolute deadline, epoch ms. No delay is handed out past it. */
  deadline?: number | undefined;
  /** Extra factor applied to delays after a rate-limited attempt (default: 2) */
  rateLimitMultiplier?: number | undefined;
  /** Random source for jitter, returning values in [0, 1) */
  random?: (() => number) | undefined;
  /** Clock used against the deadline */
  now?: (() => number) | undefined;
}

export interface DelayOptions {
  /** The attempt that just failed was rate limited */
  rateLimited?: boolean | undefined;
  /** Wait the server asked for (Retry-After); still subject to maxDelayMs and the deadline */
  minDelayMs?: number | undefined;
}

export interface RetryContext {
  attempt: number;
  maxAttempts: number;
  elapsed: number;
  lastError?: GatewayError | undefined;
}

export interface RetryOptions {
  signal?: AbortSignal | undefined;
  /** Called before each wait; hook for logging and events */
  onRetry?: ((error: GatewayError, attempt: number, delayMs: number) => void | Promise<void>) | undefined;
}
