import type { GatewayError } from "../errors.js";
import type { TransactionOnNetwork } from "../proxy/types.js";
import type { RetryPolicy } from "../retry/policy.js";

export interface PollConfig {
  /** Maximum number of status queries (default: 60) */
  maxAttempts: number;
  /** Delay between the first two queries in ms (default: 1_000) */
  baseDelayMs: number;
  /** Growth of the delay per query; 1 polls at a fixed interval (default: 1) */
  backoffMultiplier: number;
  /** Upper bound for a single delay in ms (default: 6_000) */
  maxDelayMs?: number | undefined;
  /** Random perturbation of each delay, fraction in [0, 1] (default: 0) */
  jitter?: number | undefined;
  /** Overall budget in ms from the first query; no limit when unset */
  timeoutMs?: number | undefined;
  /** Ask the node for smart contract results and logs (default: true) */
  withResults: boolean;
}

export interface PollOptions {
  signal?: AbortSignal | undefined;
  /** Replaces the schedule derived from the poll config */
  policy?: RetryPolicy | undefined;
}

export type PollState = "succeeded" | "failed" | "timed_out" | "errored" | "cancelled";

interface PollOutcomeBase {
  hash: string;
  /** Number of status queries issued */
  attempts: number;
  latencyMs: number;
}

/** Terminal transaction reached */
export interface PollFinalized extends PollOutcomeBase {
  state: "succeeded" | "failed";
  transaction: TransactionOnNetwork;
}

/** Polling stopped before the transaction reached a terminal status */
export interface PollStopped extends PollOutcomeBase {
  state: "timed_out" | "errored" | "cancelled";
  error: GatewayError;
  /** Most recent non-terminal snapshot, if the node ever returned one */
  lastSeen?: TransactionOnNetwork | undefined;
}

export type PollResult = PollFinalized | PollStopped;
