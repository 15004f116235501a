export const LOCAL_SIMULATOR_URL = "http://localhost:8085";

export const DEFAULT_TIMEOUT_MS = 30_000;

export const DEFAULT_RETRY_POLICY = {
  maxAttempts: 4,
  baseDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 10_000,
  jitter: 0,
  rateLimitMultiplier: 2,
} as const;

export const DEFAULT_POLL_CONFIG = {
  maxAttempts: 60,
  baseDelayMs: 1_000,
  backoffMultiplier: 1,
  maxDelayMs: 6_000,
  withResults: true,
} as const;

export const DEFAULT_SIMULATOR_CONFIG = {
  blocksPerSend: 1,
} as const;

/** Envelope `code` the gateway reports on success */
export const GATEWAY_SUCCESS_CODE = "successful";
