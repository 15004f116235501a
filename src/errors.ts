/** Failure categories for every error chain-gateway-kit reports */
export enum GatewayErrorKind {
  /** Connection-level failure or HTTP 5xx; safe to retry */
  TRANSIENT = "TRANSIENT",
  /** HTTP 429 or a throttling payload; retry with a longer backoff */
  RATE_LIMITED = "RATE_LIMITED",
  /** Bad request, node-reported error, or caller misconfiguration */
  FATAL = "FATAL",
  /** A single request exceeded its timeout */
  TIMEOUT = "TIMEOUT",
  /** Response body did not match the expected shape */
  DECODE = "DECODE",
  /** Retry or poll budget exhausted */
  TIMED_OUT = "TIMED_OUT",
  /** Stopped by an external abort signal */
  CANCELLED = "CANCELLED",
}

const RETRYABLE_KINDS: ReadonlySet<GatewayErrorKind> = new Set([
  GatewayErrorKind.TRANSIENT,
  GatewayErrorKind.RATE_LIMITED,
  GatewayErrorKind.TIMEOUT,
]);

export interface GatewayErrorOptions {
  /** Error code reported by the node, e.g. `invalid_transaction` */
  code?: string | undefined;
  /** HTTP status of the response that produced the error */
  status?: number | undefined;
  /** Server-requested wait before the next attempt */
  retryAfterMs?: number | undefined;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
}

/** Structured error with a failure kind, the node's code and optional cause/context */
export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly code?: string | undefined;
  readonly status?: number | undefined;
  readonly retryAfterMs?: number | undefined;
  override readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(kind: GatewayErrorKind, message: string, options?: GatewayErrorOptions) {
    super(message);
    this.name = "GatewayError";
    this.kind = kind;
    this.code = options?.code;
    this.status = options?.status;
    this.retryAfterMs = options?.retryAfterMs;
    this.cause = options?.cause;
    this.context = options?.context;
  }

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }
}

export function isRetryableKind(kind: GatewayErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

/** Wrap anything thrown into a GatewayError, keeping GatewayErrors as they are */
export function toGatewayError(err: unknown, kind: GatewayErrorKind = GatewayErrorKind.FATAL): GatewayError {
  if (err instanceof GatewayError) return err;
  const cause = err instanceof Error ? err : new Error(String(err));
  return new GatewayError(kind, cause.message, { cause });
}
