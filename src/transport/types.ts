export type HttpMethod = "GET" | "POST";

/** A completed HTTP exchange, whatever its status code */
export interface RawResponse {
  url: string;
  status: number;
  /** Response body as text; decoding is left to the caller */
  body: string;
  /** Raw `Retry-After` header, when the server sent one */
  retryAfter?: string | undefined;
}

export type TransportFailureReason = "connection" | "timeout" | "aborted";

/** A request that produced no HTTP response */
export interface TransportFailure {
  url: string;
  reason: TransportFailureReason;
  message: string;
  /** System error code when available (ECONNRESET, ENOTFOUND, ...) */
  code?: string | undefined;
  cause?: Error | undefined;
}

export interface RequestOptions {
  /** Pre-serialized JSON body */
  body?: string | undefined;
  /** Overrides the executor's default timeout for this request */
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface TransportConfig {
  /** Default per-request timeout in ms (default: 30_000) */
  timeoutMs?: number | undefined;
  /** Headers sent with every request */
  headers?: Record<string, string> | undefined;
  /** fetch implementation (default: the runtime's global fetch) */
  fetch?: FetchLike | undefined;
}
