import { DEFAULT_TIMEOUT_MS } from "../constants.js";
import { GatewayError, GatewayErrorKind } from "../errors.js";
import type { Logger, Result } from "../types.js";
import type { FetchLike, HttpMethod, RawResponse, RequestOptions, TransportConfig, TransportFailure } from "./types.js";

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  // undici reports socket errors as `TypeError: fetch failed` with the system error as cause
  if ("cause" in err) return errorCode(err.cause);
  return undefined;
}

/**
 * Single-attempt HTTP primitive shared by every proxy instance.
 *
 * Never retries and never throws for transport problems: a reset socket, a DNS
 * failure, a timeout or an abort all come back as a `TransportFailure` value.
 * Any HTTP status, 4xx and 5xx included, is a successful exchange at this level.
 */
export class TransportExecutor {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(
    config?: TransportConfig,
    private readonly logger?: Logger,
  ) {
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    TransportExecutor.validateTimeout(this.timeoutMs);
    this.headers = { Accept: "application/json", ...config?.headers };
    this.fetchImpl = config?.fetch ?? ((input, init) => fetch(input, init));
  }

  get defaultTimeoutMs(): number {
    return this.timeoutMs;
  }

  async execute(
    method: HttpMethod,
    url: string,
    options?: RequestOptions,
  ): Promise<Result<RawResponse, TransportFailure>> {
    const timeoutMs = options?.timeoutMs ?? this.timeoutMs;
    TransportExecutor.validateTimeout(timeoutMs);

    const external = options?.signal;
    if (external?.aborted) {
      return { ok: false, error: { url, reason: "aborted", message: "Request aborted before it was sent" } };
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    external?.addEventListener("abort", onAbort, { once: true });

    // Settles only on abort, so a fetch that ignores its signal still cannot outlive the timeout
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(new Error("Request aborted")), { once: true });
    });

    const headers = options?.body !== undefined ? { ...this.headers, "Content-Type": "application/json" } : this.headers;
    const init: RequestInit = { method, headers, signal: controller.signal };
    if (options?.body !== undefined) init.body = options.body;

    try {
      const response = await Promise.race([this.fetchImpl(url, init), aborted]);
      const body = await Promise.race([response.text(), aborted]);
      return {
        ok: true,
        value: { url, status: response.status, body, retryAfter: response.headers.get("retry-after") ?? undefined },
      };
    } catch (err) {
      const failure = this.toFailure(err, url, timedOut, timeoutMs);
      this.logger?.debug("Transport failure", { url, reason: failure.reason, code: failure.code });
      return { ok: false, error: failure };
    } finally {
      clearTimeout(timer);
      external?.removeEventListener("abort", onAbort);
    }
  }

  private toFailure(err: unknown, url: string, timedOut: boolean, timeoutMs: number): TransportFailure {
    const cause = err instanceof Error ? err : new Error(String(err));
    if (timedOut) {
      return { url, reason: "timeout", message: `Request timed out after ${timeoutMs}ms`, cause };
    }
    if (cause.name === "AbortError" || cause.message === "Request aborted") {
      return { url, reason: "aborted", message: "Request aborted", cause };
    }
    const code = errorCode(err);
    return {
      url,
      reason: "connection",
      message: code ? `${cause.message} (${code})` : cause.message,
      code,
      cause,
    };
  }

  private static validateTimeout(timeoutMs: number): void {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new GatewayError(GatewayErrorKind.FATAL, `Timeout must be a positive number of ms, got ${timeoutMs}`);
    }
  }
}
