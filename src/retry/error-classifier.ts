import { z } from "zod";
import { GATEWAY_SUCCESS_CODE } from "../constants.js";
import { GatewayError, GatewayErrorKind } from "../errors.js";
import type { RawResponse, TransportFailure } from "../transport/types.js";

const THROTTLE_PATTERNS = [/too many requests/i, /rate limit/i, /throttl/i];

const NOT_FOUND_PATTERNS = [/not found/i, /can't find/i, /cannot find/i];

const MAX_BODY_EXCERPT = 200;

/** `{ data, error, code }` as sent by the gateway; unknown fields are tolerated */
const envelopeSchema = z.object({
  data: z.unknown().optional(),
  error: z.string().nullish(),
  code: z.string().nullish(),
});

type Envelope = z.infer<typeof envelopeSchema>;

type ParsedBody = { json: false } | { json: true; envelope: Envelope | undefined };

function parseBody(body: string): ParsedBody {
  if (body.trim() === "") return { json: false };
  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch {
    return { json: false };
  }
  const parsed = envelopeSchema.safeParse(value);
  return { json: true, envelope: parsed.success ? parsed.data : undefined };
}

function excerpt(body: string): string {
  const trimmed = body.trim();
  return trimmed.length > MAX_BODY_EXCERPT ? `${trimmed.slice(0, MAX_BODY_EXCERPT)}...` : trimmed;
}

/** Parse a `Retry-After` header given either as seconds or as an HTTP date */
export function parseRetryAfter(header: string | undefined, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1_000);
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function isThrottleMessage(message: string): boolean {
  return THROTTLE_PATTERNS.some((pattern) => pattern.test(message));
}

export function isTransportFailure(outcome: RawResponse | TransportFailure): outcome is TransportFailure {
  return "reason" in outcome;
}

/** Node answer meaning "this item is not (yet) known to me" */
export function isNotFound(error: GatewayError): boolean {
  if (error.kind !== GatewayErrorKind.FATAL) return false;
  return error.status === 404 || NOT_FOUND_PATTERNS.some((pattern) => pattern.test(error.message));
}

export function isRateLimited(error: GatewayError): boolean {
  return error.kind === GatewayErrorKind.RATE_LIMITED;
}

function classifyFailure(failure: TransportFailure): GatewayError {
  const context = { url: failure.url, reason: failure.reason };
  switch (failure.reason) {
    case "timeout":
      return new GatewayError(GatewayErrorKind.TIMEOUT, failure.message, { cause: failure.cause, context });
    case "aborted":
      return new GatewayError(GatewayErrorKind.CANCELLED, failure.message, { cause: failure.cause, context });
    case "connection":
      return new GatewayError(GatewayErrorKind.TRANSIENT, failure.message, {
        code: failure.code,
        cause: failure.cause,
        context,
      });
  }
}

function classifyResponse(response: RawResponse): GatewayError {
  const { status, url } = response;
  const parsed = parseBody(response.body);
  const envelope = parsed.json ? parsed.envelope : undefined;
  const nodeMessage = envelope?.error || undefined;
  const nodeCode = envelope?.code || undefined;
  const context = { url, status };

  if (status === 429 || (nodeMessage !== undefined && isThrottleMessage(nodeMessage))) {
    return new GatewayError(GatewayErrorKind.RATE_LIMITED, nodeMessage ?? `HTTP ${status}: rate limited`, {
      code: nodeCode,
      status,
      retryAfterMs: parseRetryAfter(response.retryAfter),
      context,
    });
  }

  if (status >= 500) {
    return new GatewayError(GatewayErrorKind.TRANSIENT, nodeMessage ?? `HTTP ${status}: ${excerpt(response.body)}`, {
      code: nodeCode,
      status,
      context,
    });
  }

  if (parsed.json && !envelope) {
    return new GatewayError(GatewayErrorKind.DECODE, `HTTP ${status}: response does not match the gateway envelope`, {
      status,
      context: { ...context, body: excerpt(response.body) },
    });
  }

  if (status >= 400) {
    return new GatewayError(GatewayErrorKind.FATAL, nodeMessage ?? `HTTP ${status}: ${excerpt(response.body)}`, {
      code: nodeCode,
      status,
      context,
    });
  }

  if (!parsed.json) {
    return new GatewayError(GatewayErrorKind.DECODE, `HTTP ${status}: response body is not JSON`, {
      status,
      context: { ...context, body: excerpt(response.body) },
    });
  }

  if (nodeMessage !== undefined || (nodeCode !== undefined && nodeCode !== GATEWAY_SUCCESS_CODE)) {
    return new GatewayError(GatewayErrorKind.FATAL, nodeMessage ?? `Gateway returned code "${nodeCode}"`, {
      code: nodeCode,
      status,
      context,
    });
  }

  return new GatewayError(GatewayErrorKind.DECODE, `HTTP ${status}: unexpected response`, { status, context });
}

/**
 * Map a transport failure or a non-successful response to a GatewayError.
 *
 * Rules, in order:
 * - timeout -> TIMEOUT, abort -> CANCELLED, other transport failure -> TRANSIENT
 * - HTTP 429 or a throttling message -> RATE_LIMITED
 * - HTTP 5xx -> TRANSIENT
 * - JSON that is not an envelope -> DECODE
 * - HTTP 4xx, or an envelope carrying an error or a non-success code -> FATAL
 * - 2xx body that is not JSON -> DECODE
 */
export function classify(outcome: RawResponse | TransportFailure): GatewayError {
  return isTransportFailure(outcome) ? classifyFailure(outcome) : classifyResponse(outcome);
}

/**
 * Return the payload of a successful gateway response: `data` when the envelope has it,
 * otherwise the body object itself. Anything else is thrown as its classification.
 */
export function unwrapEnvelope(response: RawResponse): unknown {
  if (response.status < 200 || response.status >= 300) throw classify(response);

  const parsed = parseBody(response.body);
  if (!parsed.json || !parsed.envelope) throw classify(response);

  const { envelope } = parsed;
  if (envelope.error || (envelope.code && envelope.code !== GATEWAY_SUCCESS_CODE)) throw classify(response);

  if (envelope.data !== undefined) return envelope.data;
  // Not an envelope after all: the node answered with the bare payload
  const bare: unknown = JSON.parse(response.body);
  return bare;
}
