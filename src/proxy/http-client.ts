import type { EndpointCatalog, EndpointParams, GatewayOperation } from "../endpoints/index.js";
import { GatewayEvent, type TypedEventEmitter } from "../events.js";
import { classify, unwrapEnvelope } from "../retry/error-classifier.js";
import type { RetryPolicy } from "../retry/policy.js";
import { withRetry } from "../retry/retry.js";
import type { TransportExecutor } from "../transport/executor.js";
import type { Logger } from "../types.js";
import { joinUrl } from "../utils.js";

export interface GatewayCall<T> {
  operation: GatewayOperation;
  params?: EndpointParams;
  /** Sent as JSON */
  body?: unknown;
  decode: (payload: unknown) => T;
  /** Policy for in-place retries; `false` makes exactly one attempt */
  retry: RetryPolicy | false;
  signal?: AbortSignal | undefined;
}

/**
 * resolve -> execute -> classify -> decode for one logical call.
 * Shared by the gateway proxy and the simulator decorator, each with its own catalog.
 */
export class GatewayHttpClient {
  constructor(
    readonly baseUrl: string,
    readonly transport: TransportExecutor,
    readonly catalog: EndpointCatalog,
    private readonly logger: Logger,
    private readonly events: TypedEventEmitter,
  ) {}

  async call<T>(request: GatewayCall<T>): Promise<T> {
    const endpoint = this.catalog.resolve(request.operation, request.params);
    const url = joinUrl(this.baseUrl, endpoint.path);
    const body = request.body === undefined ? undefined : JSON.stringify(request.body);

    const attemptOnce = async (attempt: number): Promise<T> => {
      this.events.emit(GatewayEvent.REQUEST, { method: endpoint.method, path: endpoint.path, attempt });
      const start = Date.now();
      const outcome = await this.transport.execute(endpoint.method, url, { body, signal: request.signal });
      if (!outcome.ok) throw classify(outcome.error);

      const response = outcome.value;
      const latencyMs = Date.now() - start;
      this.events.emit(GatewayEvent.RESPONSE, {
        method: endpoint.method,
        path: endpoint.path,
        status: response.status,
        latencyMs,
      });
      this.logger.debug(`${endpoint.method} ${endpoint.path} -> ${response.status}`, { latencyMs, attempt });

      return request.decode(unwrapEnvelope(response));
    };

    const policy = request.retry;
    if (policy === false) {
      return attemptOnce(0);
    }

    return withRetry((ctx) => attemptOnce(ctx.attempt), policy, {
      signal: request.signal,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(`Retrying ${request.operation} after ${error.kind}`, {
          attempt,
          delayMs,
          error: error.message,
        });
        this.events.emit(GatewayEvent.RETRYING, {
          operation: request.operation,
          attempt,
          maxAttempts: policy.maxAttempts,
          error,
          delayMs,
        });
      },
    });
  }
}

