// Proxy client
export { GatewayProxy, METACHAIN_SHARD_ID } from "./proxy/gateway-proxy.js";
export type { GatewayProxyConfig } from "./proxy/gateway-proxy.js";
export { GatewayProxyBuilder } from "./proxy/builder.js";
export { TransactionStatus, DEFAULT_STATUS_RULES, extendStatusRules } from "./proxy/transaction-status.js";
export type { StatusRules } from "./proxy/transaction-status.js";
export type {
  AccountInfo,
  HyperBlock,
  NetworkConfig,
  NetworkEconomics,
  NetworkProvider,
  NetworkStatus,
  ReadOptions,
  SendManyResult,
  SignedTransaction,
  TokenMetadata,
  TransactionOnNetwork,
} from "./proxy/types.js";

// Transport
export { TransportExecutor } from "./transport/executor.js";
export type {
  FetchLike,
  HttpMethod,
  RawResponse,
  RequestOptions,
  TransportConfig,
  TransportFailure,
  TransportFailureReason,
} from "./transport/types.js";

// Endpoints
export { EndpointCatalog, API_VERSIONS, GatewayOperation } from "./endpoints/index.js";
export type { ApiVersion, EndpointCatalogOptions, EndpointParams, ResolvedEndpoint } from "./endpoints/index.js";

// Retry
export { withRetry } from "./retry/retry.js";
export { RetryPolicy } from "./retry/policy.js";
export { classify, isNotFound, isRateLimited, parseRetryAfter, unwrapEnvelope } from "./retry/error-classifier.js";
export type { RetryContext, RetryOptions, RetryPolicyConfig } from "./retry/types.js";

// Confirmation
export { TransactionPoller } from "./confirmation/poller.js";
export type { PollConfig, PollFinalized, PollOptions, PollResult, PollState, PollStopped } from "./confirmation/types.js";

// Simulator
export { SimulatorProxy } from "./simulator/simulator-proxy.js";
export type { ExecuteOptions, SimulatorConfig } from "./simulator/types.js";

// Shared
export { GatewayError, GatewayErrorKind, isRetryableKind, toGatewayError } from "./errors.js";
export type { GatewayErrorOptions } from "./errors.js";
export { TypedEventEmitter, GatewayEvent } from "./events.js";
export type { GatewayEventMap } from "./events.js";
export type { CallOptions, Logger, Result } from "./types.js";
export { loadConfigFromEnv } from "./config.js";
export type { GatewayEnvConfig } from "./config.js";
export { LOCAL_SIMULATOR_URL, DEFAULT_RETRY_POLICY, DEFAULT_POLL_CONFIG, DEFAULT_TIMEOUT_MS } from "./constants.js";
export { createDefaultLogger, createSilentLogger } from "./logger.js";
export type { DefaultLoggerOptions, LogLevel } from "./logger.js";
