import { DEFAULT_POLL_CONFIG } from "../constants.js";
import { TransactionPoller } from "../confirmation/poller.js";
import type { PollConfig } from "../confirmation/types.js";
import { type ApiVersion, EndpointCatalog, GatewayOperation } from "../endpoints/index.js";
import { GatewayError, GatewayErrorKind } from "../errors.js";
import { GatewayEvent, TypedEventEmitter } from "../events.js";
import { createSilentLogger } from "../logger.js";
import { RetryPolicy } from "../retry/policy.js";
import type { RetryPolicyConfig } from "../retry/types.js";
import { TransportExecutor } from "../transport/executor.js";
import type { FetchLike } from "../transport/types.js";
import type { CallOptions, Logger } from "../types.js";
import { GatewayProxyBuilder } from "./builder.js";
import {
  decodeAccount,
  decodeHyperBlock,
  decodeNetworkConfig,
  decodeNetworkEconomics,
  decodeNetworkStatus,
  decodeSendMany,
  decodeToken,
  decodeTokenBalance,
  decodeTransaction,
  decodeTransactionHash,
  decodeTransactionStatus,
} from "./decoders.js";
import { GatewayHttpClient } from "./http-client.js";
import { DEFAULT_STATUS_RULES, type StatusRules, type TransactionStatus, extendStatusRules } from "./transaction-status.js";
import type {
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
} from "./types.js";

/** Shard id of the metachain, the default for network status queries */
export const METACHAIN_SHARD_ID = 4_294_967_295;

export interface GatewayProxyConfig {
  /** Gateway base URL, e.g. `https://gateway.example.org` */
  url: string;
  /** Route table to use (default: "v1") */
  apiVersion?: ApiVersion | undefined;
  /** Per-request timeout in ms; ignored when `transport` is given */
  timeoutMs?: number | undefined;
  /** Default policy for idempotent reads */
  retry?: RetryPolicy | Partial<RetryPolicyConfig> | undefined;
  /** Defaults for pollers created with {@link GatewayProxy.createPoller} */
  polling?: Partial<PollConfig> | undefined;
  /** Extra node status strings on top of the defaults */
  statusRules?: Partial<StatusRules> | undefined;
  /** Shared executor; one is created when omitted */
  transport?: TransportExecutor | undefined;
  /** fetch implementation for the executor created here */
  fetch?: FetchLike | undefined;
  logger?: Logger | undefined;
}

/**
 * Public facade over a gateway or observer node.
 *
 * Reads retry in place on TRANSIENT, RATE_LIMITED and TIMEOUT according to the retry policy and
 * give up with TIMED_OUT when it is exhausted. Broadcasts are never retried: a duplicate send is a
 * correctness hazard, so the classified error goes straight back to the caller, who decides with
 * the account nonce in hand. Every failure is thrown as a {@link GatewayError}.
 */
export class GatewayProxy implements NetworkProvider {
  readonly events: TypedEventEmitter;
  readonly transport: TransportExecutor;
  readonly retryPolicy: RetryPolicy;
  readonly statusRules: StatusRules;
  private readonly client: GatewayHttpClient;
  private readonly logger: Logger;
  private readonly config: Readonly<GatewayProxyConfig>;

  /** @param config - Prefer {@link GatewayProxy.builder} for construction. */
  constructor(config: GatewayProxyConfig) {
    if (!/^https?:\/\//.test(config.url)) {
      throw new GatewayError(
        GatewayErrorKind.FATAL,
        `Invalid gateway URL: must start with https:// or http://, got "${config.url}"`,
      );
    }

    this.config = config;
    this.logger = config.logger ?? createSilentLogger();
    this.events = new TypedEventEmitter();
    this.transport =
      config.transport ?? new TransportExecutor({ timeoutMs: config.timeoutMs, fetch: config.fetch }, this.logger);
    this.retryPolicy = config.retry instanceof RetryPolicy ? config.retry : new RetryPolicy(config.retry);
    this.statusRules = extendStatusRules(DEFAULT_STATUS_RULES, config.statusRules);

    const catalog = new EndpointCatalog(config.apiVersion ?? "v1");
    this.client = new GatewayHttpClient(config.url, this.transport, catalog, this.logger, this.events);
  }

  /** Create a fluent builder for configuring and constructing a GatewayProxy */
  static builder(): GatewayProxyBuilder {
    return new GatewayProxyBuilder();
  }

  get url(): string {
    return this.client.baseUrl;
  }

  get apiVersion(): ApiVersion {
    return this.client.catalog.version;
  }

  async getNetworkConfig(options?: ReadOptions): Promise<NetworkConfig> {
    return this.read(GatewayOperation.GET_NETWORK_CONFIG, {}, decodeNetworkConfig, options);
  }

  async getNetworkEconomics(options?: ReadOptions): Promise<NetworkEconomics> {
    return this.read(GatewayOperation.GET_NETWORK_ECONOMICS, {}, decodeNetworkEconomics, options);
  }

  async getNetworkStatus(shard: number = METACHAIN_SHARD_ID, options?: ReadOptions): Promise<NetworkStatus> {
    return this.read(GatewayOperation.GET_NETWORK_STATUS, { shard }, decodeNetworkStatus, options);
  }

  async getAccount(address: string, options?: ReadOptions): Promise<AccountInfo> {
    return this.read(GatewayOperation.GET_ACCOUNT, { address }, (payload) => decodeAccount(payload, address), options);
  }

  async getAccountTokenBalance(address: string, identifier: string, options?: ReadOptions): Promise<string> {
    return this.read(GatewayOperation.GET_ACCOUNT_TOKEN_BALANCE, { address, identifier }, decodeTokenBalance, options);
  }

  async getToken(identifier: string, options?: ReadOptions): Promise<TokenMetadata> {
    return this.read(GatewayOperation.GET_TOKEN, { identifier }, decodeToken, options);
  }

  /**
   * Broadcast one signed transaction and return its hash. Single attempt.
   * @throws {GatewayError} with the classified kind; nothing is resent.
   */
  async sendTransaction(transaction: SignedTransaction, options?: CallOptions): Promise<string> {
    const hash = await this.client.call({
      operation: GatewayOperation.SEND_TRANSACTION,
      body: transaction,
      decode: decodeTransactionHash,
      retry: false,
      signal: options?.signal,
    });
    this.logger.info("Transaction sent", { hash, sender: transaction.sender, nonce: transaction.nonce });
    this.events.emit(GatewayEvent.SENT, { hash, sender: transaction.sender });
    return hash;
  }

  /** Broadcast several signed transactions in one request. Single attempt. */
  async sendTransactions(transactions: SignedTransaction[], options?: CallOptions): Promise<SendManyResult> {
    if (transactions.length === 0) {
      throw new GatewayError(GatewayErrorKind.FATAL, "sendTransactions needs at least one transaction");
    }
    const result = await this.client.call({
      operation: GatewayOperation.SEND_TRANSACTIONS,
      body: transactions,
      decode: (payload) => decodeSendMany(payload, transactions.length),
      retry: false,
      signal: options?.signal,
    });
    result.hashes.forEach((hash, index) => {
      const sender = transactions[index]?.sender;
      if (hash && sender !== undefined) this.events.emit(GatewayEvent.SENT, { hash, sender });
    });
    this.logger.info("Transactions sent", { submitted: transactions.length, accepted: result.numSent });
    return result;
  }

  async getTransaction(hash: string, withResults = false, options?: ReadOptions): Promise<TransactionOnNetwork> {
    return this.read(
      GatewayOperation.GET_TRANSACTION,
      { hash, withResults: withResults ? true : undefined },
      (payload) => decodeTransaction(payload, hash, this.statusRules),
      options,
    );
  }

  async getTransactionStatus(hash: string, options?: ReadOptions): Promise<TransactionStatus> {
    return this.read(
      GatewayOperation.GET_TRANSACTION_STATUS,
      { hash },
      (payload) => decodeTransactionStatus(payload, this.statusRules),
      options,
    );
  }

  async getHyperBlockByNonce(nonce: number, options?: ReadOptions): Promise<HyperBlock> {
    return this.read(GatewayOperation.GET_HYPER_BLOCK_BY_NONCE, { nonce }, decodeHyperBlock, options);
  }

  async getHyperBlockByHash(hash: string, options?: ReadOptions): Promise<HyperBlock> {
    return this.read(GatewayOperation.GET_HYPER_BLOCK_BY_HASH, { hash }, decodeHyperBlock, options);
  }

  /** Poller bound to this proxy, sharing its logger and events */
  createPoller(config?: Partial<PollConfig>): TransactionPoller {
    return new TransactionPoller(
      this,
      { ...DEFAULT_POLL_CONFIG, ...this.config.polling, ...config },
      this.logger,
      this.events,
    );
  }

  /** Remove all event listeners */
  destroy(): void {
    this.events.removeAllListeners();
  }

  private read<T>(
    operation: GatewayOperation,
    params: Record<string, string | number | boolean | undefined>,
    decode: (payload: unknown) => T,
    options?: ReadOptions,
  ): Promise<T> {
    return this.client.call({
      operation,
      params,
      decode,
      retry: options?.retry ?? this.retryPolicy,
      signal: options?.signal,
    });
  }
}
