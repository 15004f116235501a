import type { PollResult } from "../confirmation/types.js";
import { DEFAULT_SIMULATOR_CONFIG } from "../constants.js";
import { EndpointCatalog, GatewayOperation } from "../endpoints/index.js";
import { GatewayError, GatewayErrorKind, toGatewayError } from "../errors.js";
import { GatewayEvent } from "../events.js";
import { createSilentLogger } from "../logger.js";
import { decodeTransactionHash } from "../proxy/decoders.js";
import type { GatewayProxy } from "../proxy/gateway-proxy.js";
import { GatewayHttpClient } from "../proxy/http-client.js";
import type { TransactionStatus } from "../proxy/transaction-status.js";
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
} from "../proxy/types.js";
import type { CallOptions, Logger } from "../types.js";
import type { ExecuteOptions, SimulatorConfig } from "./types.js";

function assertCount(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new GatewayError(GatewayErrorKind.FATAL, `${name} must be an integer >= ${min}, got ${value}`);
  }
}

/**
 * Decorates a {@link GatewayProxy} with chain simulator control calls.
 *
 * Block production on a simulator is driven by the caller, so inclusion is reached by
 * generating blocks rather than by waiting. Reads and broadcasts are delegated unchanged.
 * The simulator routes live in a catalog private to this class; the wrapped proxy cannot reach them.
 */
export class SimulatorProxy implements NetworkProvider {
  private readonly control: GatewayHttpClient;
  private readonly blocksPerSend: number;

  constructor(
    readonly proxy: GatewayProxy,
    config: SimulatorConfig,
    private readonly logger: Logger = createSilentLogger(),
  ) {
    if (!config.enabled) {
      throw new GatewayError(
        GatewayErrorKind.FATAL,
        "Chain simulator support is disabled. Enable it with .simulator() in the builder or GATEWAY_SIMULATOR=true.",
      );
    }
    this.blocksPerSend = config.blocksPerSend ?? DEFAULT_SIMULATOR_CONFIG.blocksPerSend;
    assertCount("blocksPerSend", this.blocksPerSend, 0);

    const catalog = new EndpointCatalog(proxy.apiVersion, { simulator: true });
    this.control = new GatewayHttpClient(proxy.url, proxy.transport, catalog, logger, proxy.events);
  }

  get events(): GatewayProxy["events"] {
    return this.proxy.events;
  }

  getNetworkConfig(options?: ReadOptions): Promise<NetworkConfig> {
    return this.proxy.getNetworkConfig(options);
  }

  getNetworkEconomics(options?: ReadOptions): Promise<NetworkEconomics> {
    return this.proxy.getNetworkEconomics(options);
  }

  getNetworkStatus(shard?: number, options?: ReadOptions): Promise<NetworkStatus> {
    return this.proxy.getNetworkStatus(shard, options);
  }

  getAccount(address: string, options?: ReadOptions): Promise<AccountInfo> {
    return this.proxy.getAccount(address, options);
  }

  getAccountTokenBalance(address: string, identifier: string, options?: ReadOptions): Promise<string> {
    return this.proxy.getAccountTokenBalance(address, identifier, options);
  }

  getToken(identifier: string, options?: ReadOptions): Promise<TokenMetadata> {
    return this.proxy.getToken(identifier, options);
  }

  sendTransaction(transaction: SignedTransaction, options?: CallOptions): Promise<string> {
    return this.proxy.sendTransaction(transaction, options);
  }

  sendTransactions(transactions: SignedTransaction[], options?: CallOptions): Promise<SendManyResult> {
    return this.proxy.sendTransactions(transactions, options);
  }

  getTransaction(hash: string, withResults?: boolean, options?: ReadOptions): Promise<TransactionOnNetwork> {
    return this.proxy.getTransaction(hash, withResults, options);
  }

  getTransactionStatus(hash: string, options?: ReadOptions): Promise<TransactionStatus> {
    return this.proxy.getTransactionStatus(hash, options);
  }

  getHyperBlockByNonce(nonce: number, options?: ReadOptions): Promise<HyperBlock> {
    return this.proxy.getHyperBlockByNonce(nonce, options);
  }

  getHyperBlockByHash(hash: string, options?: ReadOptions): Promise<HyperBlock> {
    return this.proxy.getHyperBlockByHash(hash, options);
  }

  /** Produce `count` blocks immediately */
  async generateBlocks(count: number, options?: CallOptions): Promise<void> {
    assertCount("count", count, 1);
    await this.control.call({
      operation: GatewayOperation.SIMULATOR_GENERATE_BLOCKS,
      params: { count },
      decode: () => undefined,
      retry: false,
      signal: options?.signal,
    });
    this.logger.debug("Generated blocks", { count });
    this.proxy.events.emit(GatewayEvent.BLOCKS_GENERATED, { count });
  }

  /** Produce blocks until the simulated chain enters `epoch` */
  async generateBlocksUntilEpochReached(epoch: number, options?: CallOptions): Promise<void> {
    assertCount("epoch", epoch, 0);
    await this.control.call({
      operation: GatewayOperation.SIMULATOR_GENERATE_BLOCKS_UNTIL_EPOCH,
      params: { epoch },
      decode: () => undefined,
      retry: false,
      signal: options?.signal,
    });
    this.logger.debug("Generated blocks until epoch", { epoch });
  }

  /** Produce blocks until the transaction, including its cross-shard results, is processed */
  async generateBlocksUntilTransactionProcessed(hash: string, options?: CallOptions): Promise<void> {
    await this.control.call({
      operation: GatewayOperation.SIMULATOR_GENERATE_BLOCKS_UNTIL_TX_PROCESSED,
      params: { hash },
      decode: () => undefined,
      retry: false,
      signal: options?.signal,
    });
    this.logger.debug("Generated blocks until transaction processed", { hash });
  }

  /** Fund `receiver` from the simulator's faucet; returns the funding transaction hash */
  async sendUserFunds(receiver: string, options?: CallOptions): Promise<string> {
    return this.control.call({
      operation: GatewayOperation.SIMULATOR_SEND_USER_FUNDS,
      body: { receiver },
      decode: decodeTransactionHash,
      retry: false,
      signal: options?.signal,
    });
  }

  /**
   * Broadcast, generate blocks, and read the transaction back with its results.
   * No wall-clock waiting: the returned status reflects the generated blocks.
   */
  async sendAndExecute(transaction: SignedTransaction, options?: ExecuteOptions): Promise<TransactionOnNetwork> {
    const signal = options?.signal;
    const hash = await this.proxy.sendTransaction(transaction, { signal });
    const blocks = options?.blocks ?? this.blocksPerSend;
    if (blocks > 0) await this.generateBlocks(blocks, { signal });
    return this.proxy.getTransaction(hash, true, { signal });
  }

  /**
   * Simulator counterpart of the transaction poller: generates blocks until the transaction
   * is processed, then reads it once.
   */
  async awaitCompletion(hash: string, options?: CallOptions): Promise<PollResult> {
    const startTime = Date.now();
    const latencyMs = () => Date.now() - startTime;

    try {
      await this.generateBlocksUntilTransactionProcessed(hash, options);
      const transaction = await this.proxy.getTransaction(hash, true, { signal: options?.signal, retry: false });

      if (transaction.status.isSuccessful()) {
        return { state: "succeeded", hash, transaction, attempts: 1, latencyMs: latencyMs() };
      }
      if (transaction.status.isFailed() || transaction.status.isInvalid()) {
        return { state: "failed", hash, transaction, attempts: 1, latencyMs: latencyMs() };
      }
      const error = new GatewayError(
        GatewayErrorKind.TIMED_OUT,
        `Transaction ${hash} still ${transaction.status.status} after block generation`,
        { context: { hash } },
      );
      return { state: "timed_out", hash, error, attempts: 1, latencyMs: latencyMs(), lastSeen: transaction };
    } catch (err) {
      const error = toGatewayError(err);
      const state = error.kind === GatewayErrorKind.CANCELLED ? "cancelled" : "errored";
      return { state, hash, error, attempts: 1, latencyMs: latencyMs() };
    }
  }
}
