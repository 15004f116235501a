import type { CallOptions } from "../types.js";
import type { RetryPolicy } from "../retry/policy.js";
import type { TransactionStatus } from "./transaction-status.js";

export interface NetworkConfig {
  chainId: string;
  minGasPrice: number;
  minGasLimit: number;
  gasPerDataByte: number;
  /** Round duration in ms */
  roundDuration: number;
  numShards: number;
  minTransactionVersion: number;
  startTime?: number | undefined;
  roundsPerEpoch?: number | undefined;
  denomination?: number | undefined;
  /** Only reported by some node versions; {@link NetworkStatus} always has them */
  currentEpoch?: number | undefined;
  currentRound?: number | undefined;
}

export interface NetworkEconomics {
  totalSupply: string;
  circulatingSupply: string;
  staked?: string | undefined;
  inflation?: number | undefined;
  devRewards?: string | undefined;
  totalFees?: string | undefined;
  epochForEconomicsData?: number | undefined;
}

export interface NetworkStatus {
  currentRound: number;
  epochNumber: number;
  nonce: number;
  highestFinalNonce: number;
  nonceAtEpochStart?: number | undefined;
  roundAtEpochStart?: number | undefined;
  roundsPerEpoch?: number | undefined;
}

export interface AccountInfo {
  readonly address: string;
  /** Arbitrary-precision integer, verbatim from the node */
  readonly balance: string;
  readonly nonce: number;
  readonly username?: string | undefined;
  readonly code?: string | undefined;
  readonly codeHash?: string | undefined;
  readonly rootHash?: string | undefined;
  readonly codeMetadata?: string | undefined;
  readonly ownerAddress?: string | undefined;
  readonly developerReward?: string | undefined;
}

export interface TokenMetadata {
  identifier: string;
  name: string;
  ticker: string;
  owner: string;
  decimals: number;
  type: string;
  supply?: string | undefined;
  /** Node-reported flags (canMint, canFreeze, ...) passed through untouched */
  properties: Record<string, unknown>;
}

export interface TransactionOnNetwork {
  hash: string;
  sender: string;
  receiver: string;
  nonce: number;
  value: string;
  status: TransactionStatus;
  blockNonce?: number | undefined;
  blockHash?: string | undefined;
  round?: number | undefined;
  epoch?: number | undefined;
  /** Opaque event log */
  logs?: unknown;
  smartContractResults: unknown[];
  /** The node's transaction object as received */
  raw: Record<string, unknown>;
}

export interface HyperBlock {
  nonce: number;
  round: number;
  hash: string;
  prevBlockHash: string;
  epoch: number;
  numTxs: number;
  timestamp?: number | undefined;
  shardBlocks: Record<string, unknown>[];
  transactions: Record<string, unknown>[];
}

/**
 * A signed transaction in the gateway's JSON form, built and signed upstream.
 * Passed to the node as-is.
 */
export interface SignedTransaction {
  nonce: number;
  value: string;
  receiver: string;
  sender: string;
  gasPrice: number;
  gasLimit: number;
  data?: string | undefined;
  chainID: string;
  version: number;
  signature: string;
  [field: string]: unknown;
}

export interface SendManyResult {
  numSent: number;
  /** Hash per submitted transaction, by position; undefined where the node rejected it */
  hashes: (string | undefined)[];
}

export interface ReadOptions extends CallOptions {
  /** Retry policy for this call; `false` makes a single attempt */
  retry?: RetryPolicy | false | undefined;
}

/** Read and broadcast operations shared by the gateway proxy and its simulator decorator */
export interface NetworkProvider {
  getNetworkConfig(options?: ReadOptions): Promise<NetworkConfig>;
  getNetworkEconomics(options?: ReadOptions): Promise<NetworkEconomics>;
  getNetworkStatus(shard?: number, options?: ReadOptions): Promise<NetworkStatus>;
  getAccount(address: string, options?: ReadOptions): Promise<AccountInfo>;
  getAccountTokenBalance(address: string, identifier: string, options?: ReadOptions): Promise<string>;
  getToken(identifier: string, options?: ReadOptions): Promise<TokenMetadata>;
  sendTransaction(transaction: SignedTransaction, options?: CallOptions): Promise<string>;
  sendTransactions(transactions: SignedTransaction[], options?: CallOptions): Promise<SendManyResult>;
  getTransaction(hash: string, withResults?: boolean, options?: ReadOptions): Promise<TransactionOnNetwork>;
  getTransactionStatus(hash: string, options?: ReadOptions): Promise<TransactionStatus>;
  getHyperBlockByNonce(nonce: number, options?: ReadOptions): Promise<HyperBlock>;
  getHyperBlockByHash(hash: string, options?: ReadOptions): Promise<HyperBlock>;
}
