import { z } from "zod";
import { GatewayError, GatewayErrorKind } from "../errors.js";
import { type StatusRules, TransactionStatus } from "./transaction-status.js";
import type {
  AccountInfo,
  HyperBlock,
  NetworkConfig,
  NetworkEconomics,
  NetworkStatus,
  SendManyResult,
  TokenMetadata,
  TransactionOnNetwork,
} from "./types.js";

// Gateways send most counters as JSON numbers, some as decimal strings
const numeric = z.union([z.number(), z.string().regex(/^-?\d+(\.\d+)?$/).transform(Number)]);
const count = numeric.pipe(z.number().int().nonnegative());
/** Arbitrary-precision amount, kept as the node's exact string */
const amount = z.string().regex(/^\d+$/, "expected a non-negative integer string");
const record = z.record(z.unknown());

const networkConfigPayload = z.object({
  config: z.object({
    erd_chain_id: z.string().min(1),
    erd_min_gas_price: count,
    erd_min_gas_limit: count,
    erd_gas_per_data_byte: count,
    erd_round_duration: count,
    erd_num_shards_without_meta: count,
    erd_min_transaction_version: count,
    erd_start_time: count.optional(),
    erd_rounds_per_epoch: count.optional(),
    erd_denomination: count.optional(),
    erd_epoch_number: count.optional(),
    erd_current_round: count.optional(),
  }),
});

const networkEconomicsPayload = z.object({
  metrics: z.object({
    erd_total_supply: amount,
    erd_circulating_supply: amount,
    erd_staked_value: amount.optional(),
    erd_inflation: numeric.optional(),
    erd_dev_rewards: amount.optional(),
    erd_total_fees: amount.optional(),
    erd_epoch_for_economics_data: count.optional(),
  }),
});

const networkStatusPayload = z.object({
  status: z.object({
    erd_current_round: count,
    erd_epoch_number: count,
    erd_nonce: count,
    erd_highest_final_nonce: count,
    erd_nonce_at_epoch_start: count.optional(),
    erd_round_at_epoch_start: count.optional(),
    erd_rounds_per_epoch: count.optional(),
  }),
});

const accountPayload = z.object({
  account: z.object({
    address: z.string().min(1).optional(),
    balance: amount,
    nonce: count,
    username: z.string().optional(),
    code: z.string().optional(),
    codeHash: z.string().nullish(),
    rootHash: z.string().nullish(),
    codeMetadata: z.string().nullish(),
    ownerAddress: z.string().optional(),
    developerReward: amount.optional(),
  }),
});

const tokenPayload = z.object({
  token: z.object({
    identifier: z.string().min(1),
    name: z.string(),
    ticker: z.string(),
    owner: z.string(),
    decimals: count,
    type: z.string(),
    supply: amount.optional(),
    properties: record.optional(),
  }),
});

const tokenBalancePayload = z.object({
  tokenData: z.object({ balance: amount }),
});

const sendPayload = z.object({ txHash: z.string().min(1) });

const sendManyPayload = z.object({
  numOfSentTxs: count,
  txsHashes: z.record(z.string()).nullish(),
});

const transactionObject = z
  .object({
    hash: z.string().optional(),
    nonce: count,
    value: amount,
    receiver: z.string(),
    sender: z.string(),
    status: z.string().min(1),
    blockNonce: count.optional(),
    blockHash: z.string().optional(),
    round: count.optional(),
    epoch: count.optional(),
    logs: z.unknown(),
    smartContractResults: z.array(z.unknown()).nullish(),
  })
  .passthrough();

const transactionPayload = z.object({ transaction: transactionObject });

const transactionStatusPayload = z.object({ status: z.string().min(1) });

const hyperBlockPayload = z.object({
  hyperblock: z.object({
    nonce: count,
    round: count,
    hash: z.string().min(1),
    prevBlockHash: z.string(),
    epoch: count,
    numTxs: count,
    timestamp: count.optional(),
    shardBlocks: z.array(record).nullish(),
    transactions: z.array(record).nullish(),
  }),
});

/** Validate `payload` against `schema`; a mismatch is a DECODE error, never a default */
export function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, what: string): T {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
  throw new GatewayError(GatewayErrorKind.DECODE, `Unexpected ${what} payload: ${issues.join("; ")}`, {
    context: { what, issues },
  });
}

export function decodeNetworkConfig(payload: unknown): NetworkConfig {
  const { config } = decode(networkConfigPayload, payload, "network config");
  return {
    chainId: config.erd_chain_id,
    minGasPrice: config.erd_min_gas_price,
    minGasLimit: config.erd_min_gas_limit,
    gasPerDataByte: config.erd_gas_per_data_byte,
    roundDuration: config.erd_round_duration,
    numShards: config.erd_num_shards_without_meta,
    minTransactionVersion: config.erd_min_transaction_version,
    startTime: config.erd_start_time,
    roundsPerEpoch: config.erd_rounds_per_epoch,
    denomination: config.erd_denomination,
    currentEpoch: config.erd_epoch_number,
    currentRound: config.erd_current_round,
  };
}

export function decodeNetworkEconomics(payload: unknown): NetworkEconomics {
  const { metrics } = decode(networkEconomicsPayload, payload, "network economics");
  return {
    totalSupply: metrics.erd_total_supply,
    circulatingSupply: metrics.erd_circulating_supply,
    staked: metrics.erd_staked_value,
    inflation: metrics.erd_inflation,
    devRewards: metrics.erd_dev_rewards,
    totalFees: metrics.erd_total_fees,
    epochForEconomicsData: metrics.erd_epoch_for_economics_data,
  };
}

export function decodeNetworkStatus(payload: unknown): NetworkStatus {
  const { status } = decode(networkStatusPayload, payload, "network status");
  return {
    currentRound: status.erd_current_round,
    epochNumber: status.erd_epoch_number,
    nonce: status.erd_nonce,
    highestFinalNonce: status.erd_highest_final_nonce,
    nonceAtEpochStart: status.erd_nonce_at_epoch_start,
    roundAtEpochStart: status.erd_round_at_epoch_start,
    roundsPerEpoch: status.erd_rounds_per_epoch,
  };
}

/** `address` fills in when the node omits it from the account object */
export function decodeAccount(payload: unknown, address: string): AccountInfo {
  const { account } = decode(accountPayload, payload, "account");
  return Object.freeze({
    address: account.address ?? address,
    balance: account.balance,
    nonce: account.nonce,
    username: account.username || undefined,
    code: account.code || undefined,
    codeHash: account.codeHash ?? undefined,
    rootHash: account.rootHash ?? undefined,
    codeMetadata: account.codeMetadata ?? undefined,
    ownerAddress: account.ownerAddress || undefined,
    developerReward: account.developerReward,
  });
}

export function decodeToken(payload: unknown): TokenMetadata {
  const { token } = decode(tokenPayload, payload, "token");
  return {
    identifier: token.identifier,
    name: token.name,
    ticker: token.ticker,
    owner: token.owner,
    decimals: token.decimals,
    type: token.type,
    supply: token.supply,
    properties: token.properties ?? {},
  };
}

export function decodeTokenBalance(payload: unknown): string {
  return decode(tokenBalancePayload, payload, "token balance").tokenData.balance;
}

export function decodeTransactionHash(payload: unknown): string {
  return decode(sendPayload, payload, "send transaction").txHash;
}

export function decodeSendMany(payload: unknown, submitted: number): SendManyResult {
  const result = decode(sendManyPayload, payload, "send transactions");
  const byIndex = result.txsHashes ?? {};
  return {
    numSent: result.numOfSentTxs,
    hashes: Array.from({ length: submitted }, (_, index) => byIndex[String(index)]),
  };
}

/** `hash` fills in when the node omits it from the transaction object */
export function decodeTransaction(payload: unknown, hash: string, rules: StatusRules): TransactionOnNetwork {
  const { transaction } = decode(transactionPayload, payload, "transaction");
  return {
    hash: transaction.hash ?? hash,
    sender: transaction.sender,
    receiver: transaction.receiver,
    nonce: transaction.nonce,
    value: transaction.value,
    status: new TransactionStatus(transaction.status, rules),
    blockNonce: transaction.blockNonce,
    blockHash: transaction.blockHash,
    round: transaction.round,
    epoch: transaction.epoch,
    logs: transaction.logs,
    smartContractResults: transaction.smartContractResults ?? [],
    raw: transaction,
  };
}

export function decodeTransactionStatus(payload: unknown, rules: StatusRules): TransactionStatus {
  return new TransactionStatus(decode(transactionStatusPayload, payload, "transaction status").status, rules);
}

export function decodeHyperBlock(payload: unknown): HyperBlock {
  const { hyperblock } = decode(hyperBlockPayload, payload, "hyperblock");
  return {
    nonce: hyperblock.nonce,
    round: hyperblock.round,
    hash: hyperblock.hash,
    prevBlockHash: hyperblock.prevBlockHash,
    epoch: hyperblock.epoch,
    numTxs: hyperblock.numTxs,
    timestamp: hyperblock.timestamp,
    shardBlocks: hyperblock.shardBlocks ?? [],
    transactions: hyperblock.transactions ?? [],
  };
}
