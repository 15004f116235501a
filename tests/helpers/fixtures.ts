import type { SignedTransaction } from "../../src/proxy/types.js";

export const TEST_GATEWAY_URL = "http://gateway.test";
export const TEST_ADDRESS = "drt1qyu5wthldzr8wx5c9ucg8kjagg0jfs53s8nr3zpz3hypefsdd8ssey5egf";
export const TEST_RECEIVER = "drt1spyavw0956vq68xj8y4tenjpq2wd5a9p2c6j8gsz7ztyrnpxrruqlqhr9t";
export const TEST_HASH = "a1b2c3d4e5f60718293a4b5c6d7e8f90a1b2c3d4e5f60718293a4b5c6d7e8f90";

export const TEST_TRANSACTION: SignedTransaction = {
  nonce: 7,
  value: "1000000000000000000",
  receiver: TEST_RECEIVER,
  sender: TEST_ADDRESS,
  gasPrice: 1_000_000_000,
  gasLimit: 50_000,
  data: "dGVzdA==",
  chainID: "chain",
  version: 2,
  signature: "test-signature",
};

export const NETWORK_CONFIG_PAYLOAD = {
  config: {
    erd_chain_id: "chain",
    erd_min_gas_price: 1_000_000_000,
    erd_min_gas_limit: 50_000,
    erd_gas_per_data_byte: 1_500,
    erd_round_duration: 6_000,
    erd_num_shards_without_meta: 3,
    erd_min_transaction_version: 1,
    erd_start_time: 1_700_000_000,
    erd_rounds_per_epoch: 14_400,
    erd_denomination: 18,
    erd_extra_field_from_newer_node: "ignored",
  },
};

export function transactionPayload(status: string, extra?: Record<string, unknown>): { transaction: Record<string, unknown> } {
  return {
    transaction: {
      type: "normal",
      hash: TEST_HASH,
      nonce: 7,
      value: "1000000000000000000",
      receiver: TEST_RECEIVER,
      sender: TEST_ADDRESS,
      status,
      blockNonce: 120,
      blockHash: "blockhash-120",
      round: 121,
      epoch: 3,
      ...extra,
    },
  };
}
