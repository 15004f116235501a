import { describe, expect, it } from "vitest";
import { GatewayErrorKind } from "../../src/errors.js";
import {
  decodeAccount,
  decodeHyperBlock,
  decodeNetworkConfig,
  decodeNetworkEconomics,
  decodeSendMany,
  decodeToken,
  decodeTokenBalance,
  decodeTransaction,
} from "../../src/proxy/decoders.js";
import { DEFAULT_STATUS_RULES } from "../../src/proxy/transaction-status.js";
import { NETWORK_CONFIG_PAYLOAD, TEST_ADDRESS, TEST_HASH, transactionPayload } from "../helpers/fixtures.js";

describe("decoders", () => {
  it("accepts counters sent as decimal strings", () => {
    const payload = {
      config: { ...NETWORK_CONFIG_PAYLOAD.config, erd_min_gas_limit: "50000", erd_epoch_number: 12, erd_current_round: "3400" },
    };

    const config = decodeNetworkConfig(payload);

    expect(config.minGasLimit).toBe(50_000);
    expect(config.currentEpoch).toBe(12);
    expect(config.currentRound).toBe(3_400);
  });

  it("reports a missing required field as DECODE", () => {
    const { erd_chain_id: _dropped, ...rest } = NETWORK_CONFIG_PAYLOAD.config;

    expect(() => decodeNetworkConfig({ config: rest })).toThrow(
      expect.objectContaining({
        kind: GatewayErrorKind.DECODE,
        message: "Unexpected network config payload: config.erd_chain_id: Required",
      }),
    );
  });

  it("keeps amounts as the node's exact string", () => {
    const economics = decodeNetworkEconomics({
      metrics: { erd_total_supply: "20000000000000000000000000", erd_circulating_supply: "19999999999999999999999999" },
    });

    expect(economics.totalSupply).toBe("20000000000000000000000000");
    expect(economics.circulatingSupply).toBe("19999999999999999999999999");
  });

  it("returns a frozen account snapshot", () => {
    const account = decodeAccount(
      { account: { address: TEST_ADDRESS, balance: "123456789012345678901234567890", nonce: 42, username: "" } },
      "ignored",
    );

    expect(account.balance).toBe("123456789012345678901234567890");
    expect(account.nonce).toBe(42);
    expect(account.address).toBe(TEST_ADDRESS);
    expect(account.username).toBeUndefined();
    expect(Object.isFrozen(account)).toBe(true);
  });

  it("rejects a negative nonce", () => {
    expect(() => decodeAccount({ account: { balance: "1", nonce: -1 } }, TEST_ADDRESS)).toThrow(
      expect.objectContaining({ kind: GatewayErrorKind.DECODE }),
    );
  });

  it("decodes token metadata and balances", () => {
    const token = decodeToken({
      token: { identifier: "TKN-a1b2c3", name: "Token", ticker: "TKN", owner: TEST_ADDRESS, decimals: 6, type: "FungibleDCDT" },
    });

    expect(token).toEqual({
      identifier: "TKN-a1b2c3",
      name: "Token",
      ticker: "TKN",
      owner: TEST_ADDRESS,
      decimals: 6,
      type: "FungibleDCDT",
      supply: undefined,
      properties: {},
    });
    expect(decodeTokenBalance({ tokenData: { balance: "1500" } })).toBe("1500");
  });

  it("fills every submitted position of a batch result", () => {
    expect(decodeSendMany({ numOfSentTxs: 2, txsHashes: { "0": "h0", "2": "h2" } }, 3)).toEqual({
      numSent: 2,
      hashes: ["h0", undefined, "h2"],
    });
    expect(decodeSendMany({ numOfSentTxs: 0, txsHashes: null }, 1)).toEqual({ numSent: 0, hashes: [undefined] });
  });

  it("decodes a transaction and keeps the raw object", () => {
    const payload = transactionPayload("success", { hash: undefined, smartContractResults: [{ nonce: 8 }], gasUsed: 50_000 });

    const tx = decodeTransaction(payload, TEST_HASH, DEFAULT_STATUS_RULES);

    expect(tx.hash).toBe(TEST_HASH);
    expect(tx.status.isSuccessful()).toBe(true);
    expect(tx.blockNonce).toBe(120);
    expect(tx.smartContractResults).toEqual([{ nonce: 8 }]);
    expect(tx.raw.gasUsed).toBe(50_000);
  });

  it("defaults missing smart contract results to an empty list", () => {
    expect(decodeTransaction(transactionPayload("pending"), TEST_HASH, DEFAULT_STATUS_RULES).smartContractResults).toEqual([]);
  });

  it("decodes a hyperblock", () => {
    const block = decodeHyperBlock({
      hyperblock: { nonce: 10, round: 11, hash: "hb-10", prevBlockHash: "hb-9", epoch: 1, numTxs: 0, shardBlocks: null },
    });

    expect(block).toEqual({
      nonce: 10,
      round: 11,
      hash: "hb-10",
      prevBlockHash: "hb-9",
      epoch: 1,
      numTxs: 0,
      timestamp: undefined,
      shardBlocks: [],
      transactions: [],
    });
  });
});
