import { describe, expect, it } from "vitest";
import { DEFAULT_STATUS_RULES, TransactionStatus, extendStatusRules } from "../../src/proxy/transaction-status.js";

describe("TransactionStatus", () => {
  it.each(["success", "successful", "executed", "SUCCESS"])("%s is successful and terminal", (status) => {
    const parsed = new TransactionStatus(status);
    expect(parsed.isSuccessful()).toBe(true);
    expect(parsed.isTerminal()).toBe(true);
    expect(parsed.isPending()).toBe(false);
  });

  it.each(["fail", "failed"])("%s is failed", (status) => {
    expect(new TransactionStatus(status).isFailed()).toBe(true);
  });

  it("treats invalid as terminal but not failed", () => {
    const status = new TransactionStatus("invalid");
    expect(status.isInvalid()).toBe(true);
    expect(status.isFailed()).toBe(false);
    expect(status.isTerminal()).toBe(true);
  });

  it.each(["pending", "received", "partially-executed", "some-future-status"])("%s is pending", (status) => {
    expect(new TransactionStatus(status).isPending()).toBe(true);
  });

  it("keeps the node's string verbatim", () => {
    const status = new TransactionStatus(" Success ");
    expect(status.isSuccessful()).toBe(true);
    expect(status.toString()).toBe(" Success ");
    expect(JSON.stringify({ status })).toBe('{"status":" Success "}');
  });

  it("recognises extra status strings on top of the defaults", () => {
    const rules = extendStatusRules(DEFAULT_STATUS_RULES, { failed: ["reverted"] });

    expect(new TransactionStatus("reverted", rules).isFailed()).toBe(true);
    expect(new TransactionStatus("fail", rules).isFailed()).toBe(true);
    expect(new TransactionStatus("reverted").isPending()).toBe(true);
  });

  it("returns the base rules when there is nothing to add", () => {
    expect(extendStatusRules(DEFAULT_STATUS_RULES)).toBe(DEFAULT_STATUS_RULES);
  });
});
