import { describe, expect, it } from "vitest";
import { GatewayError, GatewayErrorKind } from "../../src/errors.js";
import { RetryPolicy } from "../../src/retry/policy.js";
import type { RetryPolicyConfig } from "../../src/retry/types.js";

describe("RetryPolicy", () => {
  it("follows an exponential schedule and stops at maxAttempts", () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, backoffMultiplier: 2 });

    expect(policy.nextDelay(0)).toBe(100);
    expect(policy.nextDelay(1)).toBe(200);
    expect(policy.nextDelay(2)).toBeUndefined();
  });

  it("is deterministic without jitter", () => {
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 250 });
    const first = [0, 1, 2, 3].map((i) => policy.nextDelay(i));
    const second = [0, 1, 2, 3].map((i) => policy.nextDelay(i));

    expect(first).toEqual([250, 500, 1_000, undefined]);
    expect(second).toEqual(first);
  });

  it("caps each delay at maxDelayMs", () => {
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 1_000, backoffMultiplier: 10, maxDelayMs: 5_000 });

    expect(policy.nextDelay(0)).toBe(1_000);
    expect(policy.nextDelay(1)).toBe(5_000);
    expect(policy.nextDelay(2)).toBe(5_000);
  });

  it("stretches the delay after a rate-limited attempt", () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, rateLimitMultiplier: 3 });

    expect(policy.nextDelay(0, { rateLimited: true })).toBe(300);
    expect(policy.nextDelay(0, { rateLimited: false })).toBe(100);
  });

  it("perturbs the delay by at most the jitter fraction", () => {
    const low = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 100, jitter: 0.5, random: () => 0 });
    const high = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 100, jitter: 0.5, random: () => 0.75 });

    expect(low.nextDelay(0)).toBe(50);
    expect(high.nextDelay(0)).toBe(125);
  });

  it("keeps maxDelayMs as a hard bound under jitter", () => {
    const policy = new RetryPolicy({
      maxAttempts: 2,
      baseDelayMs: 1_000,
      maxDelayMs: 1_000,
      jitter: 0.5,
      random: () => 0.99,
    });

    expect(policy.nextDelay(0)).toBe(1_000);
  });

  it("raises the delay to a server-requested wait within maxDelayMs", () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 5_000 });

    expect(policy.nextDelay(0, { minDelayMs: 700 })).toBe(700);
    expect(policy.nextDelay(0, { minDelayMs: 20 })).toBe(100);
    expect(policy.nextDelay(0, { minDelayMs: 60_000 })).toBe(5_000);
  });

  it("ends the schedule when a server-requested wait reaches past the deadline", () => {
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 100, deadline: 1_500, now: () => 1_000 });

    expect(policy.nextDelay(0, { minDelayMs: 400 })).toBe(400);
    expect(policy.nextDelay(0, { minDelayMs: 600 })).toBeUndefined();
  });

  it("never hands out a delay past the deadline", () => {
    let now = 1_000;
    const policy = new RetryPolicy({
      maxAttempts: 10,
      baseDelayMs: 100,
      deadline: 1_150,
      now: () => now,
    });

    expect(policy.nextDelay(0)).toBe(100);
    expect(policy.nextDelay(1)).toBe(150);
    expect(policy.isExpired()).toBe(false);

    now = 1_150;
    expect(policy.nextDelay(1)).toBeUndefined();
    expect(policy.isExpired()).toBe(true);
  });

  it("once() allows a single attempt", () => {
    const policy = RetryPolicy.once();
    expect(policy.maxAttempts).toBe(1);
    expect(policy.nextDelay(0)).toBeUndefined();
  });

  it("with() replaces settings and keeps the rest", () => {
    const policy = new RetryPolicy({ maxAttempts: 6, baseDelayMs: 40 }).with({ maxAttempts: 2 });

    expect(policy.maxAttempts).toBe(2);
    expect(policy.baseDelayMs).toBe(40);
    expect(policy.backoffMultiplier).toBe(2);
  });

  const invalidConfigs: [Partial<RetryPolicyConfig>, string][] = [
    [{ maxAttempts: 0 }, "maxAttempts must be an integer >= 1, got 0"],
    [{ maxAttempts: 1.5 }, "maxAttempts must be an integer >= 1, got 1.5"],
    [{ baseDelayMs: -1 }, "baseDelayMs must be >= 0, got -1"],
    [{ backoffMultiplier: 0.5 }, "backoffMultiplier must be >= 1, got 0.5"],
    [{ jitter: 2 }, "jitter must be within [0, 1], got 2"],
    [{ maxDelayMs: -5 }, "maxDelayMs must be >= 0, got -5"],
  ];

  it.each(invalidConfigs)("rejects %o", (config, message) => {
    expect(() => new RetryPolicy(config)).toThrow(`Invalid retry policy: ${message}`);
  });

  it("rejects invalid settings with a FATAL error", () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(GatewayError);
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(
      expect.objectContaining({ kind: GatewayErrorKind.FATAL }),
    );
  });

  it("rejects a negative attempt index", () => {
    expect(() => new RetryPolicy().nextDelay(-1)).toThrow(
      "Invalid retry policy: attempt index must be an integer >= 0, got -1",
    );
  });
});
