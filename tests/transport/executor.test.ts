import { describe, expect, it } from "vitest";
import { GatewayError, GatewayErrorKind } from "../../src/errors.js";
import { TransportExecutor } from "../../src/transport/executor.js";
import { connectionError, createFakeFetch } from "../helpers/fake-fetch.js";

const ENDPOINT = "http://gateway.test/network/config";

describe("TransportExecutor", () => {
  it("returns status, body and retry-after of any HTTP response", async () => {
    const fake = createFakeFetch({ status: 503, body: "overloaded", headers: { "Retry-After": "2" } });
    const executor = new TransportExecutor({ fetch: fake.fetch });

    const outcome = await executor.execute("GET", ENDPOINT);

    expect(outcome).toEqual({
      ok: true,
      value: { url: ENDPOINT, status: 503, body: "overloaded", retryAfter: "2" },
    });
  });

  it("sends the body as JSON on POST", async () => {
    const fake = createFakeFetch({ status: 200, body: { data: { txHash: "abc" } } });
    const executor = new TransportExecutor({ fetch: fake.fetch, headers: { "X-Client": "test" } });

    await executor.execute("POST", "http://gateway.test/transaction/send", { body: '{"nonce":1}' });

    expect(fake.calls).toEqual([{ url: "http://gateway.test/transaction/send", method: "POST", body: '{"nonce":1}' }]);
    const init = fake.fetch.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({
      Accept: "application/json",
      "X-Client": "test",
      "Content-Type": "application/json",
    });
  });

  it("maps a connection error to a connection failure with its system code", async () => {
    const fake = createFakeFetch(connectionError("ECONNRESET"));
    const executor = new TransportExecutor({ fetch: fake.fetch });

    const outcome = await executor.execute("GET", ENDPOINT);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.reason).toBe("connection");
    expect(outcome.error.code).toBe("ECONNRESET");
    expect(outcome.error.message).toBe("fetch failed (ECONNRESET)");
  });

  it("gives up at the timeout even if fetch never settles", async () => {
    const fake = createFakeFetch(() => new Promise<Response>(() => {}));
    const executor = new TransportExecutor({ fetch: fake.fetch });

    const outcome = await executor.execute("GET", ENDPOINT, { timeoutMs: 20 });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.reason).toBe("timeout");
    expect(outcome.error.message).toBe("Request timed out after 20ms");
  });

  it("reports an external abort as aborted", async () => {
    const controller = new AbortController();
    const fake = createFakeFetch(() => {
      controller.abort();
      return new Promise<Response>(() => {});
    });
    const executor = new TransportExecutor({ fetch: fake.fetch });

    const outcome = await executor.execute("GET", ENDPOINT, { signal: controller.signal, timeoutMs: 5_000 });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.reason).toBe("aborted");
  });

  it("does not call fetch when the signal is already aborted", async () => {
    const fake = createFakeFetch();
    const executor = new TransportExecutor({ fetch: fake.fetch });
    const controller = new AbortController();
    controller.abort();

    const outcome = await executor.execute("GET", ENDPOINT, { signal: controller.signal });

    expect(outcome.ok).toBe(false);
    expect(fake.fetch).not.toHaveBeenCalled();
  });

  it("rejects a non-positive timeout", async () => {
    const executor = new TransportExecutor({ fetch: createFakeFetch().fetch });

    await expect(executor.execute("GET", ENDPOINT, { timeoutMs: 0 })).rejects.toThrow(GatewayError);
    expect(() => new TransportExecutor({ timeoutMs: -1 })).toThrow("Timeout must be a positive number of ms, got -1");
  });

  it("rejects with a FATAL kind for invalid timeouts", async () => {
    const executor = new TransportExecutor({ fetch: createFakeFetch().fetch });
    await expect(executor.execute("GET", ENDPOINT, { timeoutMs: Number.NaN })).rejects.toMatchObject({
      kind: GatewayErrorKind.FATAL,
    });
  });
});
