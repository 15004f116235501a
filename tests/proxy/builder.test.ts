import { describe, expect, it } from "vitest";
import { LOCAL_SIMULATOR_URL } from "../../src/constants.js";
import { GatewayProxy } from "../../src/proxy/gateway-proxy.js";
import { RetryPolicy } from "../../src/retry/policy.js";
import { SimulatorProxy } from "../../src/simulator/simulator-proxy.js";
import { TransportExecutor } from "../../src/transport/executor.js";
import { createFakeFetch } from "../helpers/fake-fetch.js";
import { TEST_GATEWAY_URL } from "../helpers/fixtures.js";

describe("GatewayProxyBuilder", () => {
  it("builds a proxy with the configured settings", () => {
    const policy = new RetryPolicy({ maxAttempts: 2 });
    const proxy = GatewayProxy.builder().url(TEST_GATEWAY_URL).apiVersion("v2").timeout(5_000).withRetry(policy).build();

    expect(proxy).toBeInstanceOf(GatewayProxy);
    expect(proxy.apiVersion).toBe("v2");
    expect(proxy.retryPolicy).toBe(policy);
    expect(proxy.transport.defaultTimeoutMs).toBe(5_000);
  });

  it("turns plain retry settings into a policy", () => {
    const proxy = GatewayProxy.builder().url(TEST_GATEWAY_URL).withRetry({ maxAttempts: 6 }).build();

    expect(proxy.retryPolicy.maxAttempts).toBe(6);
    expect(proxy.retryPolicy.baseDelayMs).toBe(500);
  });

  it("shares a given transport between proxies", () => {
    const transport = new TransportExecutor({ fetch: createFakeFetch().fetch });
    const first = GatewayProxy.builder().url(TEST_GATEWAY_URL).withTransport(transport).build();
    const second = GatewayProxy.builder().url("http://other.test").withTransport(transport).build();

    expect(first.transport).toBe(transport);
    expect(second.transport).toBe(transport);
  });

  it("throws without a URL", () => {
    expect(() => GatewayProxy.builder().build()).toThrow(
      "GatewayProxyBuilder: a gateway URL is required. Call .url() or .fromEnv()",
    );
  });

  it("builds a simulator only after opting in", () => {
    expect(() => GatewayProxy.builder().url(TEST_GATEWAY_URL).buildSimulator()).toThrow(
      "GatewayProxyBuilder: simulator mode is off. Call .simulator() before .buildSimulator()",
    );

    const simulator = GatewayProxy.builder().url(TEST_GATEWAY_URL).simulator().buildSimulator();
    expect(simulator).toBeInstanceOf(SimulatorProxy);
    expect(simulator.proxy.url).toBe(TEST_GATEWAY_URL);
  });

  it("reads its settings from the environment", () => {
    const proxy = GatewayProxy.builder()
      .fromEnv({ GATEWAY_URL: TEST_GATEWAY_URL, GATEWAY_API_VERSION: "v2", GATEWAY_RETRY_MAX_ATTEMPTS: "2" })
      .build();

    expect(proxy.url).toBe(TEST_GATEWAY_URL);
    expect(proxy.apiVersion).toBe("v2");
    expect(proxy.retryPolicy.maxAttempts).toBe(2);
  });

  it("enables simulator mode from the environment", () => {
    const simulator = GatewayProxy.builder()
      .fromEnv({ GATEWAY_URL: LOCAL_SIMULATOR_URL, GATEWAY_SIMULATOR: "true" })
      .buildSimulator();

    expect(simulator.proxy.url).toBe("http://localhost:8085");
  });

  it("keeps simulator mode set before reading an environment without it", () => {
    const simulator = GatewayProxy.builder().simulator().fromEnv({ GATEWAY_URL: LOCAL_SIMULATOR_URL }).buildSimulator();

    expect(simulator.proxy.url).toBe("http://localhost:8085");
  });
});
