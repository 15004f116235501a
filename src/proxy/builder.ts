import type { PollConfig } from "../confirmation/types.js";
import { loadConfigFromEnv } from "../config.js";
import type { ApiVersion } from "../endpoints/types.js";
import { SimulatorProxy } from "../simulator/simulator-proxy.js";
import type { RetryPolicy } from "../retry/policy.js";
import type { RetryPolicyConfig } from "../retry/types.js";
import type { TransportExecutor } from "../transport/executor.js";
import type { FetchLike } from "../transport/types.js";
import type { Logger } from "../types.js";
import { GatewayProxy, type GatewayProxyConfig } from "./gateway-proxy.js";
import type { StatusRules } from "./transaction-status.js";

/**
 * Fluent builder for constructing a GatewayProxy or, with `.simulator()`, a SimulatorProxy.
 *
 * Usage:
 *   const proxy = GatewayProxy.builder()
 *     .url("https://gateway.example.org")
 *     .apiVersion("v2")
 *     .timeout(10_000)
 *     .withRetry({ maxAttempts: 5, baseDelayMs: 250 })
 *     .build();
 *
 *   const sim = GatewayProxy.builder().url(LOCAL_SIMULATOR_URL).simulator().buildSimulator();
 */
export class GatewayProxyBuilder {
  private config: Partial<GatewayProxyConfig> = {};
  private simulatorEnabled = false;
  private blocksPerSend: number | undefined;

  /** Set the gateway base URL */
  url(url: string): this {
    this.config.url = url;
    return this;
  }

  /** Select the route table for the node's API revision */
  apiVersion(version: ApiVersion): this {
    this.config.apiVersion = version;
    return this;
  }

  /** Set the per-request timeout in ms */
  timeout(timeoutMs: number): this {
    this.config.timeoutMs = timeoutMs;
    return this;
  }

  /** Configure the retry policy for idempotent reads */
  withRetry(policy: RetryPolicy | Partial<RetryPolicyConfig>): this {
    this.config.retry = policy;
    return this;
  }

  /** Configure defaults for transaction pollers */
  withPolling(config: Partial<PollConfig>): this {
    this.config.polling = config;
    return this;
  }

  /** Recognise additional node status strings */
  withStatusRules(rules: Partial<StatusRules>): this {
    this.config.statusRules = rules;
    return this;
  }

  /** Share an existing transport executor (and its connection pool) */
  withTransport(transport: TransportExecutor): this {
    this.config.transport = transport;
    return this;
  }

  /** Replace the fetch implementation */
  withFetch(fetchImpl: FetchLike): this {
    this.config.fetch = fetchImpl;
    return this;
  }

  /** Set the logger */
  withLogger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  /** Opt in to chain simulator control calls */
  simulator(options?: { blocksPerSend?: number }): this {
    this.simulatorEnabled = true;
    this.blocksPerSend = options?.blocksPerSend;
    return this;
  }

  /** Apply settings read from environment variables */
  fromEnv(env: Record<string, string | undefined> = process.env): this {
    const loaded = loadConfigFromEnv(env);
    this.config.url = loaded.url;
    this.config.apiVersion = loaded.apiVersion;
    this.config.timeoutMs = loaded.timeoutMs;
    this.config.retry = loaded.retry;
    this.simulatorEnabled = this.simulatorEnabled || loaded.simulator;
    return this;
  }

  /** Build and return the GatewayProxy */
  build(): GatewayProxy {
    if (!this.config.url) {
      throw new Error("GatewayProxyBuilder: a gateway URL is required. Call .url() or .fromEnv()");
    }
    return new GatewayProxy({ ...this.config, url: this.config.url });
  }

  /** Build a SimulatorProxy; requires `.simulator()` (or GATEWAY_SIMULATOR=true with `.fromEnv()`) */
  buildSimulator(): SimulatorProxy {
    if (!this.simulatorEnabled) {
      throw new Error("GatewayProxyBuilder: simulator mode is off. Call .simulator() before .buildSimulator()");
    }
    return new SimulatorProxy(
      this.build(),
      { enabled: this.simulatorEnabled, blocksPerSend: this.blocksPerSend },
      this.config.logger,
    );
  }
}
