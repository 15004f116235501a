/**
 * Test 01: RetryPolicy, withRetry and the error classifier
 *
 * No gateway needed: pure logic with real timings.
 */
import { GatewayError, GatewayErrorKind, RetryPolicy, classify, isNotFound, withRetry } from "../../src/index.js";
import { c, pass, runIfMain, runTest, step, timer } from "./utils.js";

async function test() {
  // ── 1. Backoff schedule ───────────────────────────────────────
  step("Deterministic backoff schedule");
  {
    const policy = new RetryPolicy({ maxAttempts: 4, baseDelayMs: 100, backoffMultiplier: 2 });
    const delays = [0, 1, 2, 3].map((i) => policy.nextDelay(i));
    if (delays.join(",") !== "100,200,400,") throw new Error(`Unexpected schedule: ${delays.join(",")}`);
    pass(`Delays: [${delays.map((d) => (d === undefined ? "stop" : `${d}ms`)).join(", ")}]`);
  }

  // ── 2. Recover from transient failures ────────────────────────
  step("Retry on TRANSIENT until success");
  {
    let attempt = 0;
    const t = timer();
    const result = await withRetry(
      async () => {
        attempt++;
        if (attempt < 3) throw new GatewayError(GatewayErrorKind.TRANSIENT, "HTTP 503: overloaded");
        return "ok";
      },
      new RetryPolicy({ maxAttempts: 5, baseDelayMs: 50 }),
    );

    if (result !== "ok") throw new Error(`Expected "ok", got ${result}`);
    if (attempt !== 3) throw new Error(`Expected 3 attempts, got ${attempt}`);
    pass(`Recovered after 2 retries in ${c.info(`${t()}ms`)}`);
  }

  // ── 3. Exhaustion ─────────────────────────────────────────────
  step("TIMED_OUT after maxAttempts");
  {
    let attempt = 0;
    const t = timer();
    try {
      await withRetry(
        async () => {
          attempt++;
          throw new GatewayError(GatewayErrorKind.TRANSIENT, "HTTP 502: bad gateway");
        },
        new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, backoffMultiplier: 2 }),
      );
      throw new Error("Should have thrown");
    } catch (err) {
      if (!(err instanceof GatewayError) || err.kind !== GatewayErrorKind.TIMED_OUT) throw err;
      if (attempt !== 3) throw new Error(`Expected 3 attempts, got ${attempt}`);
      pass(`${err.message} after ${c.info(`${t()}ms`)} (>= 300ms)`);
    }
  }

  // ── 4. Classification ─────────────────────────────────────────
  step("Classifier: HTTP outcomes");
  {
    const url = "http://gateway.local/transaction/abc";
    const cases: Array<{ status: number; body: string; kind: GatewayErrorKind }> = [
      { status: 429, body: "", kind: GatewayErrorKind.RATE_LIMITED },
      { status: 503, body: "Service Unavailable", kind: GatewayErrorKind.TRANSIENT },
      { status: 404, body: '{"error":"transaction not found"}', kind: GatewayErrorKind.FATAL },
      { status: 400, body: '{"error":"insufficient funds","code":"invalid_transaction"}', kind: GatewayErrorKind.FATAL },
      { status: 200, body: "<html></html>", kind: GatewayErrorKind.DECODE },
    ];

    for (const { status, body, kind } of cases) {
      const error = classify({ url, status, body });
      if (error.kind !== kind) throw new Error(`HTTP ${status}: expected ${kind}, got ${error.kind}`);
    }
    const notFound = classify({ url, status: 404, body: '{"error":"transaction not found"}' });
    if (!isNotFound(notFound)) throw new Error("Expected 404 to count as not found");
    pass(`All ${cases.length} classifications correct`);
  }
}

export const run = () => runTest("01: RetryPolicy + Error Classifier", test);

runIfMain("01-retry", run);
