/**
 * Run every playground script in order and print a summary.
 *
 * Usage: npm run playground
 *
 * 01 runs offline. 02 needs GATEWAY_URL. 03 needs a chain simulator
 * (GATEWAY_SIMULATOR=true) and PLAYGROUND_ADDRESS. See .env.example.
 */
import { c, hasGateway, playgroundAddress, section, simulatorEnabled } from "./utils.js";

type Outcome = "pass" | "fail" | "skip";

interface Script {
  name: string;
  /** Reason to skip in the current environment, if any */
  skip: () => string | undefined;
  load: () => Promise<{ run: () => Promise<boolean> }>;
}

const scripts: Script[] = [
  {
    name: "01: RetryPolicy + Error Classifier",
    skip: () => undefined,
    load: () => import("./01-retry.js"),
  },
  {
    name: "02: Network reads",
    skip: () => (hasGateway() ? undefined : "no GATEWAY_URL"),
    load: () => import("./02-network-reads.js"),
  },
  {
    name: "03: Chain simulator",
    skip: () => {
      if (!simulatorEnabled()) return "simulator mode off";
      return playgroundAddress() ? undefined : "no PLAYGROUND_ADDRESS";
    },
    load: () => import("./03-simulator.js"),
  },
];

async function runScript(script: Script): Promise<Outcome> {
  const reason = script.skip();
  if (reason) {
    console.log(`\n  ${c.warn("SKIP")}  ${script.name} ${c.dim(`(${reason})`)}`);
    return "skip";
  }
  try {
    const { run } = await script.load();
    return (await run()) ? "pass" : "fail";
  } catch (err) {
    console.error(`\n  ${c.fail("CRASHED")} ${script.name}`, err);
    return "fail";
  }
}

async function main(): Promise<number> {
  console.log(`\n  ${c.bold("chain-gateway-kit playground")}\n`);

  const tally: Record<Outcome, number> = { pass: 0, fail: 0, skip: 0 };
  const lines: string[] = [];
  const label: Record<Outcome, string> = { pass: c.ok("PASS"), fail: c.fail("FAIL"), skip: c.warn("SKIP") };

  for (const script of scripts) {
    const start = performance.now();
    const outcome = await runScript(script);
    tally[outcome]++;
    lines.push(`  ${label[outcome]}  ${script.name}  ${c.dim(`${Math.round(performance.now() - start)}ms`)}`);
  }

  section("Summary");
  console.log(lines.join("\n"));
  console.log(`\n  ${tally.pass} passed, ${tally.fail} failed, ${tally.skip} skipped\n`);

  return tally.fail > 0 ? 1 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
