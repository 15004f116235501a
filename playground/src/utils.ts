import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config } from "dotenv";
import type { Logger } from "../../src/index.js";

export const PLAYGROUND_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "..");

config({ path: resolve(PLAYGROUND_DIR, ".env") });

const paint =
  (code: number) =>
  (text: string): string =>
    `\x1b[${code}m${text}\x1b[0m`;

export const c = {
  ok: paint(32),
  fail: paint(31),
  warn: paint(33),
  info: paint(36),
  accent: paint(35),
  dim: paint(2),
  bold: paint(1),
  rule: paint(34),
};

export function section(title: string): void {
  const rule = c.rule("═".repeat(64));
  console.log(`\n${rule}\n  ${c.bold(title)}\n${rule}\n`);
}

export function step(label: string): void {
  console.log(`  ${c.accent("→")} ${label}`);
}

export function pass(label: string): void {
  console.log(`    ${c.ok("ok")} ${label}`);
}

export function hasGateway(): boolean {
  return Boolean(process.env.GATEWAY_URL);
}

export function simulatorEnabled(): boolean {
  return hasGateway() && ["true", "1", "yes"].includes(process.env.GATEWAY_SIMULATOR ?? "");
}

/** Address the read and faucet scripts use */
export function playgroundAddress(): string | undefined {
  return process.env.PLAYGROUND_ADDRESS || undefined;
}

function logLine(tag: string, msg: string, data?: Record<string, unknown>): void {
  const extra = data && Object.keys(data).length > 0 ? ` ${c.dim(JSON.stringify(data))}` : "";
  console.log(`      ${tag} ${msg}${extra}`);
}

/** Indented, colored Logger for playground output */
export const prettyLogger: Logger = {
  debug: (msg, data) => logLine(c.dim("debug"), msg, data),
  info: (msg, data) => logLine(c.info("info "), msg, data),
  warn: (msg, data) => logLine(c.warn("warn "), msg, data),
  error: (msg, data) => logLine(c.fail("error"), msg, data),
};

/** Milliseconds since the call, rounded */
export function timer(): () => number {
  const start = performance.now();
  return () => Math.round(performance.now() - start);
}

export async function runTest(name: string, body: () => Promise<void>): Promise<boolean> {
  section(name);
  try {
    await body();
    console.log(`\n  ${c.ok("PASSED")}\n`);
    return true;
  } catch (err) {
    console.log(`    ${c.fail("failed")} ${err instanceof Error ? err.message : String(err)}`);
    const frames = err instanceof Error ? err.stack?.split("\n").slice(1, 4) : undefined;
    if (frames) console.log(c.dim(frames.map((frame) => `      ${frame.trim()}`).join("\n")));
    console.log(`\n  ${c.fail("FAILED")}\n`);
    return false;
  }
}

/** Run a single playground script when it is the process entry point */
export function runIfMain(scriptName: string, run: () => Promise<boolean>): void {
  if (!process.argv[1]?.includes(scriptName)) return;
  run().then(
    (ok) => {
      if (!ok) process.exitCode = 1;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
