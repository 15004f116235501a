/**
 * Test 03: Chain simulator faucet, block generation, completion
 *
 * Needs GATEWAY_URL pointing at a chain simulator, GATEWAY_SIMULATOR=true and PLAYGROUND_ADDRESS.
 */
import { GatewayEvent, GatewayProxy } from "../../src/index.js";
import { c, pass, playgroundAddress, prettyLogger, runIfMain, runTest, step, timer } from "./utils.js";

async function test() {
  const address = playgroundAddress();
  if (!address) throw new Error("PLAYGROUND_ADDRESS not set in .env, see .env.example");

  const simulator = GatewayProxy.builder().fromEnv().withLogger(prettyLogger).buildSimulator();
  simulator.events.on(GatewayEvent.BLOCKS_GENERATED, ({ count }) => {
    console.log(`    ${c.dim(`generated ${count} block(s)`)}`);
  });

  step("Generate a block");
  await simulator.generateBlocks(1);
  pass("Block produced on demand");

  step(`Fund ${c.dim(address)} from the faucet`);
  const before = await simulator.getAccount(address);
  const hash = await simulator.sendUserFunds(address);
  pass(`Funding transaction ${c.info(hash)}`);

  step("Wait for completion by generating blocks");
  {
    const t = timer();
    const result = await simulator.awaitCompletion(hash);
    if (result.state !== "succeeded") throw new Error(`Funding ended as ${result.state}`);
    pass(`Succeeded in ${c.info(`${t()}ms`)} without wall-clock polling`);
  }

  const after = await simulator.getAccount(address);
  if (BigInt(after.balance) <= BigInt(before.balance)) {
    throw new Error(`Balance did not grow: ${before.balance} -> ${after.balance}`);
  }
  pass(`Balance ${before.balance} -> ${c.info(after.balance)}`);

  simulator.proxy.destroy();
}

export const run = () => runTest("03: Chain simulator", test);

runIfMain("03-simulator", run);
