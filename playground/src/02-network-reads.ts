/**
 * Test 02: Reads against a live gateway
 *
 * Needs GATEWAY_URL. Set PLAYGROUND_ADDRESS to also query an account.
 */
import { GatewayEvent, GatewayProxy } from "../../src/index.js";
import { c, pass, playgroundAddress, prettyLogger, runIfMain, runTest, step, timer } from "./utils.js";

async function test() {
  const proxy = GatewayProxy.builder().fromEnv().withLogger(prettyLogger).build();
  let responses = 0;
  proxy.events.on(GatewayEvent.RESPONSE, () => {
    responses++;
  });

  step(`Network config from ${c.info(proxy.url)} (API ${proxy.apiVersion})`);
  {
    const t = timer();
    const config = await proxy.getNetworkConfig();
    pass(`chain=${c.info(config.chainId)} shards=${config.numShards} minGasPrice=${config.minGasPrice} (${t()}ms)`);
  }

  step("Network status (metachain)");
  {
    const status = await proxy.getNetworkStatus();
    pass(`epoch=${c.info(String(status.epochNumber))} round=${status.currentRound} nonce=${status.nonce}`);
  }

  const address = playgroundAddress();
  if (address) {
    step(`Account ${c.dim(address)}`);
    const account = await proxy.getAccount(address);
    pass(`balance=${c.info(account.balance)} nonce=${account.nonce}`);
  }

  proxy.destroy();
  pass(`${responses} responses observed`);
}

export const run = () => runTest("02: Network reads", test);

runIfMain("02-network-reads", run);
