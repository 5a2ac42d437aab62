import { readFile } from "fs/promises";
import { privateKeyToAccount } from "viem/accounts";
import { loadConfig } from "./config";
import { ExecutorClient } from "./client/executorClient";
import { chainById } from "./client/chains";
import { formatPayloadHex, encodePayload } from "./executor/payload";
import { parseArbitrageRequest } from "./strategy/request";

async function main() {
  const config = loadConfig();
  const args = process.argv.slice(2);
  const send = args.includes("--send");
  const file = args.find((arg) => !arg.startsWith("--"));

  if (!file) {
    throw new Error("Usage: main <request.json> [--send]");
  }
  if (!config.RPC_URL || !config.EXECUTOR_PRIVATE_KEY || !config.ARB_CONTRACT_ADDRESS) {
    throw new Error(
      "RPC_URL, EXECUTOR_PRIVATE_KEY and ARB_CONTRACT_ADDRESS must be set",
    );
  }

  console.log("🤖 Arbitrage executor client started");

  const client = new ExecutorClient({
    contract: config.ARB_CONTRACT_ADDRESS,
    account: privateKeyToAccount(config.EXECUTOR_PRIVATE_KEY),
    chain: chainById(config.CHAIN_ID),
    rpcUrl: config.RPC_URL,
    layout: config.PAYLOAD_LAYOUT,
  });

  const currentBlock = await client.currentBlock();
  const raw: unknown = JSON.parse(await readFile(file, "utf8"));
  const request = parseArbitrageRequest(raw, currentBlock, config.DEADLINE_BLOCKS);

  const payload = encodePayload(request, config.PAYLOAD_LAYOUT);
  console.log("🧠 Arbitrage request", {
    block: currentBlock,
    deadline: request.deadline,
    payload: formatPayloadHex(payload),
  });

  const simulation = await client.simulate(request);
  if (!simulation.ok) {
    console.log(`📊 Simulation reverted: ${simulation.reason}`);
    return;
  }
  console.log("✅ Simulation succeeded");

  if (!send) {
    console.log("Dry run only, pass --send to submit");
    return;
  }

  const txHash = await client.submit(request);
  console.log("🚀 Arbitrage submitted", { txHash });
}

main().catch((error) => {
  console.error("❌ Error:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
