import { Connection } from "@solana/web3.js";
import { readFile } from "node:fs/promises";
import { RPC_URL } from "./env.js";
import { parseScenario, runScenario } from "./escrow/scenario.js";
import { SolanaPayoutLedger } from "./escrow/solana-ledger.js";

type Mode = "print" | "simulate";

function getMode(): Mode {
  const arg = process.argv.find((a) => a.startsWith("--mode="));
  const mode = arg?.split("=")[1] ?? "print";
  if (mode !== "print" && mode !== "simulate") {
    throw new Error("Invalid --mode. Use --mode=print or --mode=simulate");
  }
  return mode;
}

function getScenarioPath(): string {
  const arg = process.argv.slice(2).find((a) => !a.startsWith("--"));
  return arg ?? "scenarios/milestone-payout.json";
}

async function main() {
  const mode = getMode();
  const path = getScenarioPath();
  const scenario = parseScenario(JSON.parse(await readFile(path, "utf8")));

  const ledger = new SolanaPayoutLedger();
  const vault = process.env.ESCROW_VAULT?.trim() || "11111111111111111111111111111112";
  ledger.addVault("pool", vault, BigInt(scenario.poolLamports));

  const { escrow, results } = runScenario(scenario, ledger, "pool");

  console.log("Scenario:", scenario.name);
  for (const { step, error } of results) {
    console.log(`  ${step.action} by ${step.by}${error ? ` -> ${error}` : ""}`);
  }
  console.log("Events:");
  for (const event of escrow.getEventHistory()) {
    console.log("  ", event.type, JSON.stringify(event, (_k, v) => (typeof v === "bigint" ? v.toString() : v)));
  }
  console.log("Strategy state:", escrow.getStrategyState());
  console.log("Pool amount (lamports):", escrow.getPoolAmount().toString());

  const connection = new Connection(RPC_URL, "confirmed");
  const recentBlockhash = mode === "simulate" ? (await connection.getLatestBlockhash("confirmed")).blockhash : undefined;
  const tx = ledger.buildTransaction("pool", recentBlockhash);
  console.log("Payout instructions:", tx.instructions.length);
  for (const payout of escrow.getPayouts()) {
    console.log(`  ${payout.reason} ${payout.amount} -> ${payout.to}`);
  }

  if (mode === "simulate" && tx.instructions.length > 0) {
    console.log("RPC URL:", RPC_URL);
    const sim = await connection.simulateTransaction(tx);
    console.log("Simulate err:", sim.value.err);
    for (const line of sim.value.logs ?? []) console.log(line);
  }
}

main().catch((err) => {
  console.error("Escrow simulation failed:", err);
  process.exit(1);
});
