import { describe, expect, it } from "vitest";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { InMemoryPoolLedger } from "../../src/escrow/in-memory.js";
import { identityFromSeed, parseScenario, runScenario, type Scenario } from "../../src/escrow/scenario.js";
import { SolanaPayoutLedger } from "../../src/escrow/solana-ledger.js";
import { makeKeypair, pubkey } from "../helpers/participants.js";

async function loadScenario(relativePath: string): Promise<Scenario> {
  const path = fileURLToPath(new URL(relativePath, import.meta.url));
  return parseScenario(JSON.parse(await readFile(path, "utf-8")));
}

describe("scenario runner", () => {
  it("derives the same identities as the test keypairs", () => {
    expect(identityFromSeed(10)).toBe(pubkey(makeKeypair(10)));
  });

  it("runs the bundled milestone payout scenario against the Solana ledger", async () => {
    const scenario = await loadScenario("../../scenarios/milestone-payout.json");
    const ledger = new SolanaPayoutLedger();
    const vault = pubkey(makeKeypair(50));
    ledger.addVault("pool", vault, BigInt(scenario.poolLamports));

    const { escrow, identities, results } = runScenario(scenario, ledger, "pool");

    expect(results.every(r => r.error === undefined)).toBe(true);
    expect(escrow.getStrategyState()).toBe("executed");
    expect(escrow.getPayouts().map(p => p.amount)).toEqual([500_000_000n, 500_000_000n]);
    const tx = ledger.buildTransaction("pool");
    expect(tx.instructions).toHaveLength(2);
    expect(tx.instructions[0]?.keys[1]?.pubkey.toBase58()).toBe(identities.get("builder"));
  });

  it("replays expected failures and an abort midway", async () => {
    const scenario = await loadScenario("../scenarios/abort-midway.json");
    const ledger = new InMemoryPoolLedger();
    ledger.createPool("pool", "SOL", BigInt(scenario.poolLamports));

    const { escrow, identities, results } = runScenario(scenario, ledger, "pool");
    const who = (name: string) => identities.get(name) ?? "";

    expect(results.filter(r => r.error !== undefined).map(r => r.error)).toEqual([
      "DuplicateVoteError",
      "ValidationError",
      "StateError"
    ]);
    expect(escrow.getStrategyState()).toBe("rejected");
    expect(ledger.balanceOf("SOL", who("builder"))).toBe(450n);
    expect(ledger.balanceOf("SOL", who("alice"))).toBe(180n);
    expect(ledger.balanceOf("SOL", who("bob"))).toBe(135n);
    expect(ledger.balanceOf("SOL", who("carol"))).toBe(135n);
  });

  it("rejects a malformed scenario", () => {
    expect(() => parseScenario({ name: "broken", steps: [] })).toThrow(/Invalid scenario/);
  });

  it("stops when a step fails unexpectedly", async () => {
    const scenario = await loadScenario("../scenarios/abort-midway.json");
    const ledger = new InMemoryPoolLedger();
    ledger.createPool("pool", "SOL", 900n);
    const [first, ...rest] = scenario.steps;
    if (!first) throw new Error("scenario has no steps");

    expect(() => runScenario({ ...scenario, steps: [first, first, ...rest] }, ledger, "pool")).toThrow(
      /already voted/
    );
  });
});
