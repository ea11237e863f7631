import { Keypair } from "@solana/web3.js";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import { AllowListOracle } from "./in-memory.js";
import { MilestoneEscrow, defaultEscrowSettings } from "./milestone-escrow.js";
import { parseOrThrow, thresholdsSchema } from "./schemas.js";
import { SCALE, type PoolLedger, type PublicKeyLike } from "./types.js";

export const PARTICIPANT_CAPABILITY = "participant";
export const EXECUTOR_CAPABILITY = "executor";

const actor = z.string().min(1);
const voteStatus = z.enum(["accepted", "rejected"]);

const stepSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("registerRecipient"), by: actor, recipient: actor, metadata: z.string().optional() }),
  z.object({ action: z.literal("reviewRecipient"), by: actor, recipient: actor, status: voteStatus }),
  z.object({
    action: z.literal("offerMilestones"),
    by: actor,
    recipient: actor,
    milestones: z.array(z.object({ percent: z.number().int().positive().max(100), metadata: z.string() }))
  }),
  z.object({ action: z.literal("reviewOfferedMilestones"), by: actor, recipient: actor, status: voteStatus }),
  z.object({
    action: z.literal("submitMilestone"),
    by: actor,
    recipient: actor,
    index: z.number().int().nonnegative(),
    evidence: z.string()
  }),
  z.object({
    action: z.literal("reviewSubmittedMilestone"),
    by: actor,
    recipient: actor,
    index: z.number().int().nonnegative(),
    status: voteStatus
  }),
  z.object({ action: z.literal("rejectProject"), by: actor, status: voteStatus })
]);

const scenarioSchema = z.object({
  name: z.string(),
  description: z.string().default(""),
  poolLamports: z.number().int().nonnegative(),
  thresholds: thresholdsSchema.optional(),
  maxRecipients: z.number().int().positive().optional(),
  participants: z.record(z.object({ seed: z.number().int().min(0).max(255), contribution: z.number().int().nonnegative() })),
  recipients: z.record(z.object({ seed: z.number().int().min(0).max(255) })),
  steps: z.array(stepSchema.and(z.object({ expectError: z.string().optional() })))
});

export type Scenario = z.output<typeof scenarioSchema>;
export type ScenarioStep = Scenario["steps"][number];

export interface StepResult {
  step: ScenarioStep;
  error?: string;
}

export interface ScenarioRun {
  escrow: MilestoneEscrow;
  identities: Map<string, PublicKeyLike>;
  results: StepResult[];
}

/** Deterministic identity for scenario actors and tests */
export function identityFromSeed(seedOffset: number): PublicKeyLike {
  const seed = new Uint8Array(32);
  seed[0] = seedOffset;
  return Keypair.fromSeed(seed).publicKey.toBase58();
}

export function parseScenario(input: unknown): Scenario {
  return parseOrThrow(scenarioSchema, input, "scenario");
}

function applyStep(escrow: MilestoneEscrow, step: ScenarioStep, who: (name: string) => PublicKeyLike): void {
  switch (step.action) {
    case "registerRecipient":
      escrow.registerRecipient(who(step.by), { recipientAddress: who(step.recipient), metadata: step.metadata });
      return;
    case "reviewRecipient":
      escrow.reviewRecipient(who(step.by), who(step.recipient), step.status);
      return;
    case "offerMilestones":
      escrow.offerMilestones(
        who(step.by),
        who(step.recipient),
        step.milestones.map(m => ({ amountPercentage: (BigInt(m.percent) * SCALE) / 100n, metadata: m.metadata }))
      );
      return;
    case "reviewOfferedMilestones":
      escrow.reviewOfferedMilestones(who(step.by), who(step.recipient), step.status);
      return;
    case "submitMilestone":
      escrow.submitMilestone(who(step.by), who(step.recipient), step.index, step.evidence);
      return;
    case "reviewSubmittedMilestone":
      escrow.reviewSubmittedMilestone(who(step.by), who(step.recipient), step.index, step.status);
      return;
    case "rejectProject":
      escrow.rejectProject(who(step.by), step.status);
      return;
  }
}

/**
 * Builds an escrow for the scenario on `ledger` (which must already hold
 * pool `poolId`) and replays its steps. A step may name the error it is
 * expected to fail with; any other failure stops the run.
 */
export function runScenario(scenario: Scenario, ledger: PoolLedger, poolId: string): ScenarioRun {
  const identities = new Map<string, PublicKeyLike>();
  const contributions = new Map<PublicKeyLike, bigint>();
  for (const [name, p] of Object.entries(scenario.participants)) {
    const id = identityFromSeed(p.seed);
    identities.set(name, id);
    contributions.set(id, BigInt(p.contribution));
  }
  for (const [name, r] of Object.entries(scenario.recipients)) {
    identities.set(name, identityFromSeed(r.seed));
  }
  const who = (name: string): PublicKeyLike => {
    const id = identities.get(name);
    if (!id) {
      throw new ValidationError(`Unknown actor "${name}" in scenario ${scenario.name}`);
    }
    return id;
  };

  const defaults = defaultEscrowSettings();
  const escrow = new MilestoneEscrow(
    {
      id: scenario.name,
      poolId,
      contributions,
      thresholds: scenario.thresholds ?? defaults.thresholds,
      maxRecipients: scenario.maxRecipients ?? defaults.maxRecipients,
      participantCapability: PARTICIPANT_CAPABILITY,
      executorCapability: EXECUTOR_CAPABILITY
    },
    {
      oracle: new AllowListOracle({ [PARTICIPANT_CAPABILITY]: Array.from(contributions.keys()) }),
      ledger
    }
  );

  const results: StepResult[] = [];
  for (const step of scenario.steps) {
    try {
      applyStep(escrow, step, who);
    } catch (err) {
      const name = err instanceof Error ? err.name : "Error";
      if (step.expectError !== name) {
        throw err;
      }
      results.push({ step, error: name });
      continue;
    }
    if (step.expectError !== undefined) {
      throw new ValidationError(`Step ${step.action} by ${step.by} was expected to fail with ${step.expectError}`);
    }
    results.push({ step });
  }
  return { escrow, identities, results };
}
