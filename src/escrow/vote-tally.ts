import { DuplicateVoteError } from "./errors.js";
import type { PublicKeyLike, VoteCounts, VoteStatus } from "./types.js";

/**
 * One weighted threshold vote. Each voter entry stores the round it was cast
 * in, so starting a new round only bumps `round` and never touches the
 * individual entries.
 *
 * Kept as plain data so a whole escrow state can be snapshotted with
 * structuredClone.
 */
export interface VoteTally {
  round: number;
  votesFor: bigint;
  votesAgainst: bigint;
  votedRound: Map<PublicKeyLike, number>;
}

export function createTally(): VoteTally {
  return { round: 1, votesFor: 0n, votesAgainst: 0n, votedRound: new Map() };
}

export function hasVoted(tally: VoteTally, voter: PublicKeyLike): boolean {
  return tally.votedRound.get(voter) === tally.round;
}

export function castVote(tally: VoteTally, voter: PublicKeyLike, support: boolean, weight: bigint): void {
  if (hasVoted(tally, voter)) {
    throw new DuplicateVoteError(`${voter} has already voted in round ${tally.round}`);
  }
  if (support) {
    tally.votesFor += weight;
  } else {
    tally.votesAgainst += weight;
  }
  tally.votedRound.set(voter, tally.round);
}

/** Crossing is strict: a side must exceed the threshold, reaching it is not enough. */
export function tallyOutcome(tally: VoteTally, threshold: bigint): VoteStatus | undefined {
  if (tally.votesFor > threshold) return "accepted";
  if (tally.votesAgainst > threshold) return "rejected";
  return undefined;
}

export function resetTally(tally: VoteTally): void {
  tally.round += 1;
  tally.votesFor = 0n;
  tally.votesAgainst = 0n;
}

export function thresholdOf(totalSupply: bigint, percentage: number): bigint {
  return (totalSupply * BigInt(percentage)) / 100n;
}

export function voteCounts(tally: VoteTally): VoteCounts {
  return { round: tally.round, votesFor: tally.votesFor, votesAgainst: tally.votesAgainst };
}
