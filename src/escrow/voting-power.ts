import { ValidationError } from "./errors.js";
import { SCALE, type Participant, type PublicKeyLike } from "./types.js";

/**
 * Splits `total` across entries in proportion to their shares, rounding each
 * share down. The rounding remainder goes to the entry with the largest
 * share; ties resolve to the first such entry in iteration order. The parts
 * therefore always sum to `total` exactly.
 */
export function splitProRata(
  total: bigint,
  shares: Map<PublicKeyLike, bigint>
): Map<PublicKeyLike, bigint> {
  let sum = 0n;
  for (const [id, share] of shares) {
    if (share < 0n) {
      throw new ValidationError(`Share for ${id} must be >= 0`);
    }
    sum += share;
  }
  const largest = largestHolder(shares);
  if (sum === 0n || largest === undefined) {
    throw new ValidationError("Total contribution must be > 0");
  }

  const parts = new Map<PublicKeyLike, bigint>();
  let assigned = 0n;
  for (const [id, share] of shares) {
    const part = (share * total) / sum;
    parts.set(id, part);
    assigned += part;
  }
  parts.set(largest, (parts.get(largest) ?? 0n) + (total - assigned));
  return parts;
}

function largestHolder(shares: Map<PublicKeyLike, bigint>): PublicKeyLike | undefined {
  let largest: PublicKeyLike | undefined;
  let largestShare = -1n;
  for (const [id, share] of shares) {
    if (share > largestShare) {
      largest = id;
      largestShare = share;
    }
  }
  return largest;
}

/** Converts raw contributions into weights that sum to SCALE. */
export function normalize(contributions: Map<PublicKeyLike, bigint>): Map<PublicKeyLike, bigint> {
  return splitProRata(SCALE, contributions);
}

/**
 * Read-only voting power of every participant of one escrow.
 * Weights are fixed at construction.
 */
export class VotingPowerRegistry {
  private readonly weights: Map<PublicKeyLike, bigint>;
  readonly totalSupply: bigint;

  constructor(contributions: Map<PublicKeyLike, bigint>) {
    this.weights = normalize(contributions);
    let total = 0n;
    for (const weight of this.weights.values()) total += weight;
    this.totalSupply = total;
  }

  weightOf(id: PublicKeyLike): bigint {
    return this.weights.get(id) ?? 0n;
  }

  isParticipant(id: PublicKeyLike): boolean {
    return this.weights.has(id);
  }

  /** Receives the rounding remainder of every split */
  largestParticipant(): PublicKeyLike {
    const largest = largestHolder(this.weights);
    if (largest === undefined) {
      throw new ValidationError("Escrow has no participants");
    }
    return largest;
  }

  participants(): Participant[] {
    return Array.from(this.weights, ([id, weight]) => ({ id, weight }));
  }

  /** Pro-rata split of `amount` by voting weight, remainder to the largest holder */
  shareOut(amount: bigint): Map<PublicKeyLike, bigint> {
    return splitProRata(amount, this.weights);
  }
}
