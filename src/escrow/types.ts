export type PublicKeyLike = string;

/** One whole unit in fixed-point arithmetic (weights, percentages). */
export const SCALE = 10n ** 18n;

/**
 * Status shared by recipients, milestone plans and milestones.
 * Which transitions are legal depends on the entity, see MilestoneEscrow.
 */
export type Status =
  | "none"
  | "pending"
  | "accepted"
  | "rejected"
  | "appealed"
  | "inReview"
  | "canceled";

/** The two sides a vote can take */
export type VoteStatus = Extract<Status, "accepted" | "rejected">;

export type StrategyState = "none" | "active" | "executed" | "rejected";

export type ThresholdKind = "recipient" | "offer" | "submission" | "abort";

export type Thresholds = Record<ThresholdKind, number>;

export interface Participant {
  id: PublicKeyLike;
  /** Scaled fraction of the total voting power */
  weight: bigint;
}

export interface Recipient {
  /** Recipient id: the profile anchor, or the recipient address when no profile is used */
  recipientId: PublicKeyLike;
  /** Wallet address receiving payouts */
  recipientAddress: PublicKeyLike;
  status: Status;
  milestonesReviewStatus: Status;
  /** Pool amount at the time the recipient was accepted */
  grantAmount: bigint;
  metadata: string;
  profileId?: string;
}

export interface Milestone {
  /** Scaled share of the grant; a full plan sums to SCALE */
  amountPercentage: bigint;
  metadata: string;
  status: Status;
}

export interface MilestoneInput {
  amountPercentage: bigint;
  metadata: string;
}

export interface RecipientPayload {
  recipientAddress: PublicKeyLike;
  metadata?: string;
  /** Profile anchor to register on behalf of */
  anchor?: PublicKeyLike;
}

export interface VoteCounts {
  round: number;
  votesFor: bigint;
  votesAgainst: bigint;
}

export interface Payout {
  to: PublicKeyLike;
  amount: bigint;
  reason: "milestone" | "refund";
  recipientId?: PublicKeyLike;
  milestoneIndex?: number;
}

export interface PoolInfo {
  assetHandle: string;
  balance: bigint;
}

export interface Profile {
  id: string;
  owner: PublicKeyLike;
}

/** External role oracle ("does address X hold capability Y") */
export interface AuthorizationOracle {
  hasCapability(identity: PublicKeyLike, capabilityId: string): boolean;
  grantCapability(capabilityId: string, identity: PublicKeyLike): void;
  setCapabilityStatus(capabilityId: string, identity: PublicKeyLike, active: boolean): void;
}

/** External value-transfer capability */
export interface PoolLedger {
  getPoolInfo(poolId: string): PoolInfo;
  /** Must throw when the pool cannot cover the amount */
  transfer(assetHandle: string, to: PublicKeyLike, amount: bigint): void;
}

export interface ProfileDirectory {
  getProfileByAnchor(anchor: PublicKeyLike): Profile | undefined;
  isOwnerOrMember(profileId: string, identity: PublicKeyLike): boolean;
}

export interface EscrowConfig {
  id: string;
  poolId: string;
  /** Contributed amounts per participant, normalized into voting power */
  contributions: Map<PublicKeyLike, bigint>;
  /** Threshold percentages (1..99) per workflow */
  thresholds: Thresholds;
  maxRecipients: number;
  participantCapability: string;
  executorCapability: string;
}

export interface EscrowDependencies {
  oracle: AuthorizationOracle;
  ledger: PoolLedger;
  profiles?: ProfileDirectory;
}
