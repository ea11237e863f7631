import { ESCROW_ABORT_THRESHOLD_PERCENT, ESCROW_MAX_RECIPIENTS, ESCROW_THRESHOLD_PERCENT } from "../env.js";
import { createLogger, type Logger } from "../logger.js";
import { AuthorizationError, CapacityError, StateError, ValidationError } from "./errors.js";
import { EscrowEventBus, type EscrowEvent, type EscrowEventCallback, type EscrowEventType } from "./events.js";
import {
  addressSchema,
  milestoneIndexSchema,
  milestonePlanSchema,
  parseOrThrow,
  recipientPayloadSchema,
  thresholdsSchema,
  voteStatusSchema
} from "./schemas.js";
import {
  SCALE,
  type EscrowConfig,
  type EscrowDependencies,
  type Milestone,
  type MilestoneInput,
  type Payout,
  type PublicKeyLike,
  type Recipient,
  type RecipientPayload,
  type Status,
  type StrategyState,
  type ThresholdKind,
  type Thresholds,
  type VoteCounts,
  type VoteStatus
} from "./types.js";
import {
  castVote,
  createTally,
  resetTally,
  tallyOutcome,
  thresholdOf,
  voteCounts,
  type VoteTally
} from "./vote-tally.js";
import { VotingPowerRegistry } from "./voting-power.js";

interface MilestoneOffer {
  offeredBy: PublicKeyLike;
  milestones: Milestone[];
}

/** A voter entry as it was before an operation touched it */
interface VoteJournalEntry {
  tally: VoteTally;
  voter: PublicKeyLike;
  previous: number | undefined;
}

/**
 * Everything that an operation may mutate. Restored when it throws; the
 * per-voter maps of the tallies are restored from the vote journal instead
 * of being copied.
 */
interface EscrowState {
  strategyState: StrategyState;
  poolActive: boolean;
  poolAmount: bigint;
  allocatedAmount: bigint;
  acceptedRecipients: number;
  recipients: Map<PublicKeyLike, Recipient>;
  milestones: Map<PublicKeyLike, Milestone[]>;
  offers: Map<PublicKeyLike, MilestoneOffer>;
  nextMilestone: Map<PublicKeyLike, number>;
  recipientTallies: Map<PublicKeyLike, VoteTally>;
  offerTallies: Map<PublicKeyLike, VoteTally>;
  submissionTallies: Map<string, VoteTally>;
  abortTally: VoteTally;
  payouts: Payout[];
  undelivered: Payout[];
}

export function defaultEscrowSettings(): { thresholds: Thresholds; maxRecipients: number } {
  return {
    thresholds: {
      recipient: ESCROW_THRESHOLD_PERCENT,
      offer: ESCROW_THRESHOLD_PERCENT,
      submission: ESCROW_THRESHOLD_PERCENT,
      abort: ESCROW_ABORT_THRESHOLD_PERCENT
    },
    maxRecipients: ESCROW_MAX_RECIPIENTS
  };
}

function emptyRecipient(recipientId: PublicKeyLike): Recipient {
  return {
    recipientId,
    recipientAddress: recipientId,
    status: "none",
    milestonesReviewStatus: "none",
    grantAmount: 0n,
    metadata: ""
  };
}

function copyTallies<K>(tallies: Map<K, VoteTally>): Map<K, VoteTally> {
  return new Map(Array.from(tallies, ([key, tally]): [K, VoteTally] => [key, { ...tally }]));
}

function sumAmounts(payouts: Payout[]): bigint {
  return payouts.reduce((sum, p) => sum + p.amount, 0n);
}

function tallyFor<K>(tallies: Map<K, VoteTally>, key: K): VoteTally {
  let tally = tallies.get(key);
  if (!tally) {
    tally = createTally();
    tallies.set(key, tally);
  }
  return tally;
}

/**
 * Milestone escrow for one project. Participants spend their voting power to
 * accept recipients, lock in a milestone plan, release each milestone and,
 * if needed, abort the project for a pro-rata refund.
 *
 * Every accept path commits its state transition and tally reset before any
 * value leaves the pool, so a transfer that calls back into the escrow sees
 * the post-transition state.
 */
export class MilestoneEscrow {
  readonly id: string;
  private readonly config: EscrowConfig;
  private readonly deps: EscrowDependencies;
  private readonly registry: VotingPowerRegistry;
  private readonly assetHandle: string;
  private readonly log: Logger;
  private readonly events: EscrowEventBus;
  private state: EscrowState;
  private depth = 0;
  private voteJournal: VoteJournalEntry[] = [];

  constructor(config: EscrowConfig, deps: EscrowDependencies) {
    parseOrThrow(thresholdsSchema, config.thresholds, "thresholds");
    if (!Number.isInteger(config.maxRecipients) || config.maxRecipients < 1) {
      throw new ValidationError("maxRecipients must be a positive integer");
    }
    for (const participant of config.contributions.keys()) {
      parseOrThrow(addressSchema, participant, "contributions");
    }
    this.id = config.id;
    this.config = config;
    this.deps = deps;
    this.registry = new VotingPowerRegistry(config.contributions);
    this.log = createLogger(`escrow:${config.id}`);
    this.events = new EscrowEventBus(this.log);

    const pool = deps.ledger.getPoolInfo(config.poolId);
    this.assetHandle = pool.assetHandle;
    this.state = {
      strategyState: "active",
      poolActive: true,
      poolAmount: pool.balance,
      allocatedAmount: 0n,
      acceptedRecipients: 0,
      recipients: new Map(),
      milestones: new Map(),
      offers: new Map(),
      nextMilestone: new Map(),
      recipientTallies: new Map(),
      offerTallies: new Map(),
      submissionTallies: new Map(),
      abortTally: createTally(),
      payouts: [],
      undelivered: []
    };
  }

  on(event: EscrowEventType | "*", callback: EscrowEventCallback): () => void {
    return this.events.on(event, callback);
  }

  getEventHistory(): EscrowEvent[] {
    return this.events.getHistory();
  }

  getStrategyState(): StrategyState {
    return this.state.strategyState;
  }

  isPoolActive(): boolean {
    return this.state.poolActive;
  }

  getPoolAmount(): bigint {
    return this.state.poolAmount;
  }

  getAllocatedAmount(): bigint {
    return this.state.allocatedAmount;
  }

  getTotalSupply(): bigint {
    return this.registry.totalSupply;
  }

  getVotingPower(participant: PublicKeyLike): bigint {
    return this.registry.weightOf(participant);
  }

  getThreshold(kind: ThresholdKind): bigint {
    return thresholdOf(this.registry.totalSupply, this.config.thresholds[kind]);
  }

  getRecipient(recipientId: PublicKeyLike): Recipient {
    const recipient = this.state.recipients.get(recipientId);
    return recipient ? { ...recipient } : emptyRecipient(recipientId);
  }

  getRecipientStatus(recipientId: PublicKeyLike): Status {
    return this.state.recipients.get(recipientId)?.status ?? "none";
  }

  getMilestones(recipientId: PublicKeyLike): Milestone[] {
    return (this.state.milestones.get(recipientId) ?? []).map(m => ({ ...m }));
  }

  getOfferedMilestones(recipientId: PublicKeyLike): Milestone[] {
    return (this.state.offers.get(recipientId)?.milestones ?? []).map(m => ({ ...m }));
  }

  /** Index of the next milestone due for payout */
  getNextMilestone(recipientId: PublicKeyLike): number {
    return this.state.nextMilestone.get(recipientId) ?? 0;
  }

  getRecipientVotes(recipientId: PublicKeyLike): VoteCounts {
    return voteCounts(this.state.recipientTallies.get(recipientId) ?? createTally());
  }

  getOfferVotes(recipientId: PublicKeyLike): VoteCounts {
    return voteCounts(this.state.offerTallies.get(recipientId) ?? createTally());
  }

  getSubmissionVotes(recipientId: PublicKeyLike, milestoneIndex: number): VoteCounts {
    return voteCounts(this.state.submissionTallies.get(`${recipientId}:${milestoneIndex}`) ?? createTally());
  }

  getAbortVotes(): VoteCounts {
    return voteCounts(this.state.abortTally);
  }

  getPayouts(): Payout[] {
    return this.state.payouts.map(p => ({ ...p }));
  }

  /** Committed payouts whose transfer failed and awaits `retryUndeliveredPayouts` */
  getUndeliveredPayouts(): Payout[] {
    return this.state.undelivered.map(p => ({ ...p }));
  }

  /**
   * Proposes a recipient. The call is the caller's accept vote for it; when
   * an anchor is given the caller must belong to that profile.
   */
  registerRecipient(caller: PublicKeyLike, payload: RecipientPayload): PublicKeyLike {
    return this.transact("registerRecipient", () => {
      this.requireActive();
      this.requireParticipant(caller);
      const input = parseOrThrow(recipientPayloadSchema, payload, "payload");

      let recipientId = input.recipientAddress;
      let profileId: string | undefined;
      if (input.anchor !== undefined) {
        const profile = this.deps.profiles?.getProfileByAnchor(input.anchor);
        if (!profile) {
          throw new ValidationError(`No profile found for anchor ${input.anchor}`);
        }
        if (!this.deps.profiles?.isOwnerOrMember(profile.id, caller)) {
          throw new AuthorizationError("Caller is not a member of the recipient profile");
        }
        recipientId = input.anchor;
        profileId = profile.id;
      }

      if (!this.state.recipients.has(recipientId)) {
        this.state.recipients.set(recipientId, {
          ...emptyRecipient(recipientId),
          recipientAddress: input.recipientAddress,
          status: "pending",
          metadata: input.metadata,
          ...(profileId !== undefined ? { profileId } : {})
        });
      }
      this.voteOnRecipient(caller, recipientId, "accepted");
      return recipientId;
    });
  }

  reviewRecipient(caller: PublicKeyLike, recipientId: PublicKeyLike, status: VoteStatus): void {
    this.transact("reviewRecipient", () => {
      this.requireActive();
      this.requireParticipant(caller);
      const vote = parseOrThrow(voteStatusSchema, status, "status");
      if (!this.state.recipients.has(recipientId)) {
        throw new StateError(`Recipient ${recipientId} has not been registered`);
      }
      this.voteOnRecipient(caller, recipientId, vote);
    });
  }

  private voteOnRecipient(caller: PublicKeyLike, recipientId: PublicKeyLike, vote: VoteStatus): void {
    const recipient = this.recipientRecord(recipientId);
    if (vote === "accepted" && recipient.status === "accepted") {
      throw new StateError(`Recipient ${recipientId} is already accepted`);
    }
    if (vote === "accepted" && this.state.acceptedRecipients >= this.config.maxRecipients) {
      throw new CapacityError("Maximum number of accepted recipients reached");
    }

    const tally = tallyFor(this.state.recipientTallies, recipientId);
    this.vote(tally, caller, vote === "accepted");

    const outcome = tallyOutcome(tally, this.getThreshold("recipient"));
    if (outcome === "accepted") {
      recipient.status = "accepted";
      recipient.grantAmount = this.state.poolAmount;
      this.state.acceptedRecipients += 1;
      resetTally(tally);
      this.events.queue({ type: "RecipientStatusChanged", recipientId, status: "accepted" });
      this.log.info(`recipient ${recipientId} accepted with grant ${recipient.grantAmount}`);
      this.deps.oracle.grantCapability(this.config.executorCapability, recipient.recipientAddress);
    } else if (outcome === "rejected") {
      const wasAccepted = recipient.status === "accepted";
      this.removeRecipient(recipientId);
      resetTally(tally);
      this.events.queue({ type: "RecipientStatusChanged", recipientId, status: "rejected" });
      this.log.info(`recipient ${recipientId} rejected`);
      if (wasAccepted) {
        this.deps.oracle.setCapabilityStatus(this.config.executorCapability, recipient.recipientAddress, false);
      }
    }
  }

  private removeRecipient(recipientId: PublicKeyLike): void {
    if (this.state.recipients.get(recipientId)?.status === "accepted") {
      this.state.acceptedRecipients -= 1;
    }
    this.state.recipients.delete(recipientId);
    this.state.milestones.delete(recipientId);
    this.state.offers.delete(recipientId);
    this.state.nextMilestone.delete(recipientId);
  }

  /**
   * Replaces any in-flight plan for the recipient with `milestones` and
   * counts the caller's own weight in favour of it.
   */
  offerMilestones(caller: PublicKeyLike, recipientId: PublicKeyLike, milestones: MilestoneInput[]): void {
    this.transact("offerMilestones", () => {
      this.requireActive();
      const recipient = this.requireAcceptedRecipient(recipientId);
      if (!this.isParticipant(caller) && !this.actsForRecipient(caller, recipient)) {
        throw new AuthorizationError("Only participants or the recipient can offer milestones");
      }
      if (recipient.milestonesReviewStatus === "accepted") {
        throw new StateError("Milestones for this recipient are already accepted");
      }
      const plan = parseOrThrow(milestonePlanSchema, milestones, "milestones");

      const tally = tallyFor(this.state.offerTallies, recipientId);
      resetTally(tally);
      this.state.offers.set(recipientId, {
        offeredBy: caller,
        milestones: plan.map(m => ({ amountPercentage: m.amountPercentage, metadata: m.metadata, status: "none" }))
      });
      this.events.queue({ type: "MilestonesOffered", recipientId, milestones: plan, offeredBy: caller });

      this.vote(tally, caller, true);
      this.applyOfferOutcome(recipient, tally);
    });
  }

  reviewOfferedMilestones(caller: PublicKeyLike, recipientId: PublicKeyLike, status: VoteStatus): void {
    this.transact("reviewOfferedMilestones", () => {
      this.requireActive();
      this.requireParticipant(caller);
      const vote = parseOrThrow(voteStatusSchema, status, "status");
      const recipient = this.requireAcceptedRecipient(recipientId);
      if (recipient.milestonesReviewStatus === "accepted") {
        throw new StateError("Milestones for this recipient are already accepted");
      }
      if (!this.state.offers.has(recipientId)) {
        throw new StateError(`No milestones offered for ${recipientId}`);
      }

      const tally = tallyFor(this.state.offerTallies, recipientId);
      this.vote(tally, caller, vote === "accepted");
      this.applyOfferOutcome(recipient, tally);
    });
  }

  private applyOfferOutcome(recipient: Recipient, tally: VoteTally): void {
    const recipientId = recipient.recipientId;
    const outcome = tallyOutcome(tally, this.getThreshold("offer"));
    if (outcome === "accepted") {
      const offer = this.state.offers.get(recipientId);
      if (!offer) {
        throw new StateError(`No milestones offered for ${recipientId}`);
      }
      const total = offer.milestones.reduce((sum, m) => sum + m.amountPercentage, 0n);
      if (total !== SCALE) {
        throw new ValidationError(`Milestone percentages must sum to ${SCALE}, got ${total}`);
      }
      this.state.milestones.set(recipientId, offer.milestones);
      this.state.offers.delete(recipientId);
      this.state.nextMilestone.set(recipientId, 0);
      recipient.milestonesReviewStatus = "accepted";
      resetTally(tally);
      this.events.queue({ type: "MilestonesReviewed", recipientId, status: "accepted" });
      this.log.info(`milestone plan for ${recipientId} accepted (${offer.milestones.length} milestones)`);
    } else if (outcome === "rejected") {
      this.state.offers.delete(recipientId);
      resetTally(tally);
      this.events.queue({ type: "MilestonesReset", recipientId });
      this.log.info(`milestone plan for ${recipientId} rejected`);
    }
  }

  submitMilestone(caller: PublicKeyLike, recipientId: PublicKeyLike, milestoneIndex: number, evidence: string): void {
    this.transact("submitMilestone", () => {
      this.requireActive();
      const recipient = this.requireAcceptedRecipient(recipientId);
      const participant = this.isParticipant(caller);
      const executor =
        this.deps.oracle.hasCapability(caller, this.config.executorCapability) &&
        this.actsForRecipient(caller, recipient);
      if (!participant && !executor) {
        throw new AuthorizationError("Only participants or the recipient can submit milestones");
      }
      const milestone = this.milestoneAt(recipientId, milestoneIndex);
      if (milestone.status === "accepted") {
        throw new StateError(`Milestone ${milestoneIndex} is already accepted`);
      }

      const tally = tallyFor(this.state.submissionTallies, `${recipientId}:${milestoneIndex}`);
      resetTally(tally);
      milestone.metadata = evidence;
      milestone.status = "pending";
      this.events.queue({ type: "MilestoneSubmitted", recipientId, milestoneIndex, evidence });

      if (participant) {
        this.vote(tally, caller, true);
        this.applySubmissionOutcome(recipient, milestoneIndex, milestone, tally);
      }
    });
  }

  reviewSubmittedMilestone(
    caller: PublicKeyLike,
    recipientId: PublicKeyLike,
    milestoneIndex: number,
    status: VoteStatus
  ): void {
    this.transact("reviewSubmittedMilestone", () => {
      this.requireActive();
      this.requireParticipant(caller);
      const vote = parseOrThrow(voteStatusSchema, status, "status");
      const recipient = this.requireAcceptedRecipient(recipientId);
      const milestone = this.milestoneAt(recipientId, milestoneIndex);
      if (milestone.status !== "pending") {
        throw new StateError(`Milestone ${milestoneIndex} is not pending review`);
      }

      const tally = tallyFor(this.state.submissionTallies, `${recipientId}:${milestoneIndex}`);
      this.vote(tally, caller, vote === "accepted");
      this.applySubmissionOutcome(recipient, milestoneIndex, milestone, tally);
    });
  }

  private applySubmissionOutcome(recipient: Recipient, milestoneIndex: number, milestone: Milestone, tally: VoteTally): void {
    const recipientId = recipient.recipientId;
    const outcome = tallyOutcome(tally, this.getThreshold("submission"));
    if (outcome === undefined) return;

    milestone.status = outcome;
    resetTally(tally);
    this.events.queue({ type: "SubmittedMilestoneReviewed", recipientId, milestoneIndex, status: outcome });
    this.events.queue({ type: "MilestoneStatusChanged", recipientId, milestoneIndex, status: outcome });
    this.log.info(`milestone ${milestoneIndex} of ${recipientId} ${outcome}`);

    if (outcome === "accepted") {
      this.settle(recipient);
    }
  }

  /**
   * Pays every accepted milestone from the next-due pointer onwards, in
   * order. Stops at the first milestone that is not accepted yet, so a later
   * milestone accepted early waits for the ones before it.
   */
  private settle(recipient: Recipient): void {
    const milestones = this.state.milestones.get(recipient.recipientId) ?? [];
    const payouts: Payout[] = [];
    while (this.state.poolActive) {
      const next = milestones[this.getNextMilestone(recipient.recipientId)];
      if (!next || next.status !== "accepted") break;
      const amount = (recipient.grantAmount * next.amountPercentage) / SCALE;
      this.allocate(recipient.recipientId, amount);
      payouts.push(this.distribute(recipient));
    }
    this.release(payouts);
  }

  private allocate(recipientId: PublicKeyLike, amount: bigint): void {
    if (amount > this.state.poolAmount) {
      throw new CapacityError(`Allocation of ${amount} for ${recipientId} exceeds pool amount ${this.state.poolAmount}`);
    }
    this.state.allocatedAmount += amount;
  }

  /** Commits the payout of the next-due milestone; the caller issues the transfer. */
  private distribute(recipient: Recipient): Payout {
    const recipientId = recipient.recipientId;
    const milestones = this.state.milestones.get(recipientId) ?? [];
    const index = this.getNextMilestone(recipientId);
    const milestone = milestones[index];
    if (!milestone || milestone.status !== "accepted") {
      throw new StateError(`Milestone ${index} of ${recipientId} is not accepted`);
    }

    const amount = (recipient.grantAmount * milestone.amountPercentage) / SCALE;
    this.state.poolAmount -= amount;
    this.state.nextMilestone.set(recipientId, index + 1);
    const payout: Payout = { to: recipient.recipientAddress, amount, reason: "milestone", recipientId, milestoneIndex: index };
    this.state.payouts.push(payout);
    this.events.queue({ type: "MilestonePaid", recipientId, milestoneIndex: index, amount });
    this.log.info(`paid ${amount} to ${recipient.recipientAddress} for milestone ${index}`);

    if (index + 1 >= milestones.length) {
      this.state.strategyState = "executed";
      this.state.poolActive = false;
      this.log.info("all milestones paid; strategy executed");
    }
    return payout;
  }

  /**
   * Vote to abort the project. Once the accept side crosses the threshold
   * the whole pool balance is refunded pro-rata to participants.
   */
  rejectProject(caller: PublicKeyLike, status: VoteStatus): void {
    this.transact("rejectProject", () => {
      this.requireActive();
      this.requireParticipant(caller);
      const vote = parseOrThrow(voteStatusSchema, status, "status");
      const tally = this.state.abortTally;
      this.vote(tally, caller, vote === "accepted");

      const outcome = tallyOutcome(tally, this.getThreshold("abort"));
      if (outcome === "rejected") {
        resetTally(tally);
        this.events.queue({ type: "ProjectRejectDeclined" });
        this.log.info("project abort declined");
        return;
      }
      if (outcome !== "accepted") return;

      const poolBalance = this.deps.ledger.getPoolInfo(this.config.poolId).balance;
      const reserved = sumAmounts(this.state.undelivered);
      const balance = poolBalance > reserved ? poolBalance - reserved : 0n;
      const refunds = this.registry.shareOut(balance);
      this.state.strategyState = "rejected";
      this.state.poolActive = false;
      this.state.poolAmount = 0n;
      this.events.queue({ type: "ProjectRejected" });
      this.log.info(`project rejected; refunding ${balance}`);

      const payouts: Payout[] = [];
      for (const [participant, amount] of refunds) {
        if (amount === 0n) continue;
        const payout: Payout = { to: participant, amount, reason: "refund" };
        this.state.payouts.push(payout);
        this.events.queue({ type: "ProjectRefunded", participant, amount });
        payouts.push(payout);
      }
      this.release(payouts);
    });
  }

  /**
   * Transfers payouts parked by an earlier partial release. Returns how many
   * went through; the rest stay parked.
   */
  retryUndeliveredPayouts(caller: PublicKeyLike): number {
    return this.transact("retryUndeliveredPayouts", () => {
      this.requireParticipant(caller);
      const parked = this.state.undelivered;
      this.state.undelivered = [];
      for (const payout of this.release(parked)) {
        this.events.queue({ type: "PayoutDelivered", payout: { ...payout } });
      }
      return parked.length - this.state.undelivered.length;
    });
  }

  /**
   * Issues the ledger transfers for committed payouts, in order, and returns
   * the ones that went through.
   *
   * The pool balance is checked for the whole batch first. Until a transfer
   * succeeds a failure fails the operation, which then rolls back with no
   * value moved. After that the operation can no longer roll back: a failed
   * transfer is parked in `undelivered` and the remaining ones are still
   * attempted.
   */
  private release(payouts: Payout[]): Payout[] {
    if (payouts.length === 0) return [];
    const reserved = sumAmounts(this.state.undelivered);
    const total = sumAmounts(payouts);
    const balance = this.deps.ledger.getPoolInfo(this.config.poolId).balance;
    if (reserved + total > balance) {
      throw new CapacityError(`Payouts of ${total} exceed pool balance ${balance - reserved}`);
    }

    const delivered: Payout[] = [];
    for (const payout of payouts) {
      try {
        this.deps.ledger.transfer(this.assetHandle, payout.to, payout.amount);
        delivered.push(payout);
      } catch (err) {
        if (delivered.length === 0) throw err;
        const message = err instanceof Error ? err.message : String(err);
        this.state.undelivered.push(payout);
        this.events.queue({ type: "PayoutUndelivered", payout: { ...payout }, error: message });
        this.log.error(`transfer of ${payout.amount} to ${payout.to} failed; parked for retry: ${message}`);
      }
    }
    return delivered;
  }

  /**
   * Runs `fn` against a snapshot: if it throws, the state and the events it
   * queued are rolled back. Events are published once the outermost call
   * completes.
   */
  private transact<T>(operation: string, fn: () => T): T {
    const snapshot = this.snapshot();
    const mark = this.events.pendingCount();
    const journalMark = this.voteJournal.length;
    this.depth += 1;
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.undoVotes(journalMark);
      this.state = snapshot;
      this.events.discard(mark);
      this.log.debug(`${operation} rolled back: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    } finally {
      this.depth -= 1;
    }
    if (this.depth === 0) {
      this.voteJournal = [];
      this.events.flush();
    }
    return result;
  }

  /**
   * Copies the state for rollback. Tally records are copied but share their
   * `votedRound` maps with the live state, so the cost does not grow with
   * the number of votes ever cast.
   */
  private snapshot(): EscrowState {
    const { recipientTallies, offerTallies, submissionTallies, abortTally, ...rest } = this.state;
    return {
      ...structuredClone(rest),
      recipientTallies: copyTallies(recipientTallies),
      offerTallies: copyTallies(offerTallies),
      submissionTallies: copyTallies(submissionTallies),
      abortTally: { ...abortTally }
    };
  }

  private vote(tally: VoteTally, voter: PublicKeyLike, support: boolean): void {
    const previous = tally.votedRound.get(voter);
    castVote(tally, voter, support, this.registry.weightOf(voter));
    this.voteJournal.push({ tally, voter, previous });
  }

  private undoVotes(mark: number): void {
    for (const { tally, voter, previous } of this.voteJournal.splice(mark).reverse()) {
      if (previous === undefined) {
        tally.votedRound.delete(voter);
      } else {
        tally.votedRound.set(voter, previous);
      }
    }
  }

  private requireActive(): void {
    if (this.state.strategyState !== "active") {
      throw new StateError(`Strategy is ${this.state.strategyState}`);
    }
  }

  private isParticipant(identity: PublicKeyLike): boolean {
    return this.deps.oracle.hasCapability(identity, this.config.participantCapability);
  }

  private requireParticipant(identity: PublicKeyLike): void {
    if (!this.isParticipant(identity)) {
      throw new AuthorizationError(`${identity} is not a participant`);
    }
  }

  private actsForRecipient(identity: PublicKeyLike, recipient: Recipient): boolean {
    if (identity === recipient.recipientAddress || identity === recipient.recipientId) return true;
    if (recipient.profileId === undefined) return false;
    return this.deps.profiles?.isOwnerOrMember(recipient.profileId, identity) ?? false;
  }

  private recipientRecord(recipientId: PublicKeyLike): Recipient {
    const recipient = this.state.recipients.get(recipientId);
    if (!recipient) {
      throw new StateError(`Recipient ${recipientId} has not been registered`);
    }
    return recipient;
  }

  private requireAcceptedRecipient(recipientId: PublicKeyLike): Recipient {
    const recipient = this.state.recipients.get(recipientId);
    if (!recipient || recipient.status !== "accepted") {
      throw new StateError(`Recipient ${recipientId} is not accepted`);
    }
    return recipient;
  }

  private milestoneAt(recipientId: PublicKeyLike, milestoneIndex: number): Milestone {
    parseOrThrow(milestoneIndexSchema, milestoneIndex, "milestoneIndex");
    const milestone = this.state.milestones.get(recipientId)?.[milestoneIndex];
    if (!milestone) {
      throw new StateError(`Milestone ${milestoneIndex} does not exist for ${recipientId}`);
    }
    return milestone;
  }
}
