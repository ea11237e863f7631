import type { Logger } from "../logger.js";
import type { MilestoneInput, Payout, PublicKeyLike, Status } from "./types.js";

export type EscrowEvent =
  | { type: "RecipientStatusChanged"; recipientId: PublicKeyLike; status: Status }
  | { type: "MilestonesOffered"; recipientId: PublicKeyLike; milestones: MilestoneInput[]; offeredBy: PublicKeyLike }
  | { type: "MilestonesReviewed"; recipientId: PublicKeyLike; status: Status }
  | { type: "MilestonesReset"; recipientId: PublicKeyLike }
  | { type: "MilestoneSubmitted"; recipientId: PublicKeyLike; milestoneIndex: number; evidence: string }
  | { type: "SubmittedMilestoneReviewed"; recipientId: PublicKeyLike; milestoneIndex: number; status: Status }
  | { type: "MilestoneStatusChanged"; recipientId: PublicKeyLike; milestoneIndex: number; status: Status }
  | { type: "MilestonePaid"; recipientId: PublicKeyLike; milestoneIndex: number; amount: bigint }
  | { type: "ProjectRejected" }
  | { type: "ProjectRejectDeclined" }
  | { type: "ProjectRefunded"; participant: PublicKeyLike; amount: bigint }
  | { type: "PayoutUndelivered"; payout: Payout; error: string }
  | { type: "PayoutDelivered"; payout: Payout };

export type EscrowEventType = EscrowEvent["type"];

export type EscrowEventCallback = (event: EscrowEvent) => void;

/**
 * Per-escrow pub/sub. Events raised during an operation are queued and only
 * published once the operation has committed; a failed operation discards
 * its queue.
 */
export class EscrowEventBus {
  private readonly listeners = new Map<string, Set<EscrowEventCallback>>();
  private readonly wildcardListeners = new Set<EscrowEventCallback>();
  private readonly history: EscrowEvent[] = [];
  private pending: EscrowEvent[] = [];

  constructor(private readonly log: Logger) {}

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EscrowEventType | "*", callback: EscrowEventCallback): () => void {
    if (event === "*") {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  queue(event: EscrowEvent): void {
    this.pending.push(event);
  }

  pendingCount(): number {
    return this.pending.length;
  }

  /** Drops queued events from position `from` onwards */
  discard(from = 0): void {
    this.pending = this.pending.slice(0, from);
  }

  /**
   * Publishes queued events in order to every listener. A throwing listener
   * is logged and skipped; it never fails the operation that raised the event.
   */
  flush(): void {
    const events = this.pending;
    this.pending = [];
    this.history.push(...events);
    for (const event of events) {
      for (const cb of [...(this.listeners.get(event.type) ?? []), ...this.wildcardListeners]) {
        this.deliver(cb, event);
      }
    }
  }

  private deliver(cb: EscrowEventCallback, event: EscrowEvent): void {
    try {
      cb(event);
    } catch (err) {
      this.log.error(`listener for ${event.type} failed:`, err);
    }
  }

  getHistory(): EscrowEvent[] {
    return [...this.history];
  }
}
