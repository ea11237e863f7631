import { describe, expect, it } from "vitest";
import type { EscrowEvent } from "../../src/escrow/events.js";
import {
  AuthorizationError,
  CapacityError,
  DuplicateVoteError,
  StateError,
  ValidationError
} from "../../src/escrow/errors.js";
import { acceptRecipient, alice, bob, builder, carol, otherBuilder, outsider, setupEscrow } from "../helpers/escrow.js";
import { makeKeypair, pubkey } from "../helpers/participants.js";

describe("recipient lifecycle", () => {
  it("accepts a recipient exactly once when the vote crosses 77%", () => {
    const { escrow, oracle } = setupEscrow();

    expect(escrow.registerRecipient(alice, { recipientAddress: builder, metadata: "ipfs://proposal" })).toBe(builder);
    expect(escrow.getRecipientStatus(builder)).toBe("pending");

    escrow.reviewRecipient(bob, builder, "accepted");
    expect(escrow.getRecipientVotes(builder)).toEqual({
      round: 1,
      votesFor: 700_000_000_000_000_000n,
      votesAgainst: 0n
    });
    expect(escrow.getRecipientStatus(builder)).toBe("pending");
    expect(oracle.hasCapability(builder, "executor")).toBe(false);

    escrow.reviewRecipient(carol, builder, "accepted");
    expect(escrow.getRecipient(builder)).toEqual({
      recipientId: builder,
      recipientAddress: builder,
      status: "accepted",
      milestonesReviewStatus: "none",
      grantAmount: 1_000_000n,
      metadata: "ipfs://proposal"
    });
    expect(escrow.getRecipientVotes(builder)).toEqual({ round: 2, votesFor: 0n, votesAgainst: 0n });
    expect(oracle.hasCapability(builder, "executor")).toBe(true);

    expect(() => escrow.reviewRecipient(alice, builder, "accepted")).toThrow(StateError);
    const changes = escrow.getEventHistory().filter(e => e.type === "RecipientStatusChanged");
    expect(changes).toEqual([{ type: "RecipientStatusChanged", recipientId: builder, status: "accepted" }]);
  });

  it("refuses a second vote from the same participant in a round", () => {
    const { escrow } = setupEscrow();
    escrow.registerRecipient(alice, { recipientAddress: builder });

    expect(() => escrow.reviewRecipient(alice, builder, "rejected")).toThrow(DuplicateVoteError);
    expect(() => escrow.registerRecipient(alice, { recipientAddress: builder })).toThrow(DuplicateVoteError);
    expect(escrow.getRecipientVotes(builder).votesAgainst).toBe(0n);
  });

  it("refuses callers without the participant capability", () => {
    const { escrow } = setupEscrow();

    expect(() => escrow.registerRecipient(outsider, { recipientAddress: builder })).toThrow(AuthorizationError);
    escrow.registerRecipient(alice, { recipientAddress: builder });
    expect(() => escrow.reviewRecipient(outsider, builder, "accepted")).toThrow(AuthorizationError);
  });

  it("deletes the recipient and revokes its executor capability when rejection passes", () => {
    const { escrow, oracle } = setupEscrow({ thresholds: { recipient: 50 } });
    escrow.registerRecipient(alice, { recipientAddress: builder });
    escrow.reviewRecipient(bob, builder, "accepted");
    expect(escrow.getRecipientStatus(builder)).toBe("accepted");

    escrow.reviewRecipient(alice, builder, "rejected");
    expect(escrow.getRecipientStatus(builder)).toBe("accepted");
    escrow.reviewRecipient(bob, builder, "rejected");

    expect(escrow.getRecipient(builder).status).toBe("none");
    expect(escrow.getRecipient(builder).grantAmount).toBe(0n);
    expect(oracle.hasCapability(builder, "executor")).toBe(false);
    expect(escrow.getEventHistory().at(-1)).toEqual({
      type: "RecipientStatusChanged",
      recipientId: builder,
      status: "rejected"
    });

    escrow.registerRecipient(carol, { recipientAddress: builder });
    expect(escrow.getRecipientStatus(builder)).toBe("pending");
  });

  it("enforces the maximum number of accepted recipients", () => {
    const { escrow } = setupEscrow({ thresholds: { recipient: 50 } });
    escrow.registerRecipient(alice, { recipientAddress: builder });
    escrow.reviewRecipient(bob, builder, "accepted");

    expect(() => escrow.registerRecipient(alice, { recipientAddress: otherBuilder })).toThrow(CapacityError);
    expect(escrow.getRecipientStatus(otherBuilder)).toBe("none");
  });

  it("accepts several recipients up to the configured maximum", () => {
    const { escrow } = setupEscrow({ maxRecipients: 2 });
    acceptRecipient(escrow, builder);
    acceptRecipient(escrow, otherBuilder);

    expect(escrow.getRecipientStatus(builder)).toBe("accepted");
    expect(escrow.getRecipientStatus(otherBuilder)).toBe("accepted");
    expect(escrow.getRecipient(otherBuilder).grantAmount).toBe(1_000_000n);
  });

  it("refuses reviews of recipients that were never registered", () => {
    const { escrow } = setupEscrow();

    expect(() => escrow.reviewRecipient(alice, builder, "accepted")).toThrow(/has not been registered/);
  });

  it("validates the status argument and the recipient address", () => {
    const { escrow } = setupEscrow();
    escrow.registerRecipient(alice, { recipientAddress: builder });

    expect(() => Reflect.apply(escrow.reviewRecipient, escrow, [bob, builder, "appealed"])).toThrow(ValidationError);
    expect(() => escrow.registerRecipient(bob, { recipientAddress: "not-a-key" })).toThrow(ValidationError);
    expect(escrow.getRecipientVotes(builder).votesFor).toBe(400_000_000_000_000_000n);
  });

  it("registers on behalf of a profile only for its members", () => {
    const { escrow, oracle, profiles } = setupEscrow();
    const anchor = pubkey(makeKeypair(40));
    profiles.addProfile(anchor, { id: "profile-1", owner: builder }, [alice]);

    expect(() => escrow.registerRecipient(bob, { recipientAddress: builder, anchor })).toThrow(AuthorizationError);
    expect(() =>
      escrow.registerRecipient(alice, { recipientAddress: builder, anchor: pubkey(makeKeypair(41)) })
    ).toThrow(/No profile found/);

    expect(escrow.registerRecipient(alice, { recipientAddress: builder, anchor })).toBe(anchor);
    escrow.reviewRecipient(bob, anchor, "accepted");
    escrow.reviewRecipient(carol, anchor, "accepted");

    const recipient = escrow.getRecipient(anchor);
    expect(recipient.recipientAddress).toBe(builder);
    expect(recipient.profileId).toBe("profile-1");
    expect(recipient.status).toBe("accepted");
    expect(oracle.hasCapability(builder, "executor")).toBe(true);
  });

  it("publishes status changes to subscribers", () => {
    const { escrow } = setupEscrow();
    const seen: EscrowEvent[] = [];
    const unsubscribe = escrow.on("RecipientStatusChanged", event => seen.push(event));

    acceptRecipient(escrow);
    unsubscribe();

    expect(seen).toEqual([{ type: "RecipientStatusChanged", recipientId: builder, status: "accepted" }]);
  });
});
