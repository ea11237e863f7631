import { describe, expect, it } from "vitest";
import { ESCROW_MAX_RECIPIENTS, ESCROW_THRESHOLD_PERCENT, RPC_URL } from "../src/env.js";
import { defaultEscrowSettings } from "../src/escrow/milestone-escrow.js";

describe("env", () => {
  it("uses testnet RPC by default", () => {
    expect(RPC_URL).toBe("https://api.testnet.solana.com");
  });

  it("defaults every vote to a 77% threshold and one recipient", () => {
    expect(ESCROW_THRESHOLD_PERCENT).toBe(77);
    expect(ESCROW_MAX_RECIPIENTS).toBe(1);
    expect(defaultEscrowSettings()).toEqual({
      thresholds: { recipient: 77, offer: 77, submission: 77, abort: 77 },
      maxRecipients: 1
    });
  });
});
