import dotenv from "dotenv";

dotenv.config();

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined || input.trim() === "") return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

export const RPC_URL =
  process.env.SOLANA_RPC_URL?.trim() || "https://api.testnet.solana.com";

export const ESCROW_THRESHOLD_PERCENT = parseNumber(process.env.ESCROW_THRESHOLD_PERCENT, 77);

export const ESCROW_ABORT_THRESHOLD_PERCENT = parseNumber(
  process.env.ESCROW_ABORT_THRESHOLD_PERCENT,
  ESCROW_THRESHOLD_PERCENT
);

export const ESCROW_MAX_RECIPIENTS = parseNumber(process.env.ESCROW_MAX_RECIPIENTS, 1);

export const LOG_LEVEL = process.env.LOG_LEVEL?.trim() || "info";
