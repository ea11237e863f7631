import { PublicKey } from "@solana/web3.js";
import { z } from "zod";
import { ValidationError } from "./errors.js";

function isPublicKey(value: string): boolean {
  try {
    new PublicKey(value);
    return true;
  } catch {
    return false;
  }
}

export const addressSchema = z
  .string()
  .min(32)
  .refine(isPublicKey, { message: "must be a base58 public key" });

export const voteStatusSchema = z.enum(["accepted", "rejected"], {
  errorMap: () => ({ message: "status must be 'accepted' or 'rejected'" })
});

export const recipientPayloadSchema = z.object({
  recipientAddress: addressSchema,
  metadata: z.string().default(""),
  anchor: addressSchema.optional()
});

export const milestoneInputSchema = z.object({
  amountPercentage: z.bigint().positive(),
  metadata: z.string()
});

export const milestonePlanSchema = z.array(milestoneInputSchema).min(1, "at least one milestone is required");

export const milestoneIndexSchema = z.number().int().nonnegative();

export const thresholdSchema = z.number().int().min(1).max(99);

export const thresholdsSchema = z.object({
  recipient: thresholdSchema,
  offer: thresholdSchema,
  submission: thresholdSchema,
  abort: thresholdSchema
});

/** Parses `input` or throws a ValidationError naming the first issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${label}.${issue.path.join(".")}` : label;
    throw new ValidationError(`Invalid ${where}: ${issue?.message ?? "invalid value"}`);
  }
  return result.data;
}
