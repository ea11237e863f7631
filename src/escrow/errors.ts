export const ErrorCode = {
  Unauthorized: "unauthorized",
  InvalidState: "invalid_state",
  CapacityExceeded: "capacity_exceeded",
  DuplicateVote: "duplicate_vote",
  InvalidInput: "invalid_input"
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class EscrowError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = "EscrowError";
  }
}

/** Caller lacks the required capability */
export class AuthorizationError extends EscrowError {
  constructor(message: string) {
    super(ErrorCode.Unauthorized, message);
    this.name = "AuthorizationError";
  }
}

/** Operation is illegal for the current recipient, milestone or strategy status */
export class StateError extends EscrowError {
  constructor(message: string) {
    super(ErrorCode.InvalidState, message);
    this.name = "StateError";
  }
}

export class CapacityError extends EscrowError {
  constructor(message: string) {
    super(ErrorCode.CapacityExceeded, message);
    this.name = "CapacityError";
  }
}

export class DuplicateVoteError extends EscrowError {
  constructor(message: string) {
    super(ErrorCode.DuplicateVote, message);
    this.name = "DuplicateVoteError";
  }
}

export class ValidationError extends EscrowError {
  constructor(message: string) {
    super(ErrorCode.InvalidInput, message);
    this.name = "ValidationError";
  }
}
