export { MilestoneEscrow, defaultEscrowSettings } from "./milestone-escrow.js";
export { VotingPowerRegistry, normalize, splitProRata } from "./voting-power.js";
export {
  castVote,
  createTally,
  hasVoted,
  resetTally,
  tallyOutcome,
  thresholdOf,
  type VoteTally
} from "./vote-tally.js";
export { EscrowEventBus, type EscrowEvent, type EscrowEventType } from "./events.js";
export {
  AuthorizationError,
  CapacityError,
  DuplicateVoteError,
  ErrorCode,
  EscrowError,
  StateError,
  ValidationError
} from "./errors.js";
export { AllowListOracle, InMemoryPoolLedger, InMemoryProfileDirectory, type TransferRecord } from "./in-memory.js";
export { SolanaPayoutLedger } from "./solana-ledger.js";
export {
  EXECUTOR_CAPABILITY,
  PARTICIPANT_CAPABILITY,
  identityFromSeed,
  parseScenario,
  runScenario,
  type Scenario,
  type ScenarioRun,
  type ScenarioStep
} from "./scenario.js";
export { SCALE } from "./types.js";
export type {
  AuthorizationOracle,
  EscrowConfig,
  EscrowDependencies,
  Milestone,
  MilestoneInput,
  Participant,
  Payout,
  PoolInfo,
  PoolLedger,
  Profile,
  ProfileDirectory,
  PublicKeyLike,
  Recipient,
  RecipientPayload,
  Status,
  StrategyState,
  ThresholdKind,
  Thresholds,
  VoteCounts,
  VoteStatus
} from "./types.js";
