/**
 * @intentvault/treasury — Reward funding and distribution.
 *
 * Moves reward assets into intent vaults and out again once the claim
 * state machine allows it:
 * - FundingManager: full, partial and permit-delegated funding
 * - RewardDistributor: withdraw, batch withdraw, refund, token recovery
 *
 * @packageDocumentation
 */

// Types
export type {
  PermitDelegate,
  FundingOptions,
  FundingResult,
  DistributionResult,
  WithdrawalRequest,
  BatchOutcome,
  ClaimResolver,
  Clock,
} from "./types.js";

// Funding
export { FundingManager, FundingError } from "./funding.js";
export type { FundingErrorCode, FundingManagerDeps } from "./funding.js";
export { LedgerPermitDelegate, PermitError } from "./permit.js";

// Distribution
export { RewardDistributor, DistributionError } from "./distribution.js";
export type { DistributionErrorCode, RewardDistributorDeps } from "./distribution.js";

// Asset helpers
export { requiredAssets, isRewardAsset, holdsReward } from "./assets.js";
