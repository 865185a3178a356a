/**
 * Reward Distributor — Drains vaults once their claim state allows it.
 *
 * Distribution is a consequence of claim state, never a cause:
 * - withdraw: claimed, not yet withdrawn → everything to the claimant
 * - refund: unclaimed and past the reward deadline → everything to the creator
 * - recover: tokens outside the reward → to the creator, any time
 *
 * State is checked before any transfer; transfers run inside one
 * ledger.atomic block; the claim transition is committed last.
 */

import type { Address, Bytes32, ChainId, Reward } from "@intentvault/types";
import type { AssetLedger } from "@intentvault/ledger";
import type { ClaimStateMachine, IntentRegistry } from "@intentvault/vault";
import { drainVault, isRewardAsset } from "./assets.js";
import type { BatchOutcome, ClaimResolver, Clock, DistributionResult, WithdrawalRequest } from "./types.js";

// =============================================================================
// Error
// =============================================================================

export class DistributionError extends Error {
  public readonly code: DistributionErrorCode;
  constructor(code: DistributionErrorCode, message: string) {
    super(message);
    this.name = "DistributionError";
    this.code = code;
  }
}

export type DistributionErrorCode =
  | "NOT_YET_EXPIRED"
  | "TOKEN_NOT_RECOVERABLE"
  | "ARRAY_LENGTH_MISMATCH";

function isCodedError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

// =============================================================================
// Reward Distributor
// =============================================================================

export interface RewardDistributorDeps {
  readonly ledger: AssetLedger;
  readonly registry: IntentRegistry;
  readonly claims: ClaimStateMachine;
  readonly clock: Clock;
  readonly resolver?: ClaimResolver | undefined;
}

export class RewardDistributor {
  private readonly ledger: AssetLedger;
  private readonly registry: IntentRegistry;
  private readonly claims: ClaimStateMachine;
  private readonly clock: Clock;
  private readonly resolver: ClaimResolver | undefined;

  constructor(deps: RewardDistributorDeps) {
    this.ledger = deps.ledger;
    this.registry = deps.registry;
    this.claims = deps.claims;
    this.clock = deps.clock;
    this.resolver = deps.resolver;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdrawal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay the claimant everything the vault holds of the reward's assets.
   *
   * @throws {ClaimError} NOT_CLAIMED, ALREADY_WITHDRAWN
   */
  withdrawRewards(destination: ChainId, routeHash: Bytes32, reward: Reward): DistributionResult {
    const { intentHash, vault } = this.registry.locate(destination, routeHash, reward);
    this.resolver?.resolve(intentHash, destination, reward);

    const claim = this.claims.assertWithdrawable(intentHash);
    const claimant = claim.claimant;
    if (claimant === undefined) {
      // A claimed record always names its claimant
      throw new Error(`Claim for ${intentHash} has no claimant`);
    }

    const transferred = this.ledger.atomic(() =>
      drainVault(this.ledger, vault, reward, claimant, `withdraw ${intentHash}`),
    );
    this.claims.markWithdrawn(intentHash);
    return { intentHash, vault, recipient: claimant, transferred };
  }

  /**
   * Withdraw several intents. Elements succeed or fail independently;
   * earlier successes stand when a later element fails.
   *
   * @throws {DistributionError} ARRAY_LENGTH_MISMATCH before anything moves
   */
  batchWithdraw(
    destinations: readonly ChainId[],
    routeHashes: readonly Bytes32[],
    rewards: readonly Reward[],
  ): BatchOutcome[] {
    if (destinations.length !== routeHashes.length || routeHashes.length !== rewards.length) {
      throw new DistributionError(
        "ARRAY_LENGTH_MISMATCH",
        `Batch has ${destinations.length} destinations, ${routeHashes.length} route hashes and ${rewards.length} rewards`,
      );
    }

    const requests: WithdrawalRequest[] = [];
    for (const [i, reward] of rewards.entries()) {
      const destination = destinations[i];
      const routeHash = routeHashes[i];
      if (destination !== undefined && routeHash !== undefined) {
        requests.push({ destination, routeHash, reward });
      }
    }
    return requests.map((request) => this.tryWithdraw(request));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Refund
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Return the vault's reward assets to the creator.
   *
   * @throws {ClaimError} ALREADY_CLAIMED, ALREADY_REFUNDED
   * @throws {DistributionError} NOT_YET_EXPIRED
   */
  refund(destination: ChainId, routeHash: Bytes32, reward: Reward): DistributionResult {
    const { intentHash, vault } = this.registry.locate(destination, routeHash, reward);
    this.resolver?.resolve(intentHash, destination, reward);

    this.claims.assertRefundable(intentHash);
    const now = this.clock();
    if (now < reward.deadline) {
      throw new DistributionError(
        "NOT_YET_EXPIRED",
        `Intent ${intentHash} expires at ${reward.deadline}, now is ${now}`,
      );
    }

    const transferred = this.ledger.atomic(() =>
      drainVault(this.ledger, vault, reward, reward.creator, `refund ${intentHash}`),
    );
    this.claims.markRefunded(intentHash);
    return { intentHash, vault, recipient: reward.creator, transferred };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Recovery
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Send the creator a token that reached the vault but is not part of
   * the reward. Reward assets only ever leave through withdraw or refund.
   *
   * @throws {VaultError} VAULT_NOT_FOUND
   * @throws {DistributionError} TOKEN_NOT_RECOVERABLE
   */
  recoverToken(destination: ChainId, routeHash: Bytes32, reward: Reward, token: Address): DistributionResult {
    const { intentHash, vault } = this.registry.locate(destination, routeHash, reward);
    this.registry.require(intentHash);

    if (isRewardAsset(reward, token)) {
      throw new DistributionError(
        "TOKEN_NOT_RECOVERABLE",
        `${token} is a reward asset of ${intentHash}; use withdraw or refund`,
      );
    }
    const balance = this.ledger.balanceOf(token, vault);
    if (balance === 0n) {
      throw new DistributionError("TOKEN_NOT_RECOVERABLE", `Vault ${vault} holds no ${token}`);
    }

    this.ledger.atomic(() => this.ledger.transfer(token, vault, reward.creator, balance, `recover ${intentHash}`));
    return { intentHash, vault, recipient: reward.creator, transferred: [{ token, amount: balance }] };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private tryWithdraw(request: WithdrawalRequest): BatchOutcome {
    let intentHash: Bytes32 | undefined;
    try {
      intentHash = this.registry.locate(request.destination, request.routeHash, request.reward).intentHash;
      const result = this.withdrawRewards(request.destination, request.routeHash, request.reward);
      return { intentHash, ok: true, result };
    } catch (err) {
      if (!isCodedError(err)) throw err;
      return { intentHash, ok: false, error: { code: err.code, message: err.message } };
    }
  }
}
