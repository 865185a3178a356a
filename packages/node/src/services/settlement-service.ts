/**
 * SettlementService — Composition root for the settlement core.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service wires hashing, vault records, funding,
 * proofs and distribution together, and publishes every state change to
 * the notification log.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import { isAddressEqual } from "viem";
import type {
  Address,
  Bytes32,
  ChainId,
  ClaimStatus,
  DomainEvent,
  EventSource,
  FundingStatus,
  Intent,
  IntentHashes,
  Reward,
  TokenAmount,
} from "@intentvault/types";
import { hashIntent, intentVaultAddress } from "@intentvault/encoding";
import type { VaultTemplate } from "@intentvault/encoding";
import { InMemoryAssetLedger } from "@intentvault/ledger";
import type { AssetLedger } from "@intentvault/ledger";
import { ClaimError, ClaimStateMachine, IntentRegistry } from "@intentvault/vault";
import type { IntentRecord } from "@intentvault/vault";
import { FundingManager, RewardDistributor, requiredAssets } from "@intentvault/treasury";
import type {
  BatchOutcome,
  ClaimResolver,
  Clock,
  DistributionResult,
  FundingOptions,
  FundingResult,
} from "@intentvault/treasury";
import { ProofError, ProverRegistry } from "@intentvault/proof";
import type {
  ProofEvidence,
  ProofVerifier,
  RecordedProof,
  VerificationContext,
  VerifiedClaim,
} from "@intentvault/proof";
import {
  createIntentCatalog,
  InMemoryEventStore,
  INTENT_EVENTS,
  intentStream,
} from "@intentvault/event-store";
import type { ReadAllOptions, StoredEvent } from "@intentvault/event-store";

// =============================================================================
// Configuration
// =============================================================================

export interface SettlementServiceConfig {
  /** Where vaults are deployed from; its deployer is the portal */
  readonly template: VaultTemplate;

  /** Account funders approve for direct funding. Default: the portal */
  readonly spender?: Address;

  /** Default: a fresh in-memory ledger */
  readonly ledger?: AssetLedger;

  /** Ledger time in unix seconds. Default: wall clock */
  readonly clock?: Clock;

  /** Default: silent */
  readonly logger?: Logger;
}

export interface VaultState {
  readonly intentHash: Bytes32;
  readonly vault: Address;
  readonly status: ClaimStatus;
  readonly funding: FundingStatus;
  readonly withdrawn: boolean;
  /** Vault balance of every reward asset, native first */
  readonly balances: readonly TokenAmount[];
}

export interface ReadEventsOptions extends ReadAllOptions {
  /** Only events of this intent's stream */
  readonly intentHash?: Bytes32;
}

function wallClock(): bigint {
  return BigInt(Math.floor(Date.now() / 1000));
}

// =============================================================================
// Service
// =============================================================================

export class SettlementService {
  readonly ledger: AssetLedger;
  readonly registry: IntentRegistry;
  readonly claims: ClaimStateMachine;
  readonly provers: ProverRegistry;
  readonly funding: FundingManager;
  readonly distributor: RewardDistributor;
  readonly eventStore: InMemoryEventStore;

  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: SettlementServiceConfig) {
    this.clock = config.clock ?? wallClock;
    this.logger = config.logger ?? pino({ level: "silent" });

    const recordClock = (): Date => new Date(Number(this.clock()) * 1000);

    this.ledger = config.ledger ?? new InMemoryAssetLedger();
    this.registry = new IntentRegistry(config.template, { clock: recordClock });
    this.claims = new ClaimStateMachine({ clock: recordClock });
    this.provers = new ProverRegistry();
    this.eventStore = new InMemoryEventStore({
      catalog: createIntentCatalog(),
      clock: recordClock,
    });

    const resolver: ClaimResolver = {
      resolve: (intentHash, destination, reward) =>
        this.applyStoredProof(intentHash, destination, reward),
    };

    this.funding = new FundingManager({
      ledger: this.ledger,
      registry: this.registry,
      claims: this.claims,
      spender: config.spender ?? config.template.deployer,
    });
    this.distributor = new RewardDistributor({
      ledger: this.ledger,
      registry: this.registry,
      claims: this.claims,
      clock: this.clock,
      resolver,
    });
  }

  // ─── Hashing & Vaults ──────────────────────────────────────────────

  getIntentHash(intent: Intent): IntentHashes {
    return hashIntent(intent);
  }

  intentVaultAddress(intent: Intent): Address {
    return intentVaultAddress(intent, this.registry.template);
  }

  getRewardStatus(intentHash: Bytes32): ClaimStatus {
    return this.claims.getStatus(intentHash);
  }

  /**
   * @throws {VaultError} VAULT_NOT_FOUND for an intent never published or funded
   */
  getVaultState(intentHash: Bytes32): VaultState {
    const record = this.registry.require(intentHash);
    const claim = this.claims.getState(intentHash);
    return {
      intentHash,
      vault: record.vault,
      status: claim.status,
      funding: this.funding.fundingStatus(record.vault, record.reward),
      withdrawn: claim.withdrawn,
      balances: requiredAssets(record.reward).map(({ token }) => ({
        token,
        amount: this.ledger.balanceOf(token, record.vault),
      })),
    };
  }

  getIntent(intentHash: Bytes32): IntentRecord | undefined {
    return this.registry.get(intentHash);
  }

  // ─── Funding ───────────────────────────────────────────────────────

  publish(intent: Intent): IntentRecord {
    const record = this.funding.publish(intent);
    this.emitPublished(record.intentHash, intent);
    return record;
  }

  fundFor(
    destination: ChainId,
    routeHash: Bytes32,
    reward: Reward,
    funder: Address,
    options: FundingOptions = {},
  ): FundingResult {
    const result = this.funding.fundFor(destination, routeHash, reward, funder, options);
    this.emitFunded(result, funder);
    return result;
  }

  publishAndFundFor(intent: Intent, funder: Address, options: FundingOptions = {}): FundingResult {
    const result = this.funding.publishAndFundFor(intent, funder, options);
    this.emitPublished(result.intentHash, intent);
    this.emitFunded(result, funder);
    return result;
  }

  isIntentFunded(intent: Intent): boolean {
    return this.funding.isIntentFunded(intent);
  }

  // ─── Proofs ────────────────────────────────────────────────────────

  registerProver<E extends ProofEvidence>(address: Address, verifier: ProofVerifier<E>): void {
    this.provers.register(address, verifier);
    this.logger.info({ prover: address, mechanism: verifier.mechanism }, "Prover registered");
  }

  /**
   * Verify evidence delivered to `prover` and apply the claims it proves.
   *
   * Claims on intents already on record move them to "claimed" now;
   * the rest wait in the prover's record until the intent is withdrawn
   * or refunded. Nothing is applied if any claim is rejected.
   *
   * @throws {ProofError} UNKNOWN_PROVER, INVALID_PROOF, UNAUTHORIZED_PROOF_SOURCE,
   *   DESTINATION_MISMATCH, ARRAY_LENGTH_MISMATCH, ALREADY_CLAIMED
   * @throws {ClaimError} ALREADY_CLAIMED, ALREADY_REFUNDED
   */
  relayProof(prover: Address, evidence: ProofEvidence): readonly RecordedProof[] {
    const context = this.verificationContext();
    const verified = this.provers.verify(prover, evidence, context);

    for (const claim of verified) {
      this.assertApplicable(prover, claim);
    }
    for (const claim of verified) {
      const record = this.registry.get(claim.intentHash);
      if (record !== undefined) {
        this.challengeStoredProof(prover, claim.intentHash, record.destination);
      }
    }

    const recorded = this.provers.record(prover, verified, context.now);

    for (const proof of recorded) {
      if (!this.registry.has(proof.intentHash)) {
        this.logger.info({ intentHash: proof.intentHash, prover }, "Proof stored for unknown intent");
        continue;
      }
      const outcome = this.claims.recordClaim(proof.intentHash, proof.claimant, proof.destination, prover);
      if (outcome === "applied") {
        this.emitProven(proof, prover);
      }
    }
    return recorded;
  }

  // ─── Distribution ──────────────────────────────────────────────────

  withdrawRewards(destination: ChainId, routeHash: Bytes32, reward: Reward): DistributionResult {
    const result = this.distributor.withdrawRewards(destination, routeHash, reward);
    this.emitWithdrawn(result);
    return result;
  }

  batchWithdraw(
    destinations: readonly ChainId[],
    routeHashes: readonly Bytes32[],
    rewards: readonly Reward[],
  ): BatchOutcome[] {
    const outcomes = this.distributor.batchWithdraw(destinations, routeHashes, rewards);
    for (const outcome of outcomes) {
      if (outcome.ok) {
        this.emitWithdrawn(outcome.result);
      } else {
        this.logger.warn(
          { intentHash: outcome.intentHash, code: outcome.error.code },
          "Batch withdrawal element failed",
        );
      }
    }
    return outcomes;
  }

  refund(destination: ChainId, routeHash: Bytes32, reward: Reward): DistributionResult {
    const result = this.distributor.refund(destination, routeHash, reward);
    this.logger.info({ intentHash: result.intentHash, refundee: result.recipient }, "Intent refunded");
    this.append(result.intentHash, INTENT_EVENTS.REFUNDED, "distribution", result.recipient, {
      intentHash: result.intentHash,
      refundee: result.recipient,
    });
    return result;
  }

  recoverToken(destination: ChainId, routeHash: Bytes32, reward: Reward, token: Address): DistributionResult {
    const result = this.distributor.recoverToken(destination, routeHash, reward, token);
    this.logger.info({ intentHash: result.intentHash, token }, "Stray token recovered");
    this.append(result.intentHash, INTENT_EVENTS.TOKEN_RECOVERED, "distribution", result.recipient, {
      intentHash: result.intentHash,
      refundee: result.recipient,
      token,
    });
    return result;
  }

  // ─── Events ────────────────────────────────────────────────────────

  /**
   * The notification log. With `intentHash`, only that intent's stream;
   * `type` and `maxCount` still apply, position options do not.
   */
  readEvents(options: ReadEventsOptions = {}): readonly StoredEvent[] {
    const { intentHash, ...readOptions } = options;
    if (intentHash === undefined) {
      return this.eventStore.readAll(readOptions);
    }
    const { type, maxCount } = readOptions;
    const events = this.eventStore
      .read(intentStream(intentHash))
      .filter((e) => type === undefined || e.event.type === type);
    return maxCount === undefined ? events : events.slice(0, maxCount);
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private verificationContext(): VerificationContext {
    return {
      now: this.clock(),
      creatorOf: (intentHash) => this.registry.get(intentHash)?.reward.creator,
    };
  }

  /**
   * A claim may only land on a known intent through the prover its
   * reward designates, for the destination it was published with, and
   * while no other terminal state exists.
   */
  private assertApplicable(prover: Address, claim: VerifiedClaim): void {
    const record = this.registry.get(claim.intentHash);
    if (record === undefined) {
      return;
    }
    if (!isAddressEqual(record.reward.prover, prover)) {
      throw new ProofError(
        "UNAUTHORIZED_PROOF_SOURCE",
        `Intent ${claim.intentHash} is governed by ${record.reward.prover}, not ${prover}`,
      );
    }
    if (record.destination !== claim.destination) {
      throw new ProofError(
        "DESTINATION_MISMATCH",
        `Intent ${claim.intentHash} targets chain ${record.destination}, proof is for chain ${claim.destination}`,
      );
    }

    const state = this.claims.getState(claim.intentHash);
    if (state.status === "refunded") {
      throw new ClaimError("ALREADY_REFUNDED", `Intent ${claim.intentHash} was already refunded`);
    }
    if (
      state.status === "claimed" &&
      state.claimant !== undefined &&
      !isAddressEqual(state.claimant, claim.claimant)
    ) {
      throw new ClaimError(
        "ALREADY_CLAIMED",
        `Intent ${claim.intentHash} is already claimed by ${state.claimant}`,
      );
    }
  }

  /**
   * Apply a proof the reward's prover stored before the intent was on
   * record. A proof for another destination does not count.
   */
  /**
   * Drop a proof the prover stored for another destination before the
   * intent was on record.
   */
  private challengeStoredProof(prover: Address, intentHash: Bytes32, destination: ChainId): boolean {
    const dropped = this.provers.challenge(prover, intentHash, destination);
    if (dropped) {
      this.logger.warn({ intentHash, prover, destination: String(destination) }, "Stored proof invalidated");
    }
    return dropped;
  }

  private applyStoredProof(intentHash: Bytes32, destination: ChainId, reward: Reward): void {
    if (this.claims.getStatus(intentHash) !== "initiated") {
      return;
    }
    if (this.challengeStoredProof(reward.prover, intentHash, destination)) {
      return;
    }
    const proven = this.provers.provenIntent(reward.prover, intentHash);
    if (proven === undefined) {
      return;
    }
    this.claims.recordClaim(intentHash, proven.claimant, proven.destination, reward.prover);
    this.emitProven({ intentHash, claimant: proven.claimant, destination }, reward.prover);
  }

  private emitPublished(intentHash: Bytes32, intent: Intent): void {
    const { reward } = intent;
    this.logger.info({ intentHash, destination: String(intent.destination) }, "Intent published");
    this.append(intentHash, INTENT_EVENTS.PUBLISHED, "funding", reward.creator, {
      intentHash,
      destination: intent.destination.toString(),
      creator: reward.creator,
      prover: reward.prover,
      deadline: reward.deadline.toString(),
      nativeAmount: reward.nativeAmount.toString(),
      tokens: reward.tokens.map(({ token, amount }) => ({ token, amount: amount.toString() })),
    });
  }

  private emitFunded(result: FundingResult, funder: Address): void {
    this.logger.info(
      { intentHash: result.intentHash, funder, complete: result.complete },
      "Intent funded",
    );
    this.append(result.intentHash, INTENT_EVENTS.FUNDED, "funding", funder, {
      intentHash: result.intentHash,
      funder,
      complete: result.complete,
    });
  }

  private emitProven(claim: VerifiedClaim, prover: Address): void {
    this.logger.info(
      { intentHash: claim.intentHash, claimant: claim.claimant, prover },
      "Intent proven",
    );
    this.append(claim.intentHash, INTENT_EVENTS.PROVEN, "proof", prover, {
      intentHash: claim.intentHash,
      claimant: claim.claimant,
      destination: claim.destination.toString(),
      prover,
    });
  }

  private emitWithdrawn(result: DistributionResult): void {
    this.logger.info({ intentHash: result.intentHash, claimant: result.recipient }, "Rewards withdrawn");
    this.append(result.intentHash, INTENT_EVENTS.WITHDRAWN, "distribution", result.recipient, {
      intentHash: result.intentHash,
      claimant: result.recipient,
    });
  }

  private append(
    intentHash: Bytes32,
    type: string,
    source: EventSource,
    actor: Address,
    payload: Record<string, unknown>,
  ): void {
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date(Number(this.clock()) * 1000).toISOString(),
        actor,
        correlationId: intentHash,
        source,
      },
      payload,
    };
    this.eventStore.append(intentStream(intentHash), [event]);
  }
}
