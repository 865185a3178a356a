/**
 * Tests for RewardDistributor.
 *
 * Verifies:
 * - Withdrawal requires a claim and drains the vault exactly once
 * - Refund requires the deadline and no claim, exactly once
 * - Batch withdrawal reports per element and never rolls back siblings
 * - Token recovery never touches reward assets
 * - Proofs held elsewhere are applied before state is read
 */

import { describe, it, expect, beforeEach } from "vitest";
import { intentVaultAddress } from "@intentvault/encoding";
import type { InMemoryAssetLedger } from "@intentvault/ledger";
import type { ClaimStateMachine, IntentRegistry } from "@intentvault/vault";
import { ClaimError } from "@intentvault/vault";
import type { Intent } from "@intentvault/types";
import { FundingManager } from "../src/funding.js";
import { RewardDistributor, DistributionError } from "../src/distribution.js";
import {
  CREATOR,
  DAI,
  NATIVE,
  PORTAL,
  PROVER,
  SOLVER,
  T0,
  TEMPLATE,
  USDC,
  createWorld,
  fundCreator,
  hashes,
  makeIntent,
  makeRoute,
  thrown,
} from "./fixtures.js";

describe("RewardDistributor", () => {
  let ledger: InMemoryAssetLedger;
  let registry: IntentRegistry;
  let claims: ClaimStateMachine;
  let funding: FundingManager;
  let distributor: RewardDistributor;
  let now: bigint;

  const intent = makeIntent();
  const { intentHash, routeHash } = hashes(intent);
  const vault = intentVaultAddress(intent, TEMPLATE);
  const deadline = intent.reward.deadline;

  function fund(target: Intent): void {
    fundCreator(ledger);
    funding.fundFor(target.destination, hashes(target).routeHash, target.reward, CREATOR);
  }

  beforeEach(() => {
    ({ ledger, registry, claims } = createWorld());
    now = T0;
    funding = new FundingManager({ ledger, registry, claims, spender: PORTAL });
    distributor = new RewardDistributor({ ledger, registry, claims, clock: () => now });
    fund(intent);
  });

  // ─── withdrawRewards ─────────────────────────────────────────────────

  describe("withdrawRewards", () => {
    it("refuses an unclaimed intent", () => {
      const err = thrown(() => distributor.withdrawRewards(10n, routeHash, intent.reward));
      expect(err).toBeInstanceOf(ClaimError);
      expect(err).toMatchObject({ code: "NOT_CLAIMED" });
      expect(ledger.balanceOf(USDC, vault)).toBe(1001n);
    });

    it("pays the claimant and drains the vault to zero", () => {
      claims.recordClaim(intentHash, SOLVER, 10n, PROVER);

      const result = distributor.withdrawRewards(10n, routeHash, intent.reward);

      expect(result).toEqual({
        intentHash,
        vault,
        recipient: SOLVER,
        transferred: [
          { token: NATIVE, amount: 1n },
          { token: USDC, amount: 1001n },
        ],
      });
      expect(ledger.balanceOf(USDC, SOLVER)).toBe(1001n);
      expect(ledger.balanceOf(NATIVE, SOLVER)).toBe(1n);
      expect(ledger.balanceOf(USDC, vault)).toBe(0n);
      expect(funding.isIntentFunded(intent)).toBe(false);
      expect(claims.getState(intentHash).withdrawn).toBe(true);
    });

    it("pays out at most once", () => {
      claims.recordClaim(intentHash, SOLVER, 10n, PROVER);
      distributor.withdrawRewards(10n, routeHash, intent.reward);
      expect(thrown(() => distributor.withdrawRewards(10n, routeHash, intent.reward))).toMatchObject({
        code: "ALREADY_WITHDRAWN",
      });
    });

    it("pays out a claim after the reward deadline", () => {
      claims.recordClaim(intentHash, SOLVER, 10n, PROVER);
      now = deadline + 1000n;
      expect(distributor.withdrawRewards(10n, routeHash, intent.reward).recipient).toBe(SOLVER);
    });

    it("asks the resolver for a pending proof first", () => {
      const resolved: string[] = [];
      distributor = new RewardDistributor({
        ledger,
        registry,
        claims,
        clock: () => now,
        resolver: {
          resolve: (hash, destination, reward) => {
            resolved.push(hash);
            claims.recordClaim(hash, SOLVER, destination, reward.prover);
          },
        },
      });

      expect(distributor.withdrawRewards(10n, routeHash, intent.reward).recipient).toBe(SOLVER);
      expect(resolved).toEqual([intentHash]);
    });
  });

  // ─── refund ──────────────────────────────────────────────────────────

  describe("refund", () => {
    it("refuses before the reward deadline", () => {
      now = deadline - 1n;
      const err = thrown(() => distributor.refund(10n, routeHash, intent.reward));
      expect(err).toBeInstanceOf(DistributionError);
      expect(err).toMatchObject({ code: "NOT_YET_EXPIRED" });
    });

    it("returns the reward to the creator at the deadline", () => {
      now = deadline;
      const result = distributor.refund(10n, routeHash, intent.reward);
      expect(result.recipient).toBe(CREATOR);
      expect(ledger.balanceOf(USDC, CREATOR)).toBe(1001n);
      expect(ledger.balanceOf(NATIVE, CREATOR)).toBe(1n);
      expect(ledger.balanceOf(USDC, vault)).toBe(0n);
      expect(claims.getStatus(intentHash)).toBe("refunded");
    });

    it("refunds exactly once", () => {
      now = deadline;
      distributor.refund(10n, routeHash, intent.reward);
      expect(thrown(() => distributor.refund(10n, routeHash, intent.reward))).toMatchObject({
        code: "ALREADY_REFUNDED",
      });
    });

    it("refuses a claimed intent, even after the deadline", () => {
      claims.recordClaim(intentHash, SOLVER, 10n, PROVER);
      now = deadline + 1n;
      expect(thrown(() => distributor.refund(10n, routeHash, intent.reward))).toMatchObject({
        code: "ALREADY_CLAIMED",
      });
      expect(ledger.balanceOf(USDC, vault)).toBe(1001n);
    });

    it("blocks a later claim", () => {
      now = deadline;
      distributor.refund(10n, routeHash, intent.reward);
      expect(() => claims.recordClaim(intentHash, SOLVER, 10n, PROVER)).toThrow(/already refunded/);
    });
  });

  // ─── batchWithdraw ───────────────────────────────────────────────────

  describe("batchWithdraw", () => {
    const second = makeIntent({ route: makeRoute({ salt: `0x${"02".repeat(32)}` }) });
    const secondHashes = hashes(second);

    it("reports a refunded element and still pays a claimed one", () => {
      fund(second);
      now = deadline;
      distributor.refund(10n, routeHash, intent.reward);
      claims.recordClaim(secondHashes.intentHash, SOLVER, 10n, PROVER);

      const outcomes = distributor.batchWithdraw(
        [10n, 10n],
        [routeHash, secondHashes.routeHash],
        [intent.reward, second.reward],
      );

      expect(outcomes).toHaveLength(2);
      expect(outcomes[0]).toEqual({
        intentHash,
        ok: false,
        error: { code: "NOT_CLAIMED", message: `Intent ${intentHash} is refunded, not claimed` },
      });
      expect(outcomes[1]?.ok).toBe(true);
      expect(outcomes[1]?.intentHash).toBe(secondHashes.intentHash);
      expect(ledger.balanceOf(USDC, SOLVER)).toBe(1001n);
    });

    it("keeps earlier successes when a later element fails", () => {
      claims.recordClaim(intentHash, SOLVER, 10n, PROVER);
      const outcomes = distributor.batchWithdraw(
        [10n, 10n],
        [routeHash, secondHashes.routeHash],
        [intent.reward, second.reward],
      );
      expect(outcomes.map((o) => o.ok)).toEqual([true, false]);
      expect(claims.getState(intentHash).withdrawn).toBe(true);
    });

    it("rejects mismatched arrays before moving anything", () => {
      claims.recordClaim(intentHash, SOLVER, 10n, PROVER);
      const err = thrown(() => distributor.batchWithdraw([10n], [routeHash, routeHash], [intent.reward]));
      expect(err).toMatchObject({ code: "ARRAY_LENGTH_MISMATCH" });
      expect(ledger.balanceOf(USDC, vault)).toBe(1001n);
    });

    it("accepts an empty batch", () => {
      expect(distributor.batchWithdraw([], [], [])).toEqual([]);
    });
  });

  // ─── recoverToken ────────────────────────────────────────────────────

  describe("recoverToken", () => {
    it("sweeps a stray token to the creator", () => {
      ledger.mint(DAI, vault, 50n);
      const result = distributor.recoverToken(10n, routeHash, intent.reward, DAI);
      expect(result.transferred).toEqual([{ token: DAI, amount: 50n }]);
      expect(ledger.balanceOf(DAI, CREATOR)).toBe(50n);
      expect(ledger.balanceOf(USDC, vault)).toBe(1001n);
    });

    it("never releases a reward token", () => {
      expect(thrown(() => distributor.recoverToken(10n, routeHash, intent.reward, USDC))).toMatchObject({
        code: "TOKEN_NOT_RECOVERABLE",
      });
    });

    it("never releases the native currency", () => {
      expect(thrown(() => distributor.recoverToken(10n, routeHash, intent.reward, NATIVE))).toMatchObject({
        code: "TOKEN_NOT_RECOVERABLE",
      });
    });

    it("refuses a token the vault does not hold", () => {
      expect(() => distributor.recoverToken(10n, routeHash, intent.reward, DAI)).toThrow(/holds no/);
    });

    it("refuses an unknown vault", () => {
      const unknown = makeIntent({ destination: 42n });
      expect(
        thrown(() => distributor.recoverToken(42n, hashes(unknown).routeHash, unknown.reward, DAI)),
      ).toMatchObject({ code: "VAULT_NOT_FOUND" });
    });
  });
});
