/**
 * Tests for InMemoryAssetLedger.
 *
 * Covers:
 * - Native and token balances
 * - Allowances and transferFrom
 * - Atomic scopes (rollback on throw, nesting)
 * - Journal queries
 * - Snapshot/restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import { NATIVE_ASSET } from "@intentvault/types";
import { InMemoryAssetLedger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const USDC = "0x5fbdb2315678afecb367f032d93f642f64180aa3";
const ALICE = "0x70997970c51812dc3a010c7d01b50e0d17dc79c8";
const BOB = "0x3c44cdddb6a900fa2b585dd299e03d12fa4293bc";
const PORTAL = "0xe7f1725e7734ce288f8367e1bb143e90bb3f0512";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("InMemoryAssetLedger", () => {
  let ledger: InMemoryAssetLedger;

  beforeEach(() => {
    ledger = new InMemoryAssetLedger();
    ledger.mint(USDC, ALICE, 1000n);
    ledger.mint(NATIVE_ASSET, ALICE, 50n);
  });

  describe("balances", () => {
    it("reports zero for unknown accounts", () => {
      expect(ledger.balanceOf(USDC, BOB)).toBe(0n);
    });

    it("keeps native and token balances apart", () => {
      expect(ledger.balanceOf(USDC, ALICE)).toBe(1000n);
      expect(ledger.balanceOf(NATIVE_ASSET, ALICE)).toBe(50n);
    });

    it("treats address case as the same account", () => {
      expect(ledger.balanceOf(USDC, "0x70997970C51812dc3A010C7d01b50e0d17dc79C8")).toBe(1000n);
    });
  });

  describe("transfer", () => {
    it("moves value between accounts", () => {
      ledger.transfer(USDC, ALICE, BOB, 400n);
      expect(ledger.balanceOf(USDC, ALICE)).toBe(600n);
      expect(ledger.balanceOf(USDC, BOB)).toBe(400n);
    });

    it("rejects overdrafts", () => {
      expect(thrown(() => ledger.transfer(NATIVE_ASSET, ALICE, BOB, 51n))).toMatchObject({
        code: "INSUFFICIENT_FUNDS",
      });
      expect(ledger.balanceOf(NATIVE_ASSET, ALICE)).toBe(50n);
    });

    it("rejects negative amounts", () => {
      expect(() => ledger.transfer(USDC, ALICE, BOB, -1n)).toThrow(LedgerError);
    });

    it("allows zero transfers from empty accounts", () => {
      expect(() => ledger.transfer(USDC, BOB, ALICE, 0n)).not.toThrow();
    });
  });

  describe("allowances", () => {
    it("transferFrom consumes the allowance", () => {
      ledger.approve(USDC, ALICE, PORTAL, 300n);
      ledger.transferFrom(USDC, PORTAL, ALICE, BOB, 200n);
      expect(ledger.allowance(USDC, ALICE, PORTAL)).toBe(100n);
      expect(ledger.balanceOf(USDC, BOB)).toBe(200n);
    });

    it("rejects spending beyond the allowance", () => {
      ledger.approve(USDC, ALICE, PORTAL, 10n);
      expect(thrown(() => ledger.transferFrom(USDC, PORTAL, ALICE, BOB, 11n))).toMatchObject({
        code: "INSUFFICIENT_ALLOWANCE",
      });
    });

    it("leaves the allowance intact when the balance is short", () => {
      ledger.approve(USDC, ALICE, PORTAL, 5000n);
      expect(() => ledger.transferFrom(USDC, PORTAL, ALICE, BOB, 2000n)).toThrow(/holds 1000/);
      expect(ledger.allowance(USDC, ALICE, PORTAL)).toBe(5000n);
    });
  });

  describe("atomic", () => {
    it("undoes every write when the scope throws", () => {
      expect(() =>
        ledger.atomic(() => {
          ledger.transfer(USDC, ALICE, BOB, 100n);
          ledger.approve(USDC, ALICE, PORTAL, 1n);
          throw new Error("abort");
        }),
      ).toThrow("abort");

      expect(ledger.balanceOf(USDC, BOB)).toBe(0n);
      expect(ledger.allowance(USDC, ALICE, PORTAL)).toBe(0n);
      expect(ledger.getTransfers()).toHaveLength(2);
    });

    it("returns the result of the scope", () => {
      const result = ledger.atomic(() => {
        ledger.transfer(USDC, ALICE, BOB, 1n);
        return "done";
      });
      expect(result).toBe("done");
      expect(ledger.balanceOf(USDC, BOB)).toBe(1n);
    });

    it("folds nested scopes into the outer one", () => {
      expect(() =>
        ledger.atomic(() => {
          ledger.atomic(() => ledger.transfer(USDC, ALICE, BOB, 5n));
          throw new Error("outer");
        }),
      ).toThrow("outer");
      expect(ledger.balanceOf(USDC, BOB)).toBe(0n);
    });
  });

  describe("journal", () => {
    it("filters by asset and account", () => {
      ledger.transfer(USDC, ALICE, BOB, 1n, "pay");
      expect(ledger.getTransfers({ account: BOB })).toEqual([
        { sequence: 3, asset: USDC, from: ALICE, to: BOB, amount: 1n, memo: "pay" },
      ]);
      expect(ledger.getTransfers({ asset: NATIVE_ASSET })).toHaveLength(1);
    });
  });

  describe("snapshot", () => {
    it("restores balances, allowances and journal", () => {
      ledger.approve(USDC, ALICE, PORTAL, 7n);
      const restored = InMemoryAssetLedger.fromSnapshot(ledger.snapshot());
      expect(restored.balanceOf(USDC, ALICE)).toBe(1000n);
      expect(restored.allowance(USDC, ALICE, PORTAL)).toBe(7n);
      expect(restored.getTransfers()).toHaveLength(2);
    });
  });
});
