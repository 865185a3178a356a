/**
 * Intent Registry — What each vault escrows.
 *
 * An intent becomes durable when it is published or first funded.
 * Records are keyed by intent hash; the vault address is derived from
 * that hash and the fixed template, never looked up.
 */

import type { Address, Bytes32, ChainId, Intent, Reward } from "@intentvault/types";
import {
  assertVaultTemplate,
  computeIntentHash,
  deriveVaultAddress,
  hashIntent,
  hashReward,
} from "@intentvault/encoding";
import type { VaultTemplate } from "@intentvault/encoding";
import type { IntentRecord, IntentRegistrySnapshot, RecordOptions } from "./types.js";

// =============================================================================
// Error
// =============================================================================

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}

export type VaultErrorCode = "DUPLICATE_INTENT" | "VAULT_NOT_FOUND";

// =============================================================================
// Registry
// =============================================================================

export class IntentRegistry {
  readonly template: VaultTemplate;
  private readonly records: Map<string, IntentRecord> = new Map();
  private readonly clock: () => Date;

  constructor(template: VaultTemplate, options: RecordOptions = {}) {
    assertVaultTemplate(template);
    this.template = template;
    this.clock = options.clock ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Derivation
  // ───────────────────────────────────────────────────────────────────────

  vaultOf(intentHash: Bytes32): Address {
    return deriveVaultAddress(intentHash, this.template);
  }

  /**
   * Resolve the intent hash for the (destination, routeHash, reward)
   * triple that funding and distribution calls carry.
   */
  locate(destination: ChainId, routeHash: Bytes32, reward: Reward): { intentHash: Bytes32; vault: Address } {
    const intentHash = computeIntentHash(destination, routeHash, hashReward(reward));
    return { intentHash, vault: this.vaultOf(intentHash) };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Recording
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Publish the full intent.
   *
   * @throws {VaultError} DUPLICATE_INTENT if it was already published
   */
  publish(intent: Intent): IntentRecord {
    const { intentHash, routeHash } = hashIntent(intent);
    const existing = this.get(intentHash);
    if (existing?.published === true) {
      throw new VaultError("DUPLICATE_INTENT", `Intent ${intentHash} already exists`);
    }

    const record: IntentRecord = {
      intentHash,
      destination: intent.destination,
      routeHash,
      reward: intent.reward,
      route: intent.route,
      vault: this.vaultOf(intentHash),
      published: true,
      funded: existing?.funded ?? false,
      recordedAt: existing?.recordedAt ?? this.clock().toISOString(),
    };
    this.records.set(intentHash.toLowerCase(), record);
    return record;
  }

  /**
   * Remember the reward behind a funded vault and mark it funded.
   * Idempotent once funded.
   */
  recordFunding(destination: ChainId, routeHash: Bytes32, reward: Reward): IntentRecord {
    const { intentHash, vault } = this.locate(destination, routeHash, reward);
    const existing = this.get(intentHash);
    if (existing?.funded === true) return existing;

    const record: IntentRecord = existing !== undefined
      ? { ...existing, funded: true }
      : {
          intentHash,
          destination,
          routeHash,
          reward,
          vault,
          published: false,
          funded: true,
          recordedAt: this.clock().toISOString(),
        };
    this.records.set(intentHash.toLowerCase(), record);
    return record;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  has(intentHash: Bytes32): boolean {
    return this.records.has(intentHash.toLowerCase());
  }

  get(intentHash: Bytes32): IntentRecord | undefined {
    return this.records.get(intentHash.toLowerCase());
  }

  /**
   * @throws {VaultError} VAULT_NOT_FOUND when nothing was published or funded
   */
  require(intentHash: Bytes32): IntentRecord {
    const record = this.get(intentHash);
    if (record === undefined) {
      throw new VaultError("VAULT_NOT_FOUND", `No vault exists for intent ${intentHash}`);
    }
    return record;
  }

  list(): readonly IntentRecord[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): IntentRegistrySnapshot {
    return { version: 1, records: this.list() };
  }

  static fromSnapshot(
    template: VaultTemplate,
    snapshot: IntentRegistrySnapshot,
    options: RecordOptions = {},
  ): IntentRegistry {
    const registry = new IntentRegistry(template, options);
    for (const record of snapshot.records) {
      registry.records.set(record.intentHash.toLowerCase(), record);
    }
    return registry;
  }
}
