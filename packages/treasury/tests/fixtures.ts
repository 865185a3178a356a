import type { Address, Intent, Reward, Route } from "@intentvault/types";
import { hashIntent } from "@intentvault/encoding";
import type { VaultTemplate } from "@intentvault/encoding";
import { InMemoryAssetLedger } from "@intentvault/ledger";
import { ClaimStateMachine, IntentRegistry } from "@intentvault/vault";

export const T0 = 1_700_000_000n;
export const USDC = "0x5fbdb2315678afecb367f032d93f642f64180aa3";
export const DAI = "0x6b175474e89094c44da98b954eedeac495271d0f";
export const CREATOR = "0x70997970c51812dc3a010c7d01b50e0d17dc79c8";
export const PROVER = "0x3c44cdddb6a900fa2b585dd299e03d12fa4293bc";
export const PORTAL = "0xe7f1725e7734ce288f8367e1bb143e90bb3f0512";
export const SOLVER = "0x90f79bf6eb2c4f870365e785982e1f101e93b906";
export const PERMIT = "0x000000000022d473030f116ddee9f6b43ac78ba3";
export const NATIVE: Address = "0x0000000000000000000000000000000000000000";

export const TEMPLATE: VaultTemplate = {
  deployer: PORTAL,
  initCodeHash: `0x${"cd".repeat(32)}`,
};

export function makeRoute(overrides: Partial<Route> = {}): Route {
  return {
    salt: `0x${"01".repeat(32)}`,
    deadline: T0 + 3600n,
    portal: PORTAL,
    nativeAmount: 0n,
    tokens: [{ token: USDC, amount: 1000n }],
    calls: [{ target: USDC, data: "0xa9059cbb", value: 0n }],
    ...overrides,
  };
}

export function makeReward(overrides: Partial<Reward> = {}): Reward {
  return {
    deadline: T0 + 3600n,
    creator: CREATOR,
    prover: PROVER,
    nativeAmount: 1n,
    tokens: [{ token: USDC, amount: 1001n }],
    ...overrides,
  };
}

export function makeIntent(overrides: Partial<Intent> = {}): Intent {
  return { destination: 10n, route: makeRoute(), reward: makeReward(), ...overrides };
}

export function createWorld() {
  const ledger = new InMemoryAssetLedger();
  const registry = new IntentRegistry(TEMPLATE);
  const claims = new ClaimStateMachine();
  return { ledger, registry, claims };
}

/** Give the creator exactly the reward and approve the portal for it */
export function fundCreator(ledger: InMemoryAssetLedger, usdc: bigint = 1001n, native: bigint = 1n): void {
  ledger.mint(NATIVE, CREATOR, native);
  ledger.mint(USDC, CREATOR, usdc);
  ledger.approve(USDC, CREATOR, PORTAL, usdc);
}

export function hashes(intent: Intent) {
  return hashIntent(intent);
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
