/**
 * Shared intent fixtures for encoding tests.
 */

import type { Address, Intent, Reward, Route } from "@intentvault/types";

export const T0 = 1_700_000_000n;
export const USDC: Address = "0x5fbdb2315678afecb367f032d93f642f64180aa3";
export const CREATOR: Address = "0x70997970c51812dc3a010c7d01b50e0d17dc79c8";
export const PROVER = "0x3c44cdddb6a900fa2b585dd299e03d12fa4293bc";
export const PORTAL = "0xe7f1725e7734ce288f8367e1bb143e90bb3f0512";

export function makeRoute(overrides: Partial<Route> = {}): Route {
  return {
    salt: `0x${"01".repeat(32)}`,
    deadline: T0 + 3600n,
    portal: PORTAL,
    nativeAmount: 0n,
    tokens: [{ token: USDC, amount: 1000n }],
    calls: [
      { target: USDC, data: "0xa9059cbb", value: 0n },
      { target: CREATOR, data: "0x", value: 5n },
    ],
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
  return {
    destination: 10n,
    route: makeRoute(),
    reward: makeReward(),
    ...overrides,
  };
}

/** Run `fn` and return what it threw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
