import { getAddress } from "viem";

export const SETTLEMENT_CHAIN = 1n;
export const DESTINATION = 10n;
export const NOW = 1_700_000_000n;

export const INBOX = getAddress("0xe7f1725e7734ce288f8367e1bb143e90bb3f0512");
export const ORACLE = getAddress("0xdead00000000000000000000000000000000beef");
export const FACTORY = getAddress("0xfac7000000000000000000000000000000000001");
export const GAME = getAddress("0x9a3e000000000000000000000000000000000002");
export const ROLLUP = getAddress("0x4011000000000000000000000000000000000003");
export const MAILBOX = getAddress("0xa11b0c0000000000000000000000000000000004");

export const CREATOR = getAddress("0x70997970c51812dc3a010c7d01b50e0d17dc79c8");
export const SOLVER = getAddress("0x90f79bf6eb2c4f870365e785982e1f101e93b906");
export const OTHER_SOLVER = getAddress("0x15d34aaf54267db7d7c367839aaf71a00a2c6a65");
export const ATTESTER = getAddress("0x3c44cdddb6a900fa2b585dd299e03d12fa4293bc");

export const HASH_A = `0x${"a1".repeat(32)}` as const;
export const HASH_B = `0x${"b2".repeat(32)}` as const;
export const HASH_C = `0x${"c3".repeat(32)}` as const;

export const FULFILLED_SLOT = 0n;

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
