/**
 * Reward asset bookkeeping shared by funding and distribution.
 */

import { NATIVE_ASSET } from "@intentvault/types";
import type { Address, Reward, TokenAmount } from "@intentvault/types";
import type { AssetLedger } from "@intentvault/ledger";

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * What a vault must hold for `reward`, native first, one entry per
 * distinct token. A token listed twice must be held twice over.
 */
export function requiredAssets(reward: Reward): TokenAmount[] {
  const required: TokenAmount[] = [{ token: NATIVE_ASSET, amount: reward.nativeAmount }];
  for (const { token, amount } of reward.tokens) {
    const index = required.findIndex((r) => sameAddress(r.token, token));
    const existing = required[index];
    if (existing !== undefined) {
      required[index] = { token: existing.token, amount: existing.amount + amount };
    } else {
      required.push({ token, amount });
    }
  }
  return required;
}

/**
 * Whether `token` is the native sentinel or one of the reward's tokens.
 */
export function isRewardAsset(reward: Reward, token: Address): boolean {
  return sameAddress(token, NATIVE_ASSET) || reward.tokens.some((t) => sameAddress(t.token, token));
}

export function holdsReward(ledger: AssetLedger, vault: Address, reward: Reward): boolean {
  return requiredAssets(reward).every(({ token, amount }) => ledger.balanceOf(token, vault) >= amount);
}

/**
 * Move the vault's entire balance of the native currency and of every
 * reward token to `recipient`. Empty balances are skipped.
 */
export function drainVault(
  ledger: AssetLedger,
  vault: Address,
  reward: Reward,
  recipient: Address,
  memo: string,
): TokenAmount[] {
  const moved: TokenAmount[] = [];
  for (const { token } of requiredAssets(reward)) {
    const balance = ledger.balanceOf(token, vault);
    if (balance === 0n) continue;
    ledger.transfer(token, vault, recipient, balance, memo);
    moved.push({ token, amount: balance });
  }
  return moved;
}
