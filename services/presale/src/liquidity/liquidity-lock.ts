/**
 * Liquidity Lock
 *
 * Moves the whole liquidity holding into the vault while the lock window
 * (presale end + 365 days) is still open.
 *
 * The action is refused once its own deadline has passed, so liquidity can
 * never be marked locked after the window. That ordering is kept as is.
 */

import { StakelineError, presaleLogger as logger } from "@stakeline/shared";
import type { Transaction } from "../transaction.js";

const lockLogger = logger.child({ component: "liquidity-lock" });

// ============================================
// LIQUIDITY LOCK
// ============================================

export class LiquidityLock {
  async lockLiquidity(tx: Transaction): Promise<bigint> {
    const presale = tx.presale();
    const lockEnd = presale.liquidityLockEndTime;

    if (lockEnd === undefined || tx.now >= lockEnd) {
      throw new StakelineError("LiquidityLockError", undefined, {
        liquidityLockEndTime: lockEnd,
        now: tx.now,
      });
    }

    const { liquidityHolding, liquidityVault } = tx.config.addresses;
    const amount = await tx.balanceOf({ owner: liquidityHolding, asset: tx.config.liquidityAsset });
    if (amount === 0n) {
      throw new StakelineError("InvalidAmount", "Liquidity holding is empty.");
    }

    tx.transfer(tx.config.liquidityAsset, liquidityHolding, liquidityVault, amount);
    presale.liquidityLocked = true;

    tx.record({ type: "liquidity:locked", amount, lockEndTime: lockEnd, at: tx.now });

    lockLogger.info({
      amount: amount.toString(),
      lockEndTime: new Date(lockEnd * 1000).toISOString(),
    }, "Liquidity locked in vault");

    return amount;
  }
}

export function createLiquidityLock(): LiquidityLock {
  return new LiquidityLock();
}
