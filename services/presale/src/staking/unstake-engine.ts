/**
 * Unstake Engine
 *
 * Full-term withdrawals return the whole stake. Early withdrawals (allowed
 * only once the post-launch lock has passed) return the stake minus a
 * penalty, and the penalty is burned from the staking pool.
 */

import {
  FEES,
  TIMING,
  StakelineError,
  u64,
  presaleLogger as logger,
} from "@stakeline/shared";
import type { Transaction } from "../transaction.js";
import type { UnstakeResult } from "../types.js";

const unstakeLogger = logger.child({ component: "unstake-engine" });

// ============================================
// PENALTY
// ============================================

export interface PenaltySplit {
  payout: bigint;
  penalty: bigint;
}

export function splitEarlyUnstake(
  amount: bigint,
  penaltyPercent: bigint = FEES.earlyUnstakePenaltyPercent
): PenaltySplit {
  const penalty = u64(amount).mul(penaltyPercent).div(100n).value();
  const payout = u64(amount).sub(penalty).value();
  return { payout, penalty };
}

// ============================================
// UNSTAKE ENGINE
// ============================================

export class UnstakeEngine {
  unstake(tx: Transaction): UnstakeResult {
    const presale = tx.presale();
    const global = tx.global();

    if (presale.launchTime !== undefined) {
      const unlockAt = presale.launchTime + TIMING.earlyUnstakeLockSeconds;
      if (tx.now < unlockAt) {
        throw new StakelineError("EarlyUnstakeLocked", undefined, { unlockAt });
      }
    }

    const account = tx.findStakeAccount(tx.caller);
    if (!account || account.amount === 0n) {
      throw new StakelineError("InvalidAmount", "Nothing staked.");
    }

    const staked = account.amount;
    const elapsed = tx.now - account.startTime;
    const fullTerm = elapsed >= TIMING.stakingDurationSeconds;
    const { payout, penalty } = fullTerm
      ? { payout: staked, penalty: 0n }
      : splitEarlyUnstake(staked);

    // The whole stake leaves the aggregate even when only the net is paid
    global.totalStaked = u64(global.totalStaked).sub(staked).value();
    account.amount = 0n;

    const { stakingPool } = tx.config.addresses;
    tx.transfer(tx.config.tokenMint, stakingPool, tx.caller, payout);
    if (penalty > 0n) {
      tx.burn(tx.config.tokenMint, stakingPool, penalty);
    }

    tx.record({
      type: "stake:withdrawn",
      owner: tx.caller,
      payout,
      penalty,
      fullTerm,
      at: tx.now,
    });

    unstakeLogger.info({
      owner: tx.caller,
      staked: staked.toString(),
      payout: payout.toString(),
      penalty: penalty.toString(),
      elapsed,
      fullTerm,
    }, fullTerm ? "Full-term unstake" : "Early unstake with penalty burn");

    return { staked, payout, penalty, fullTerm };
  }
}

export function createUnstakeEngine(): UnstakeEngine {
  return new UnstakeEngine();
}
