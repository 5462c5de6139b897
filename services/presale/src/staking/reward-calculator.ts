/**
 * Reward Calculator
 *
 * Linear proration of a full-term yield of `apy` percent over the fixed
 * staking duration:
 *
 *   reward = floor(amount * apy * dt / (100 * STAKING_DURATION))
 */

import {
  TIMING,
  StakelineError,
  u64,
  presaleLogger as logger,
} from "@stakeline/shared";
import type { Transaction } from "../transaction.js";
import type { StakeAccount } from "../types.js";

const rewardLogger = logger.child({ component: "reward-calculator" });

// ============================================
// PURE CALCULATION
// ============================================

export interface RewardQuote {
  reward: bigint;
  elapsedSeconds: number;
}

/**
 * Reward accrued since the last claim. Fails NoRewardsAvailable when no
 * time has passed.
 */
export function computeReward(
  account: StakeAccount,
  apy: bigint,
  now: number,
  stakingDurationSeconds: number = TIMING.stakingDurationSeconds
): RewardQuote {
  const elapsedSeconds = now - account.lastClaimTime;
  if (elapsedSeconds <= 0) {
    throw new StakelineError("NoRewardsAvailable", undefined, { elapsedSeconds });
  }

  const denominator = u64(100n).mul(BigInt(stakingDurationSeconds)).value();
  const reward = u64(account.amount)
    .mul(apy)
    .mul(BigInt(elapsedSeconds))
    .div(denominator)
    .value();

  return { reward, elapsedSeconds };
}

// ============================================
// REWARD CALCULATOR
// ============================================

export class RewardCalculator {
  /**
   * Read-only quote for the caller
   */
  calculateRewards(tx: Transaction): bigint {
    const global = tx.global();
    const account = this.requireAccount(tx);
    return computeReward(account, global.apy, tx.now).reward;
  }

  async claimRewards(tx: Transaction): Promise<bigint> {
    const global = tx.global();
    const account = this.requireAccount(tx);
    const { reward, elapsedSeconds } = computeReward(account, global.apy, tx.now);

    const rewardPoolHolding = tx.config.addresses.rewardPool;
    const available = await tx.balanceOf({ owner: rewardPoolHolding, asset: tx.config.tokenMint });
    if (available < reward) {
      throw new StakelineError("InsufficientRewards", undefined, {
        reward: reward.toString(),
        available: available.toString(),
      });
    }

    global.rewardPool = u64(global.rewardPool).sub(reward).value();
    tx.transfer(tx.config.tokenMint, rewardPoolHolding, tx.caller, reward);
    account.lastClaimTime = tx.now;

    tx.record({
      type: "rewards:claimed",
      owner: tx.caller,
      reward,
      rewardPool: global.rewardPool,
      at: tx.now,
    });

    rewardLogger.info({
      owner: tx.caller,
      reward: reward.toString(),
      elapsedSeconds,
      rewardPool: global.rewardPool.toString(),
    }, "Rewards claimed");

    return reward;
  }

  private requireAccount(tx: Transaction): StakeAccount {
    const account = tx.findStakeAccount(tx.caller);
    if (!account) {
      throw new StakelineError("NotInitialized", "Stake account not found.", { owner: tx.caller });
    }
    return account;
  }
}

export function createRewardCalculator(): RewardCalculator {
  return new RewardCalculator();
}
