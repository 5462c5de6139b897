/**
 * Staking Engine
 *
 * Creates and tops up per-depositor stake records. Staking is open only
 * while the presale is active and the reward pool is funded.
 */

import {
  STAKE_START_POLICIES,
  StakelineError,
  u64,
  presaleLogger as logger,
  type StakeStartPolicy,
} from "@stakeline/shared";
import type { Transaction } from "../transaction.js";
import type { StakeAccount } from "../types.js";

const stakingLogger = logger.child({ component: "staking-engine" });

// ============================================
// START TIME POLICY
// ============================================

/**
 * New vesting start for an account receiving `amount` more at `now`.
 *
 * - reset: every stake restarts the full-term clock
 * - weighted: amount-weighted average of the old start and `now`
 */
export function nextStartTime(
  policy: StakeStartPolicy,
  account: StakeAccount,
  amount: bigint,
  now: number
): number {
  if (policy === STAKE_START_POLICIES.RESET || account.amount === 0n) {
    return now;
  }

  const incoming = u64(amount).mul(BigInt(now)).value();
  const combined = u64(account.amount).add(amount).value();
  const start = u64(account.amount)
    .mul(BigInt(account.startTime))
    .add(incoming)
    .div(combined)
    .value();
  return Number(start);
}

// ============================================
// STAKING ENGINE
// ============================================

export class StakingEngine {
  private readonly startPolicy: StakeStartPolicy;

  constructor(startPolicy: StakeStartPolicy = STAKE_START_POLICIES.RESET) {
    this.startPolicy = startPolicy;

    stakingLogger.info({ startPolicy }, "StakingEngine initialized");
  }

  stake(tx: Transaction, amount: bigint): StakeAccount {
    const presale = tx.presale();
    const global = tx.global();

    if (!presale.isActive) {
      throw new StakelineError("StakingClosed");
    }
    if (global.rewardPool === 0n) {
      throw new StakelineError("StakingRewardsExhausted");
    }
    if (amount === 0n) {
      throw new StakelineError("InvalidAmount", "Stake amount must be greater than zero.");
    }

    const account = tx.stakeAccount(tx.caller);
    const topUp = account.amount > 0n;
    const startTime = nextStartTime(this.startPolicy, account, amount, tx.now);

    account.amount = u64(account.amount).add(amount).value();
    global.totalStaked = u64(global.totalStaked).add(amount).value();
    account.startTime = startTime;
    account.lastClaimTime = tx.now;

    tx.transfer(tx.config.tokenMint, tx.caller, tx.config.addresses.stakingPool, amount);

    tx.record({
      type: topUp ? "stake:topped-up" : "stake:created",
      owner: tx.caller,
      amount,
      totalStake: account.amount,
      startTime,
    });

    stakingLogger.info({
      owner: tx.caller,
      amount: amount.toString(),
      totalStake: account.amount.toString(),
      totalStaked: global.totalStaked.toString(),
      startTime,
    }, "Tokens staked");

    return account;
  }
}

export function createStakingEngine(startPolicy?: StakeStartPolicy): StakingEngine {
  return new StakingEngine(startPolicy);
}
