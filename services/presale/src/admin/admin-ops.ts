/**
 * Admin Operations
 *
 * Privileged mutations, each gated by the authorization policy:
 * - forced burns
 * - reward pool refill
 * - governance rate updates (no bounds)
 * - treasury withdrawal during the presale
 * - stage table maintenance
 */

import {
  NATIVE_CURRENCY,
  StakelineError,
  ensure,
  u64,
  presaleLogger as logger,
  type HoldingRef,
  type ParameterUpdate,
  type StageUpdate,
} from "@stakeline/shared";
import type { Transaction } from "../transaction.js";
import type { GlobalState, PresaleStage } from "../types.js";
import { PresaleStageTable } from "./stage-table.js";

const adminLogger = logger.child({ component: "admin-ops" });

// ============================================
// ADMIN OPS
// ============================================

export class AdminOps {
  burnTokens(tx: Transaction, holding: HoldingRef, amount: bigint): void {
    tx.authorize("burnTokens");

    tx.burn(holding.asset, holding.owner, amount);

    tx.record({ type: "admin:burned", owner: holding.owner, asset: holding.asset, amount, at: tx.now });
    tx.audit("burn_tokens", "holding", {
      owner: holding.owner,
      asset: holding.asset,
      amount: amount.toString(),
    });
  }

  refillRewardPool(tx: Transaction, amount: bigint): GlobalState {
    tx.authorize("refillRewardPool");
    const global = tx.global();

    tx.transfer(tx.config.tokenMint, tx.caller, tx.config.addresses.rewardPool, amount);
    global.rewardPool = u64(global.rewardPool).add(amount).value();

    tx.record({
      type: "admin:reward-pool-refilled",
      amount,
      rewardPool: global.rewardPool,
      at: tx.now,
    });
    tx.audit("refill_reward_pool", "global_state", {
      amount: amount.toString(),
      rewardPool: global.rewardPool.toString(),
    });

    return global;
  }

  updateParameters(tx: Transaction, update: ParameterUpdate): GlobalState {
    tx.authorize("updateParameters");
    const global = tx.global();

    const previous = { apy: global.apy, feePercent: global.feePercent };
    global.apy = update.apy;
    global.feePercent = update.feePercent;

    tx.record({
      type: "admin:parameters-updated",
      apy: update.apy,
      feePercent: update.feePercent,
      at: tx.now,
    });
    tx.audit("update_parameters", "global_state", {
      previousApy: previous.apy.toString(),
      previousFeePercent: previous.feePercent.toString(),
      apy: update.apy.toString(),
      feePercent: update.feePercent.toString(),
    });

    adminLogger.info({
      apy: update.apy.toString(),
      feePercent: update.feePercent.toString(),
    }, "Governance parameters updated");

    return global;
  }

  withdrawFunds(tx: Transaction, amount: bigint): void {
    tx.authorize("withdrawFunds");
    ensure(tx.presale().isActive, "WithdrawalNotAllowedAfterPresale");

    tx.transfer(NATIVE_CURRENCY, tx.config.addresses.treasury, tx.caller, amount);

    tx.record({ type: "admin:funds-withdrawn", amount, to: tx.caller, at: tx.now });
    tx.audit("withdraw_funds", "treasury", { amount: amount.toString() });
  }

  initializeStageTable(tx: Transaction): PresaleStage[] {
    if (tx.state.stages) {
      throw new StakelineError("AlreadyInitialized", "Presale stage table has already been initialized.");
    }

    const stages = PresaleStageTable.initial();
    tx.state.stages = stages;

    tx.record({ type: "stages:initialized", stageCount: stages.length, at: tx.now });
    adminLogger.info({ stageCount: stages.length }, "Presale stage table initialized");

    return stages;
  }

  updatePresaleStage(tx: Transaction, update: StageUpdate): PresaleStage {
    tx.authorize("updatePresaleStage");

    const table = new PresaleStageTable(tx.stages());
    const entry = table.update(update.index, update);

    tx.record({ type: "admin:stage-updated", index: update.index, price: entry.price, at: tx.now });
    tx.audit("update_presale_stage", "presale_stage", {
      index: update.index,
      price: entry.price.toString(),
      tokensSold: entry.tokensSold.toString(),
      totalRaised: entry.totalRaised.toString(),
    });

    return entry;
  }
}

export function createAdminOps(): AdminOps {
  return new AdminOps();
}
