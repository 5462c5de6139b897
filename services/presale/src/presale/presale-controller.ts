/**
 * Presale Controller
 *
 * Owns the presale lifecycle:
 * - initialization (once)
 * - the single irreversible active -> ended transition
 * - launch and liquidity-lock timestamps
 */

import { TIMING, StakelineError, presaleLogger as logger } from "@stakeline/shared";
import type { Transaction } from "../transaction.js";
import type { GlobalState, PresaleState } from "../types.js";

const controllerLogger = logger.child({ component: "presale-controller" });

// ============================================
// PRESALE CONTROLLER
// ============================================

export class PresaleController {
  initializePresale(tx: Transaction): PresaleState {
    if (tx.state.presale) {
      throw new StakelineError("AlreadyInitialized", "Presale has already been initialized.");
    }

    const presale: PresaleState = {
      isActive: true,
      endTime: undefined,
      launchTime: undefined,
      admin: tx.config.addresses.admin,
      liquidityLocked: false,
      liquidityLockEndTime: undefined,
    };
    tx.state.presale = presale;

    tx.record({ type: "presale:initialized", admin: presale.admin, at: tx.now });
    controllerLogger.info({ admin: presale.admin }, "Presale initialized");

    return presale;
  }

  initializeGlobalState(tx: Transaction, apy: bigint, feePercent: bigint): GlobalState {
    if (tx.state.global) {
      throw new StakelineError("AlreadyInitialized", "Global state has already been initialized.");
    }

    const global: GlobalState = {
      totalStaked: 0n,
      rewardPool: 0n,
      apy,
      feePercent,
    };
    tx.state.global = global;

    tx.record({ type: "global:initialized", apy, feePercent, at: tx.now });
    controllerLogger.info({
      apy: apy.toString(),
      feePercent: feePercent.toString(),
    }, "Global state initialized");

    return global;
  }

  /**
   * End the presale and mark the launch time. Staking closes for good.
   */
  endPresale(tx: Transaction): PresaleState {
    const presale = tx.presale();
    tx.authorize("endPresale");
    if (!presale.isActive) {
      throw new StakelineError("AlreadyEnded");
    }

    presale.isActive = false;
    presale.endTime = tx.now;
    presale.launchTime = tx.now;
    presale.liquidityLockEndTime = tx.after(TIMING.liquidityLockSeconds);

    tx.record({
      type: "presale:ended",
      endTime: tx.now,
      liquidityLockEndTime: presale.liquidityLockEndTime,
    });
    tx.audit("end_presale", "presale", {
      endTime: tx.now,
      liquidityLockEndTime: presale.liquidityLockEndTime,
    });

    return presale;
  }
}

export function createPresaleController(): PresaleController {
  return new PresaleController();
}
