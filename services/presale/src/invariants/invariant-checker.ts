/**
 * Invariant Checker
 *
 * Verifies committed-state invariants before each commit:
 * - GlobalState.totalStaked == Sum(StakeAccount.amount)
 * - every amount stays inside the u64 range
 *
 * There is no auto-recovery: a violation discards the whole operation.
 */

import {
  StakelineError,
  isU64,
  presaleLogger as logger,
} from "@stakeline/shared";
import type { EngineState, OperationName } from "../types.js";

const invariantLogger = logger.child({ component: "invariant-checker" });

// ============================================
// RESULT
// ============================================

export interface InvariantCheckResult {
  passed: boolean;
  totalStaked: bigint;
  stakeSum: bigint;
  discrepancy: bigint;
  accountCount: number;
  operation: OperationName;
  timestamp: number;
  errorMessage?: string;
}

export interface InvariantStatistics {
  totalChecks: number;
  passedChecks: number;
  failedChecks: number;
}

// ============================================
// INVARIANT CHECKER
// ============================================

export class InvariantChecker {
  private readonly checkHistory: InvariantCheckResult[] = [];
  private readonly maxHistorySize: number;

  private totalChecks = 0;
  private passedChecks = 0;
  private failedChecks = 0;

  constructor(maxHistorySize = 1000) {
    this.maxHistorySize = maxHistorySize;
  }

  /**
   * Check invariants: Sum(stakes) == totalStaked, amounts in range
   */
  check(state: EngineState, operation: OperationName, timestamp: number): InvariantCheckResult {
    this.totalChecks++;

    let stakeSum = 0n;
    let outOfRange: string | undefined;
    for (const [owner, account] of state.stakes) {
      stakeSum += account.amount;
      if (!isU64(account.amount)) {
        outOfRange = `stake account ${owner}`;
      }
    }

    const global = state.global;
    const totalStaked = global?.totalStaked ?? 0n;
    if (global && (!isU64(global.totalStaked) || !isU64(global.rewardPool))) {
      outOfRange = "global state";
    }

    const discrepancy = totalStaked - stakeSum;
    const passed = discrepancy === 0n && outOfRange === undefined;

    const result: InvariantCheckResult = {
      passed,
      totalStaked,
      stakeSum,
      discrepancy,
      accountCount: state.stakes.size,
      operation,
      timestamp,
    };

    if (passed) {
      this.passedChecks++;
      invariantLogger.debug({
        operation,
        totalStaked: totalStaked.toString(),
      }, "Invariant check passed");
    } else {
      this.failedChecks++;
      result.errorMessage = outOfRange
        ? `Invariant violation: amount out of range in ${outOfRange}`
        : `Invariant violation: totalStaked=${totalStaked}, stakes=${stakeSum}, diff=${discrepancy}`;

      invariantLogger.error({
        operation,
        totalStaked: totalStaked.toString(),
        stakeSum: stakeSum.toString(),
        discrepancy: discrepancy.toString(),
      }, "Invariant check FAILED");
    }

    this.addToHistory(result);
    return result;
  }

  /**
   * Check and throw if an invariant is violated
   */
  enforce(state: EngineState, operation: OperationName, timestamp: number): void {
    const result = this.check(state, operation, timestamp);

    if (!result.passed) {
      throw new StakelineError("InvariantViolation", result.errorMessage, {
        totalStaked: result.totalStaked.toString(),
        stakeSum: result.stakeSum.toString(),
      });
    }
  }

  getStatistics(): InvariantStatistics {
    return {
      totalChecks: this.totalChecks,
      passedChecks: this.passedChecks,
      failedChecks: this.failedChecks,
    };
  }

  getHistory(limit = 100): InvariantCheckResult[] {
    return this.checkHistory.slice(-limit);
  }

  private addToHistory(result: InvariantCheckResult): void {
    this.checkHistory.push(result);

    if (this.checkHistory.length > this.maxHistorySize) {
      this.checkHistory.splice(0, this.checkHistory.length - this.maxHistorySize);
    }
  }
}

export function createInvariantChecker(maxHistorySize?: number): InvariantChecker {
  return new InvariantChecker(maxHistorySize);
}
