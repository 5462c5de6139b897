/**
 * Presale Engine Types
 *
 * Records owned by the engine:
 * - PresaleState (lifecycle, launch and liquidity-lock timestamps)
 * - GlobalState (staking aggregates and governance rates)
 * - StakeAccount (per depositor)
 * - PresaleStage table (8 entries)
 */

import type { HoldingRef, StakeStartPolicy } from "@stakeline/shared";

// ============================================
// RECORDS
// ============================================

/**
 * Presale lifecycle. `isActive` goes true -> false exactly once.
 */
export interface PresaleState {
  isActive: boolean;
  endTime?: number;
  launchTime?: number;
  admin: string;
  liquidityLocked: boolean;
  liquidityLockEndTime?: number;
}

/**
 * Aggregates. `totalStaked` equals the sum of all StakeAccount amounts
 * at every commit.
 */
export interface GlobalState {
  totalStaked: bigint;
  rewardPool: bigint;
  apy: bigint;
  feePercent: bigint;
}

export interface StakeAccount {
  amount: bigint;
  startTime: number;
  lastClaimTime: number;
}

export interface PresaleStage {
  /** 1-based stage number */
  stage: number;
  /** Fixed point, 8 decimals */
  price: bigint;
  tokensSold: bigint;
  totalRaised: bigint;
}

/**
 * Everything committed by one operation
 */
export interface EngineState {
  presale?: PresaleState;
  global?: GlobalState;
  stages?: PresaleStage[];
  stakes: Map<string, StakeAccount>;
}

// ============================================
// LEDGER INSTRUCTIONS
// ============================================

export type LedgerInstruction =
  | {
      kind: "transfer";
      asset: string;
      from: string;
      to: string;
      amount: bigint;
    }
  | {
      kind: "burn";
      asset: string;
      holder: string;
      amount: bigint;
    }
  | {
      kind: "mint";
      asset: string;
      to: string;
      amount: bigint;
    };

// ============================================
// CONFIGURATION
// ============================================

export interface PresaleAddresses {
  admin: string;
  treasury: string;
  feeRecipient: string;
  stakingPool: string;
  rewardPool: string;
  liquidityHolding: string;
  liquidityVault: string;
}

export interface PresaleConfig {
  addresses: PresaleAddresses;

  /** Mint id of the project token; also the secondary payment currency */
  tokenMint: string;

  /** Asset id of the liquidity position moved by lockLiquidity */
  liquidityAsset: string;

  stakeStartPolicy: StakeStartPolicy;

  token: {
    name: string;
    symbol: string;
  };
}

// ============================================
// OPERATIONS
// ============================================

export type OperationName =
  | "initializePresale"
  | "initializeGlobalState"
  | "initializeStageTable"
  | "endPresale"
  | "acceptPayment"
  | "depositNative"
  | "stake"
  | "unstake"
  | "claimRewards"
  | "calculateRewards"
  | "lockLiquidity"
  | "burnTokens"
  | "refillRewardPool"
  | "updateParameters"
  | "withdrawFunds"
  | "updatePresaleStage";

/** Operations gated by the authorization policy */
export type PrivilegedAction = Extract<
  OperationName,
  | "endPresale"
  | "burnTokens"
  | "refillRewardPool"
  | "updateParameters"
  | "withdrawFunds"
  | "updatePresaleStage"
>;

export interface UnstakeResult {
  staked: bigint;
  payout: bigint;
  penalty: bigint;
  fullTerm: boolean;
}

export interface PaymentResult {
  currency: string;
  net: bigint;
  fee: bigint;
}

export type { HoldingRef };
