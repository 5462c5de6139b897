/**
 * Stakeline Constants
 * Protocol parameters fixed at deployment
 */

// ============================================
// TIME
// ============================================
export const SECONDS_PER_DAY = 24 * 60 * 60;

export const TIMING = {
  // Full staking term (6 months)
  stakingDurationSeconds: 180 * SECONDS_PER_DAY,

  // Lock after launch before any unstake is allowed
  earlyUnstakeLockSeconds: 7 * SECONDS_PER_DAY,

  // Liquidity lock window, counted from presale end
  liquidityLockSeconds: 365 * SECONDS_PER_DAY,
} as const;

// ============================================
// FEES & PENALTIES
// ============================================
export const FEES = {
  // Flat fee in base units, not a percentage
  flatPaymentFee: 3n,

  earlyUnstakePenaltyPercent: 20n,
} as const;

// ============================================
// ARITHMETIC BOUNDS
// ============================================
export const U64_MAX = (1n << 64n) - 1n;

// ============================================
// CURRENCIES
// ============================================
export const NATIVE_CURRENCY = "native" as const;

// ============================================
// PRESALE STAGES
// ============================================
export const STAGE_COUNT = 8;

export interface StageSeed {
  price: bigint;
  tokensSold: bigint;
  totalRaised: bigint;
}

// Prices carry 8 decimals: 0.00021 is stored as 21000
export const INITIAL_STAGE_SCHEDULE: readonly StageSeed[] = [
  { price: 21_000n, tokensSold: 2_500_000_000n, totalRaised: 525_000n },
  { price: 25_000n, tokensSold: 2_500_000_000n, totalRaised: 625_000n },
  { price: 29_000n, tokensSold: 2_500_000_000n, totalRaised: 725_000n },
  { price: 33_000n, tokensSold: 2_500_000_000n, totalRaised: 825_000n },
  { price: 37_000n, tokensSold: 2_500_000_000n, totalRaised: 925_000n },
  { price: 41_000n, tokensSold: 2_500_000_000n, totalRaised: 1_025_000n },
  { price: 45_000n, tokensSold: 2_500_000_000n, totalRaised: 1_125_000n },
  { price: 49_000n, tokensSold: 2_500_000_000n, totalRaised: 1_225_000n },
];

// ============================================
// STAKE START POLICIES
// ============================================
export const STAKE_START_POLICIES = {
  RESET: "reset",
  WEIGHTED: "weighted",
} as const;

export type StakeStartPolicy =
  (typeof STAKE_START_POLICIES)[keyof typeof STAKE_START_POLICIES];
