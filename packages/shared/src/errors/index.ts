/**
 * Stakeline Error Taxonomy
 *
 * Every failed operation surfaces one StakelineError carrying a stable code,
 * its category and a human-readable message.
 */

// ============================================
// CATEGORIES
// ============================================

export type ErrorCategory =
  | "PreconditionViolation" // Wrong lifecycle phase or time window
  | "ArithmeticFault"       // Checked overflow/underflow
  | "InsufficientBalance"   // Stake, payment or reward-pool shortfall
  | "Unauthorized"          // Caller not admitted by the policy
  | "InvalidReference"      // Unknown currency, wrong recipient, bad index
  | "ResourceExhausted"     // Reward pool empty
  | "ExternalFailure";      // Clock, ledger or state store misbehaved

// ============================================
// CODES
// ============================================

export const ERROR_CODES = {
  NotInitialized: {
    category: "PreconditionViolation",
    message: "Record has not been initialized.",
  },
  AlreadyInitialized: {
    category: "PreconditionViolation",
    message: "Record has already been initialized.",
  },
  AlreadyEnded: {
    category: "PreconditionViolation",
    message: "Presale already ended.",
  },
  StakingClosed: {
    category: "PreconditionViolation",
    message: "Staking is only allowed during the presale.",
  },
  EarlyUnstakeLocked: {
    category: "PreconditionViolation",
    message: "Unstaking not allowed before 7 days after launch.",
  },
  NoRewardsAvailable: {
    category: "PreconditionViolation",
    message: "No rewards available to claim yet.",
  },
  LiquidityLockError: {
    category: "PreconditionViolation",
    message: "Liquidity lock window is not open.",
  },
  WithdrawalNotAllowedAfterPresale: {
    category: "PreconditionViolation",
    message: "Withdrawal allowed only during presale.",
  },
  InvalidAmount: {
    category: "PreconditionViolation",
    message: "Invalid payment or stake amount.",
  },
  InvalidInput: {
    category: "PreconditionViolation",
    message: "Operation input failed validation.",
  },
  InvariantViolation: {
    category: "PreconditionViolation",
    message: "Ledger invariant violated.",
  },
  ArithmeticOverflow: {
    category: "ArithmeticFault",
    message: "Arithmetic overflow.",
  },
  ArithmeticUnderflow: {
    category: "ArithmeticFault",
    message: "Arithmetic underflow.",
  },
  DivisionByZero: {
    category: "ArithmeticFault",
    message: "Division by zero.",
  },
  InsufficientFunds: {
    category: "InsufficientBalance",
    message: "Insufficient funds for token transfer.",
  },
  InsufficientRewards: {
    category: "InsufficientBalance",
    message: "Not enough rewards in the pool.",
  },
  LedgerRejected: {
    category: "InsufficientBalance",
    message: "Ledger rejected the instruction batch.",
  },
  Unauthorized: {
    category: "Unauthorized",
    message: "Unauthorized.",
  },
  InvalidFeeRecipient: {
    category: "InvalidReference",
    message: "Fee recipient or treasury does not match the configured address.",
  },
  InvalidTokenMint: {
    category: "InvalidReference",
    message: "Invalid token mint address.",
  },
  InvalidStageIndex: {
    category: "InvalidReference",
    message: "Invalid presale stage index.",
  },
  StakingRewardsExhausted: {
    category: "ResourceExhausted",
    message: "Staking rewards pool is exhausted.",
  },
  PortFailure: {
    category: "ExternalFailure",
    message: "An external collaborator failed.",
  },
} as const satisfies Record<string, { category: ErrorCategory; message: string }>;

export type ErrorCode = keyof typeof ERROR_CODES;

// ============================================
// ERROR CLASS
// ============================================

export interface ErrorResponse {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  operation?: string;
  details?: Record<string, unknown>;
}

export class StakelineError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;
  operation?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    details?: Record<string, unknown>
  ) {
    super(message ?? ERROR_CODES[code].message);
    this.name = "StakelineError";
    this.code = code;
    this.category = ERROR_CODES[code].category;
    if (details && typeof details === "object" && !Array.isArray(details)) {
      this.details = details;
    }
  }

  toErrorResponse(): ErrorResponse {
    return {
      code: this.code,
      category: this.category,
      message: this.message,
      operation: this.operation,
      details: this.details,
    };
  }
}

export function isStakelineError(error: unknown): error is StakelineError {
  return error instanceof StakelineError;
}

/**
 * Throws a StakelineError with the given code unless the condition holds
 */
export function ensure(
  condition: boolean,
  code: ErrorCode,
  details?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new StakelineError(code, undefined, details);
  }
}
