/**
 * Transaction Context
 *
 * One per operation. Carries the caller, the single time sample, a private
 * working copy of EngineState and the ledger instructions collected so far.
 * Nothing here touches committed state; the engine commits or discards.
 */

import {
  StakelineError,
  checkedAdd,
  type AuditLogEntry,
} from "@stakeline/shared";
import type { AuthorizationPolicy } from "./ports/authorization.js";
import type { TokenLedger } from "./ports/token-ledger.js";
import type { PresaleEvent } from "./events.js";
import type {
  EngineState,
  GlobalState,
  HoldingRef,
  LedgerInstruction,
  OperationName,
  PresaleConfig,
  PresaleStage,
  PresaleState,
  PrivilegedAction,
  StakeAccount,
} from "./types.js";

// ============================================
// TRANSACTION
// ============================================

export interface TransactionOptions {
  operation: OperationName;
  caller: string;
  now: number;
  state: EngineState;
  config: PresaleConfig;
  ledger: TokenLedger;
  policy: AuthorizationPolicy;
}

export class Transaction {
  readonly operation: OperationName;
  readonly caller: string;
  readonly now: number;
  readonly state: EngineState;
  readonly config: PresaleConfig;

  private readonly ledger: TokenLedger;
  private readonly policy: AuthorizationPolicy;
  private readonly instructions: LedgerInstruction[] = [];
  private readonly events: PresaleEvent[] = [];
  private readonly audits: AuditLogEntry[] = [];

  constructor(options: TransactionOptions) {
    this.operation = options.operation;
    this.caller = options.caller;
    this.now = options.now;
    this.state = options.state;
    this.config = options.config;
    this.ledger = options.ledger;
    this.policy = options.policy;
  }

  // ============================================
  // RECORD ACCESS
  // ============================================

  presale(): PresaleState {
    if (!this.state.presale) {
      throw new StakelineError("NotInitialized", "Presale has not been initialized.");
    }
    return this.state.presale;
  }

  global(): GlobalState {
    if (!this.state.global) {
      throw new StakelineError("NotInitialized", "Global state has not been initialized.");
    }
    return this.state.global;
  }

  stages(): PresaleStage[] {
    if (!this.state.stages) {
      throw new StakelineError("NotInitialized", "Presale stage table has not been initialized.");
    }
    return this.state.stages;
  }

  /**
   * Stake account of an owner, zero-initialized on first access
   */
  stakeAccount(owner: string): StakeAccount {
    let account = this.state.stakes.get(owner);
    if (!account) {
      account = { amount: 0n, startTime: 0, lastClaimTime: 0 };
      this.state.stakes.set(owner, account);
    }
    return account;
  }

  /**
   * Stake account without creating one
   */
  findStakeAccount(owner: string): StakeAccount | undefined {
    return this.state.stakes.get(owner);
  }

  // ============================================
  // AUTHORIZATION
  // ============================================

  authorize(action: PrivilegedAction): void {
    const decision = this.policy.authorize(this.caller, action, this.presale());
    if (!decision.allowed) {
      throw new StakelineError("Unauthorized", undefined, {
        action,
        reason: decision.reason,
      });
    }
  }

  // ============================================
  // LEDGER
  // ============================================

  /**
   * Balance as committed before this transaction's own instructions
   */
  balanceOf(holding: HoldingRef): Promise<bigint> {
    return this.ledger.balanceOf(holding);
  }

  transfer(asset: string, from: string, to: string, amount: bigint): void {
    this.instructions.push({ kind: "transfer", asset, from, to, amount });
  }

  burn(asset: string, holder: string, amount: bigint): void {
    this.instructions.push({ kind: "burn", asset, holder, amount });
  }

  pendingInstructions(): readonly LedgerInstruction[] {
    return this.instructions;
  }

  // ============================================
  // EFFECTS RELEASED ON COMMIT
  // ============================================

  record(event: PresaleEvent): void {
    this.events.push(event);
  }

  audit(action: string, entityType: string, details?: Record<string, unknown>): void {
    this.audits.push({ action, entityType, actor: this.caller, details });
  }

  pendingEvents(): readonly PresaleEvent[] {
    return this.events;
  }

  pendingAudits(): readonly AuditLogEntry[] {
    return this.audits;
  }

  // ============================================
  // HELPERS
  // ============================================

  /**
   * now + offset, checked against the safe integer range
   */
  after(seconds: number): number {
    const result = checkedAdd(BigInt(this.now), BigInt(seconds));
    if (!result.ok || result.value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new StakelineError("ArithmeticOverflow", undefined, {
        expression: `${this.now} + ${seconds}`,
      });
    }
    return Number(result.value);
  }
}
