/**
 * Token Ledger
 *
 * Executes balance movements for the engine. A batch of instructions is
 * applied atomically: either every instruction lands or none does.
 */

import {
  StakelineError,
  checkedAdd,
  checkedSub,
  logLedgerMovement,
  presaleLogger as logger,
} from "@stakeline/shared";
import type { HoldingRef, LedgerInstruction } from "../types.js";

const ledgerLogger = logger.child({ component: "token-ledger" });

// ============================================
// LEDGER INTERFACE
// ============================================

export interface TokenLedger {
  /**
   * Current balance of a holding (0 when it has never been funded)
   */
  balanceOf(holding: HoldingRef): Promise<bigint>;

  /**
   * Apply a batch atomically; rejects with LedgerRejected on any failure
   */
  execute(instructions: readonly LedgerInstruction[]): Promise<void>;
}

// ============================================
// IN-MEMORY LEDGER
// ============================================

function holdingKey(asset: string, owner: string): string {
  return `${asset}:${owner}`;
}

/**
 * In-process ledger with overdraft protection and supply tracking
 */
export class InMemoryTokenLedger implements TokenLedger {
  private balances: Map<string, bigint> = new Map();
  private supply: Map<string, bigint> = new Map();

  async balanceOf(holding: HoldingRef): Promise<bigint> {
    return this.balances.get(holdingKey(holding.asset, holding.owner)) ?? 0n;
  }

  /**
   * Circulating supply of an asset (minted minus burned)
   */
  totalSupply(asset: string): bigint {
    return this.supply.get(asset) ?? 0n;
  }

  async execute(instructions: readonly LedgerInstruction[]): Promise<void> {
    const balances = new Map(this.balances);
    const supply = new Map(this.supply);

    instructions.forEach((instruction, index) => {
      this.apply(balances, supply, instruction, index);
    });

    this.balances = balances;
    this.supply = supply;

    for (const instruction of instructions) {
      logLedgerMovement("debug", `ledger:${instruction.kind}`, {
        kind: instruction.kind,
        asset: instruction.asset,
        from: instruction.kind === "transfer" ? instruction.from
          : instruction.kind === "burn" ? instruction.holder
          : undefined,
        to: instruction.kind === "burn" ? undefined : instruction.to,
        amount: instruction.amount.toString(),
      });
    }
  }

  private apply(
    balances: Map<string, bigint>,
    supply: Map<string, bigint>,
    instruction: LedgerInstruction,
    index: number
  ): void {
    switch (instruction.kind) {
      case "transfer": {
        if (instruction.from === instruction.to) return;
        this.debit(balances, instruction.asset, instruction.from, instruction.amount, index);
        this.credit(balances, instruction.asset, instruction.to, instruction.amount, index);
        return;
      }
      case "burn": {
        this.debit(balances, instruction.asset, instruction.holder, instruction.amount, index);
        const current = supply.get(instruction.asset) ?? 0n;
        const next = checkedSub(current, instruction.amount);
        if (!next.ok) {
          throw this.reject("Supply underflow", { asset: instruction.asset, amount: instruction.amount }, index);
        }
        supply.set(instruction.asset, next.value);
        return;
      }
      case "mint": {
        this.credit(balances, instruction.asset, instruction.to, instruction.amount, index);
        const current = supply.get(instruction.asset) ?? 0n;
        const next = checkedAdd(current, instruction.amount);
        if (!next.ok) {
          throw this.reject("Supply overflow", instruction, index);
        }
        supply.set(instruction.asset, next.value);
        return;
      }
    }
  }

  private debit(
    balances: Map<string, bigint>,
    asset: string,
    owner: string,
    amount: bigint,
    index: number
  ): void {
    const key = holdingKey(asset, owner);
    const next = checkedSub(balances.get(key) ?? 0n, amount);
    if (!next.ok) {
      throw this.reject(`Insufficient balance in ${key}`, { asset, owner, amount }, index);
    }
    balances.set(key, next.value);
  }

  private credit(
    balances: Map<string, bigint>,
    asset: string,
    owner: string,
    amount: bigint,
    index: number
  ): void {
    const key = holdingKey(asset, owner);
    const next = checkedAdd(balances.get(key) ?? 0n, amount);
    if (!next.ok) {
      throw this.reject(`Balance overflow in ${key}`, { asset, owner, amount }, index);
    }
    balances.set(key, next.value);
  }

  private reject(
    reason: string,
    context: { asset: string; amount: bigint; owner?: string },
    index: number
  ): StakelineError {
    ledgerLogger.warn({
      reason,
      asset: context.asset,
      owner: context.owner,
      amount: context.amount.toString(),
      instructionIndex: index,
    }, "Ledger batch rejected");

    return new StakelineError("LedgerRejected", reason, { instructionIndex: index });
  }
}
