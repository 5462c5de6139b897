/**
 * Presale Engine
 *
 * Public operation set. Every operation:
 * 1. is queued behind all earlier operations (one at a time)
 * 2. samples the clock once
 * 3. works on a private copy of the committed state
 * 4. runs its ledger instructions as one atomic batch
 * 5. passes the invariant check, then commits
 *
 * Any failure before step 5 leaves committed state and balances untouched.
 */

import { EventEmitter } from "eventemitter3";
import PQueue from "p-queue";
import type { z } from "zod";
import {
  StakelineError,
  amountSchema,
  audit,
  holdingRefSchema,
  identitySchema,
  isStakelineError,
  logError,
  parameterUpdateSchema,
  paymentRequestSchema,
  stageUpdateSchema,
  unixSecondsSchema,
  presaleLogger as logger,
  type PaymentRequestInput,
} from "@stakeline/shared";
import { AdminOps, createAdminOps } from "../admin/admin-ops.js";
import { PresaleStageTable } from "../admin/stage-table.js";
import type { PresaleEngineEvents } from "../events.js";
import {
  InvariantChecker,
  createInvariantChecker,
  type InvariantStatistics,
} from "../invariants/invariant-checker.js";
import { LiquidityLock, createLiquidityLock } from "../liquidity/liquidity-lock.js";
import { PaymentProcessor, createPaymentProcessor } from "../payments/payment-processor.js";
import { AdminIdentityPolicy, type AuthorizationPolicy } from "../ports/authorization.js";
import { SystemClock, type ClockSource } from "../ports/clock.js";
import { InMemoryStateStore, type StateStore } from "../ports/state-store.js";
import type { TokenLedger } from "../ports/token-ledger.js";
import { PresaleController, createPresaleController } from "../presale/presale-controller.js";
import { RewardCalculator, createRewardCalculator } from "../staking/reward-calculator.js";
import { StakingEngine, createStakingEngine } from "../staking/staking-engine.js";
import { UnstakeEngine, createUnstakeEngine } from "../staking/unstake-engine.js";
import { Transaction } from "../transaction.js";
import type {
  EngineState,
  GlobalState,
  LedgerInstruction,
  OperationName,
  PaymentResult,
  PresaleConfig,
  PresaleStage,
  PresaleState,
  StakeAccount,
  UnstakeResult,
} from "../types.js";

const engineLogger = logger.child({ component: "presale-engine" });

// ============================================
// TYPES
// ============================================

export type AmountInput = z.input<typeof amountSchema>;

export interface HoldingInput {
  owner: string;
  asset: string;
}

export interface PresaleEngineOptions {
  config: PresaleConfig;
  ledger: TokenLedger;
  clock?: ClockSource;
  store?: StateStore;
  policy?: AuthorizationPolicy;
}

type TransactionMode = "write" | "read";

function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown, field: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message).join("; ");
    throw new StakelineError("InvalidInput", `Invalid ${field}: ${issues}`, { field });
  }
  return result.data;
}

// ============================================
// PRESALE ENGINE
// ============================================

export class PresaleEngine extends EventEmitter<PresaleEngineEvents> {
  private readonly config: PresaleConfig;
  private readonly ledger: TokenLedger;
  private readonly clock: ClockSource;
  private readonly store: StateStore;
  private readonly policy: AuthorizationPolicy;
  private readonly queue = new PQueue({ concurrency: 1 });

  // Components
  private readonly controller: PresaleController;
  private readonly payments: PaymentProcessor;
  private readonly staking: StakingEngine;
  private readonly rewards: RewardCalculator;
  private readonly unstaking: UnstakeEngine;
  private readonly liquidity: LiquidityLock;
  private readonly admin: AdminOps;
  private readonly invariants: InvariantChecker;

  constructor(options: PresaleEngineOptions) {
    super();
    this.config = options.config;
    this.ledger = options.ledger;
    this.clock = options.clock ?? new SystemClock();
    this.store = options.store ?? new InMemoryStateStore();
    this.policy = options.policy ?? new AdminIdentityPolicy();

    this.controller = createPresaleController();
    this.payments = createPaymentProcessor();
    this.staking = createStakingEngine(this.config.stakeStartPolicy);
    this.rewards = createRewardCalculator();
    this.unstaking = createUnstakeEngine();
    this.liquidity = createLiquidityLock();
    this.admin = createAdminOps();
    this.invariants = createInvariantChecker();

    engineLogger.info({
      token: this.config.token.symbol,
      tokenMint: this.config.tokenMint,
      stakeStartPolicy: this.config.stakeStartPolicy,
      policy: this.policy.constructor.name,
    }, "PresaleEngine initialized");
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  initializePresale(caller: string): Promise<PresaleState> {
    return this.execute("initializePresale", caller, "write", (tx) =>
      this.controller.initializePresale(tx)
    );
  }

  initializeGlobalState(
    caller: string,
    apy: AmountInput,
    feePercent: AmountInput
  ): Promise<GlobalState> {
    return this.execute("initializeGlobalState", caller, "write", (tx) => {
      const rates = parseInput(parameterUpdateSchema, { apy, feePercent }, "rates");
      return this.controller.initializeGlobalState(tx, rates.apy, rates.feePercent);
    });
  }

  initializeStageTable(caller: string): Promise<PresaleStage[]> {
    return this.execute("initializeStageTable", caller, "write", (tx) =>
      this.admin.initializeStageTable(tx)
    );
  }

  endPresale(caller: string): Promise<PresaleState> {
    return this.execute("endPresale", caller, "write", (tx) =>
      this.controller.endPresale(tx)
    );
  }

  // ============================================
  // PAYMENTS
  // ============================================

  acceptPayment(caller: string, request: PaymentRequestInput): Promise<PaymentResult> {
    return this.execute("acceptPayment", caller, "write", (tx) =>
      this.payments.acceptPayment(tx, parseInput(paymentRequestSchema, request, "payment"))
    );
  }

  depositNative(caller: string, amount: AmountInput): Promise<void> {
    return this.execute("depositNative", caller, "write", (tx) =>
      this.payments.depositNative(tx, parseInput(amountSchema, amount, "amount"))
    );
  }

  // ============================================
  // STAKING
  // ============================================

  stake(caller: string, amount: AmountInput): Promise<StakeAccount> {
    return this.execute("stake", caller, "write", (tx) =>
      this.staking.stake(tx, parseInput(amountSchema, amount, "amount"))
    );
  }

  unstake(caller: string): Promise<UnstakeResult> {
    return this.execute("unstake", caller, "write", (tx) => this.unstaking.unstake(tx));
  }

  claimRewards(caller: string): Promise<bigint> {
    return this.execute("claimRewards", caller, "write", (tx) => this.rewards.claimRewards(tx));
  }

  /**
   * Reward the caller would receive if claiming now; never mutates state
   */
  calculateRewards(caller: string): Promise<bigint> {
    return this.execute("calculateRewards", caller, "read", (tx) =>
      this.rewards.calculateRewards(tx)
    );
  }

  // ============================================
  // LIQUIDITY
  // ============================================

  lockLiquidity(caller: string): Promise<bigint> {
    return this.execute("lockLiquidity", caller, "write", (tx) => this.liquidity.lockLiquidity(tx));
  }

  // ============================================
  // ADMIN
  // ============================================

  burnTokens(caller: string, holding: HoldingInput, amount: AmountInput): Promise<void> {
    return this.execute("burnTokens", caller, "write", (tx) =>
      this.admin.burnTokens(
        tx,
        parseInput(holdingRefSchema, holding, "holding"),
        parseInput(amountSchema, amount, "amount")
      )
    );
  }

  refillRewardPool(caller: string, amount: AmountInput): Promise<GlobalState> {
    return this.execute("refillRewardPool", caller, "write", (tx) =>
      this.admin.refillRewardPool(tx, parseInput(amountSchema, amount, "amount"))
    );
  }

  updateParameters(caller: string, apy: AmountInput, feePercent: AmountInput): Promise<GlobalState> {
    return this.execute("updateParameters", caller, "write", (tx) =>
      this.admin.updateParameters(tx, parseInput(parameterUpdateSchema, { apy, feePercent }, "parameters"))
    );
  }

  withdrawFunds(caller: string, amount: AmountInput): Promise<void> {
    return this.execute("withdrawFunds", caller, "write", (tx) =>
      this.admin.withdrawFunds(tx, parseInput(amountSchema, amount, "amount"))
    );
  }

  updatePresaleStage(
    caller: string,
    index: number,
    price: AmountInput,
    tokensSold: AmountInput,
    totalRaised: AmountInput
  ): Promise<PresaleStage> {
    return this.execute("updatePresaleStage", caller, "write", (tx) =>
      this.admin.updatePresaleStage(
        tx,
        parseInput(stageUpdateSchema, { index, price, tokensSold, totalRaised }, "stage")
      )
    );
  }

  // ============================================
  // READ MODEL
  // ============================================

  getPresaleState(): Promise<PresaleState> {
    return this.read((state) => {
      if (!state.presale) throw new StakelineError("NotInitialized", "Presale has not been initialized.");
      return state.presale;
    });
  }

  getGlobalState(): Promise<GlobalState> {
    return this.read((state) => {
      if (!state.global) throw new StakelineError("NotInitialized", "Global state has not been initialized.");
      return state.global;
    });
  }

  getStakeAccount(owner: string): Promise<StakeAccount> {
    return this.read((state) => {
      const account = state.stakes.get(owner);
      if (!account) throw new StakelineError("NotInitialized", "Stake account not found.", { owner });
      return account;
    });
  }

  getStages(): Promise<PresaleStage[]> {
    return this.read((state) => {
      if (!state.stages) throw new StakelineError("NotInitialized", "Presale stage table has not been initialized.");
      return state.stages;
    });
  }

  getStage(index: number): Promise<PresaleStage> {
    return this.read((state) => {
      if (!state.stages) throw new StakelineError("NotInitialized", "Presale stage table has not been initialized.");
      return new PresaleStageTable(state.stages).get(index);
    });
  }

  getInvariantStatistics(): InvariantStatistics {
    return this.invariants.getStatistics();
  }

  /**
   * Resolves once every queued operation has settled
   */
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  // ============================================
  // TRANSACTION RUNNER
  // ============================================

  private execute<T>(
    operation: OperationName,
    caller: string,
    mode: TransactionMode,
    body: (tx: Transaction) => T | Promise<T>
  ): Promise<T> {
    return this.queue.add<T>(
      () => this.runTransaction(operation, caller, mode, body),
      { throwOnTimeout: true }
    );
  }

  private read<T>(select: (state: EngineState) => T): Promise<T> {
    return this.queue.add<T>(async () => select(await this.store.read()), { throwOnTimeout: true });
  }

  private async runTransaction<T>(
    operation: OperationName,
    caller: string,
    mode: TransactionMode,
    body: (tx: Transaction) => T | Promise<T>
  ): Promise<T> {
    let now: number | undefined;

    try {
      now = parseInput(unixSecondsSchema, this.clock.now(), "clock");
      const identity = parseInput(identitySchema, caller, "caller");
      const state = await this.store.read();
      const tx = new Transaction({
        operation,
        caller: identity,
        now,
        state,
        config: this.config,
        ledger: this.ledger,
        policy: this.policy,
      });

      const result = await body(tx);

      if (mode === "write") {
        this.invariants.enforce(state, operation, now);

        const instructions = tx.pendingInstructions();
        if (instructions.length > 0) {
          await this.executeLedger(instructions);
        }
        await this.store.commit(state);

        this.release(tx);
      }

      return result;
    } catch (error) {
      throw this.fail(operation, caller, now, error);
    }
  }

  /**
   * Publish effects held back until commit
   */
  private release(tx: Transaction): void {
    for (const entry of tx.pendingAudits()) {
      audit(entry);
    }
    for (const event of tx.pendingEvents()) {
      this.emit("committed", event);
    }

    engineLogger.debug({
      operation: tx.operation,
      caller: tx.caller,
      instructions: tx.pendingInstructions().length,
    }, "Operation committed");
  }

  /**
   * Run the batch; adapter faults surface as LedgerRejected
   */
  private async executeLedger(instructions: readonly LedgerInstruction[]): Promise<void> {
    try {
      await this.ledger.execute(instructions);
    } catch (error) {
      if (isStakelineError(error)) throw error;
      throw new StakelineError("LedgerRejected", undefined, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private fail(
    operation: OperationName,
    caller: string,
    at: number | undefined,
    error: unknown
  ): StakelineError {
    let failure: StakelineError;
    if (isStakelineError(error)) {
      failure = error;
    } else {
      const cause = error instanceof Error ? error : new Error(String(error));
      logError(cause, { operation, caller });
      failure = new StakelineError("PortFailure", undefined, {
        reason: cause.message,
        name: cause.name,
      });
    }

    failure.operation = operation;

    engineLogger.warn({
      operation,
      caller,
      code: failure.code,
      category: failure.category,
    }, failure.message);

    this.emit("failed", { operation, caller, at, error: failure.toErrorResponse() });
    return failure;
  }
}

export function createPresaleEngine(options: PresaleEngineOptions): PresaleEngine {
  return new PresaleEngine(options);
}
