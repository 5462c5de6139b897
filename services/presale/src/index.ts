/**
 * @stakeline/presale
 *
 * Presale lifecycle, payments, staking, rewards, unstake penalties,
 * liquidity lock and admin operations over pluggable clock, ledger,
 * state store and authorization ports.
 */

// Types
export * from "./types.js";
export * from "./events.js";

// Configuration
export * from "./config.js";

// Ports and in-process adapters
export * from "./ports/clock.js";
export * from "./ports/token-ledger.js";
export * from "./ports/state-store.js";
export * from "./ports/authorization.js";

// Components
export * from "./transaction.js";
export * from "./presale/presale-controller.js";
export * from "./payments/payment-processor.js";
export * from "./staking/staking-engine.js";
export * from "./staking/reward-calculator.js";
export * from "./staking/unstake-engine.js";
export * from "./liquidity/liquidity-lock.js";
export * from "./admin/admin-ops.js";
export * from "./admin/stage-table.js";
export * from "./invariants/invariant-checker.js";

// Engine
export * from "./engine/presale-engine.js";
