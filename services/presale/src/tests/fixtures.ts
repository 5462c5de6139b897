/**
 * Test fixtures: an engine wired to in-process adapters
 */

import { NATIVE_CURRENCY, SECONDS_PER_DAY, type StakeStartPolicy } from "@stakeline/shared";
import { createPresaleConfig } from "../config.js";
import { createPresaleEngine, type PresaleEngine } from "../engine/presale-engine.js";
import type { AuthorizationPolicy } from "../ports/authorization.js";
import { ManualClock } from "../ports/clock.js";
import { InMemoryStateStore } from "../ports/state-store.js";
import { InMemoryTokenLedger } from "../ports/token-ledger.js";
import type { PresaleConfig } from "../types.js";

export const DAY = SECONDS_PER_DAY;
export const T0 = 1_700_000_000;

export const ADMIN = "admin";
export const TREASURY = "treasury";
export const FEE_WALLET = "fee-wallet";
export const TOKEN_MINT = "token-mint";
export const LIQUIDITY_ASSET = "lp-token";
export const STAKING_POOL = "staking-pool";
export const REWARD_POOL = "reward-pool";
export const LIQUIDITY_HOLDING = "liquidity-holding";
export const LIQUIDITY_VAULT = "liquidity-vault";

export function testConfig(stakeStartPolicy: StakeStartPolicy = "reset"): PresaleConfig {
  return createPresaleConfig({
    addresses: {
      admin: ADMIN,
      treasury: TREASURY,
      feeRecipient: FEE_WALLET,
      stakingPool: STAKING_POOL,
      rewardPool: REWARD_POOL,
      liquidityHolding: LIQUIDITY_HOLDING,
      liquidityVault: LIQUIDITY_VAULT,
    },
    tokenMint: TOKEN_MINT,
    liquidityAsset: LIQUIDITY_ASSET,
    stakeStartPolicy,
    token: { name: "Test Token", symbol: "TEST" },
  });
}

export interface Harness {
  engine: PresaleEngine;
  clock: ManualClock;
  ledger: InMemoryTokenLedger;
  store: InMemoryStateStore;
  config: PresaleConfig;
}

export function createHarness(options: {
  policy?: AuthorizationPolicy;
  stakeStartPolicy?: StakeStartPolicy;
} = {}): Harness {
  const config = testConfig(options.stakeStartPolicy);
  const clock = new ManualClock(T0);
  const ledger = new InMemoryTokenLedger();
  const store = new InMemoryStateStore();
  const engine = createPresaleEngine({ config, ledger, clock, store, policy: options.policy });
  return { engine, clock, ledger, store, config };
}

export async function mint(
  ledger: InMemoryTokenLedger,
  asset: string,
  to: string,
  amount: bigint
): Promise<void> {
  await ledger.execute([{ kind: "mint", asset, to, amount }]);
}

export function mintNative(ledger: InMemoryTokenLedger, to: string, amount: bigint): Promise<void> {
  return mint(ledger, NATIVE_CURRENCY, to, amount);
}

export function mintToken(ledger: InMemoryTokenLedger, to: string, amount: bigint): Promise<void> {
  return mint(ledger, TOKEN_MINT, to, amount);
}

export function tokenBalance(ledger: InMemoryTokenLedger, owner: string): Promise<bigint> {
  return ledger.balanceOf({ owner, asset: TOKEN_MINT });
}

export function nativeBalance(ledger: InMemoryTokenLedger, owner: string): Promise<bigint> {
  return ledger.balanceOf({ owner, asset: NATIVE_CURRENCY });
}

/**
 * Initializes presale, global state (apy, 0% fee) and stage table, then
 * funds the reward pool through the admin.
 */
export async function bootstrap(
  harness: Harness,
  options: { apy?: bigint; rewardPool?: bigint } = {}
): Promise<void> {
  const { engine, ledger } = harness;
  const rewardPool = options.rewardPool ?? 10_000_000n;

  await engine.initializePresale(ADMIN);
  await engine.initializeGlobalState(ADMIN, options.apy ?? 43n, 0n);
  await engine.initializeStageTable(ADMIN);

  if (rewardPool > 0n) {
    await mintToken(ledger, ADMIN, rewardPool);
    await engine.refillRewardPool(ADMIN, rewardPool);
  }
}
