/**
 * Presale Service Configuration
 */

import { z } from "zod";
import { envSchema, identitySchema, stakeStartPolicySchema } from "@stakeline/shared";
import type { PresaleConfig } from "./types.js";

// ============================================
// PRESALE CONFIG SCHEMA
// ============================================

const presaleConfigSchema = z.object({
  addresses: z.object({
    admin: identitySchema,
    treasury: identitySchema,
    feeRecipient: identitySchema,
    stakingPool: identitySchema,
    rewardPool: identitySchema,
    liquidityHolding: identitySchema,
    liquidityVault: identitySchema,
  }),
  tokenMint: identitySchema,
  liquidityAsset: identitySchema,
  stakeStartPolicy: stakeStartPolicySchema,
  token: z.object({
    name: z.string(),
    symbol: z.string(),
  }),
}).superRefine((config, ctx) => {
  // Treasury and fee recipient must be distinct holdings
  if (config.addresses.treasury === config.addresses.feeRecipient) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["addresses", "feeRecipient"],
      message: "Fee recipient must differ from treasury",
    });
  }
  if (config.tokenMint === "native") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["tokenMint"],
      message: "Token mint must not use the native currency id",
    });
  }
});

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadPresaleConfig(
  source: Record<string, string | undefined> = process.env
): PresaleConfig {
  const env = envSchema.parse(source);

  const config: PresaleConfig = {
    addresses: {
      admin: env.PRESALE_ADMIN,
      treasury: env.TREASURY_ADDRESS,
      feeRecipient: env.FEE_RECIPIENT_ADDRESS,
      stakingPool: env.STAKING_POOL_ADDRESS,
      rewardPool: env.REWARD_POOL_ADDRESS,
      liquidityHolding: env.LIQUIDITY_HOLDING_ADDRESS,
      liquidityVault: env.LIQUIDITY_VAULT_ADDRESS,
    },
    tokenMint: env.TOKEN_MINT,
    liquidityAsset: env.LIQUIDITY_ASSET,
    stakeStartPolicy: env.STAKE_START_POLICY,
    token: {
      name: env.TOKEN_NAME,
      symbol: env.TOKEN_SYMBOL,
    },
  };

  return createPresaleConfig(config);
}

/**
 * Validate a config assembled in code
 */
export function createPresaleConfig(config: PresaleConfig): PresaleConfig {
  return presaleConfigSchema.parse(config);
}
