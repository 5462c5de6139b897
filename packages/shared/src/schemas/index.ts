/**
 * Stakeline Schemas
 * zod validation for environment and operation inputs
 */

import { z } from "zod";
import {
  amountSchema,
  currencySchema,
  identitySchema,
  percentSchema,
  stakeStartPolicySchema,
} from "./common.js";

export * from "./common.js";

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

export const envSchema = z.object({
  // Identities
  PRESALE_ADMIN: identitySchema,
  TREASURY_ADDRESS: identitySchema,
  FEE_RECIPIENT_ADDRESS: identitySchema,
  TOKEN_MINT: identitySchema,
  STAKING_POOL_ADDRESS: identitySchema.default("staking-pool"),
  REWARD_POOL_ADDRESS: identitySchema.default("reward-pool"),
  LIQUIDITY_HOLDING_ADDRESS: identitySchema.default("liquidity-holding"),
  LIQUIDITY_VAULT_ADDRESS: identitySchema.default("liquidity-vault"),
  LIQUIDITY_ASSET: identitySchema.default("liquidity"),

  // Staking
  STAKE_START_POLICY: stakeStartPolicySchema.default("reset"),

  // Token metadata (display only)
  TOKEN_NAME: z.string().default("Stakeline Token"),
  TOKEN_SYMBOL: z.string().default("STKL"),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type EnvConfig = z.infer<typeof envSchema>;

// ============================================
// OPERATION INPUT SCHEMAS
// ============================================

export const paymentRequestSchema = z.object({
  amount: amountSchema,
  currency: currencySchema,
  treasury: identitySchema,
  feeRecipient: identitySchema,
});

export type PaymentRequestInput = z.input<typeof paymentRequestSchema>;
export type PaymentRequest = z.output<typeof paymentRequestSchema>;

export const parameterUpdateSchema = z.object({
  apy: percentSchema,
  feePercent: percentSchema,
});

export type ParameterUpdate = z.output<typeof parameterUpdateSchema>;

export const stageUpdateSchema = z.object({
  index: z.number().int(),
  price: amountSchema,
  tokensSold: amountSchema,
  totalRaised: amountSchema,
});

export type StageUpdateInput = z.input<typeof stageUpdateSchema>;
export type StageUpdate = z.output<typeof stageUpdateSchema>;

export const holdingRefSchema = z.object({
  owner: identitySchema,
  asset: currencySchema,
});

export type HoldingRef = z.output<typeof holdingRefSchema>;
