/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";
import { U64_MAX } from "../constants/index.js";

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/** Authenticated principal / holding owner */
export const identitySchema = z
  .string()
  .trim()
  .min(1, "Identity must not be empty")
  .max(128, "Identity is too long");

/** Unsigned 64-bit amount; accepts bigint, digit strings and safe integers */
export const amountSchema = z
  .union([
    z.bigint(),
    z.string().regex(/^\d+$/, "Amount must be a numeric string").transform((val) => BigInt(val)),
    z.number().int().nonnegative().safe().transform((val) => BigInt(val)),
  ])
  .refine((val) => val >= 0n && val <= U64_MAX, "Amount must fit in an unsigned 64-bit integer");

/** Unsigned percentage (not bounded to 100: governance may set any value) */
export const percentSchema = amountSchema;

/** Unix timestamp in seconds */
export const unixSecondsSchema = z.number().int().nonnegative();

/** Currency identifier: "native" or a token mint id */
export const currencySchema = z.string().trim().min(1, "Currency must not be empty");

export const stakeStartPolicySchema = z.enum(["reset", "weighted"]);
