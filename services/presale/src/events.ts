/**
 * Engine Events
 *
 * Domain events are released only after their operation commits.
 */

import type { ErrorResponse } from "@stakeline/shared";
import type { OperationName } from "./types.js";

// ============================================
// DOMAIN EVENTS
// ============================================

export type PresaleEvent =
  | { type: "presale:initialized"; admin: string; at: number }
  | { type: "global:initialized"; apy: bigint; feePercent: bigint; at: number }
  | { type: "stages:initialized"; stageCount: number; at: number }
  | { type: "presale:ended"; endTime: number; liquidityLockEndTime: number }
  | { type: "payment:accepted"; payer: string; currency: string; net: bigint; fee: bigint; at: number }
  | { type: "treasury:deposited"; payer: string; amount: bigint; at: number }
  | { type: "stake:created"; owner: string; amount: bigint; totalStake: bigint; startTime: number }
  | { type: "stake:topped-up"; owner: string; amount: bigint; totalStake: bigint; startTime: number }
  | { type: "stake:withdrawn"; owner: string; payout: bigint; penalty: bigint; fullTerm: boolean; at: number }
  | { type: "rewards:claimed"; owner: string; reward: bigint; rewardPool: bigint; at: number }
  | { type: "liquidity:locked"; amount: bigint; lockEndTime: number; at: number }
  | { type: "admin:burned"; owner: string; asset: string; amount: bigint; at: number }
  | { type: "admin:reward-pool-refilled"; amount: bigint; rewardPool: bigint; at: number }
  | { type: "admin:parameters-updated"; apy: bigint; feePercent: bigint; at: number }
  | { type: "admin:funds-withdrawn"; amount: bigint; to: string; at: number }
  | { type: "admin:stage-updated"; index: number; price: bigint; at: number };

export type PresaleEventType = PresaleEvent["type"];

// ============================================
// EMITTER CHANNELS
// ============================================

export interface OperationFailure {
  operation: OperationName;
  caller: string;
  /** Unset when the clock sample itself was rejected */
  at?: number;
  error: ErrorResponse;
}

export interface PresaleEngineEvents {
  committed: (event: PresaleEvent) => void;
  failed: (failure: OperationFailure) => void;
}
