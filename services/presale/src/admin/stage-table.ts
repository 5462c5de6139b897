/**
 * Presale Stage Table
 *
 * Fixed 8-entry pricing schedule. Indexes are 0-based and checked at the
 * boundary; the stored `stage` number is index + 1.
 */

import {
  INITIAL_STAGE_SCHEDULE,
  STAGE_COUNT,
  StakelineError,
  type StageUpdate,
} from "@stakeline/shared";
import type { PresaleStage } from "../types.js";

// ============================================
// INDEX
// ============================================

export function assertStageIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= STAGE_COUNT) {
    throw new StakelineError("InvalidStageIndex", undefined, { index, stageCount: STAGE_COUNT });
  }
}

// ============================================
// STAGE TABLE
// ============================================

export class PresaleStageTable {
  private readonly stages: PresaleStage[];

  constructor(stages: PresaleStage[]) {
    if (stages.length !== STAGE_COUNT) {
      throw new Error(`Stage table must hold exactly ${STAGE_COUNT} entries, got ${stages.length}`);
    }
    this.stages = stages;
  }

  static initial(): PresaleStage[] {
    return INITIAL_STAGE_SCHEDULE.map((seed, index) => ({
      stage: index + 1,
      price: seed.price,
      tokensSold: seed.tokensSold,
      totalRaised: seed.totalRaised,
    }));
  }

  get(index: number): PresaleStage {
    assertStageIndex(index);
    return { ...this.stages[index] };
  }

  update(index: number, update: Omit<StageUpdate, "index">): PresaleStage {
    assertStageIndex(index);
    const entry: PresaleStage = {
      stage: index + 1,
      price: update.price,
      tokensSold: update.tokensSold,
      totalRaised: update.totalRaised,
    };
    this.stages[index] = entry;
    return { ...entry };
  }

  entries(): PresaleStage[] {
    return this.stages.map((stage) => ({ ...stage }));
  }
}
