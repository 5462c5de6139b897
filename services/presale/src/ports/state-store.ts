/**
 * State Store
 *
 * Holds the committed EngineState. Operations read a private copy and hand
 * back a complete replacement on success.
 */

import type {
  EngineState,
  GlobalState,
  PresaleStage,
  PresaleState,
  StakeAccount,
} from "../types.js";

// ============================================
// STORE INTERFACE
// ============================================

export interface StateStore {
  /** Returns a deep copy of the committed state */
  read(): Promise<EngineState>;

  /** Replaces the committed state */
  commit(state: EngineState): Promise<void>;
}

// ============================================
// COPY HELPERS
// ============================================

export function clonePresaleState(state: PresaleState): PresaleState {
  return { ...state };
}

export function cloneGlobalState(state: GlobalState): GlobalState {
  return { ...state };
}

export function cloneStakeAccount(account: StakeAccount): StakeAccount {
  return { ...account };
}

export function cloneStages(stages: readonly PresaleStage[]): PresaleStage[] {
  return stages.map((stage) => ({ ...stage }));
}

export function cloneEngineState(state: EngineState): EngineState {
  const stakes = new Map<string, StakeAccount>();
  for (const [owner, account] of state.stakes) {
    stakes.set(owner, cloneStakeAccount(account));
  }

  return {
    presale: state.presale ? clonePresaleState(state.presale) : undefined,
    global: state.global ? cloneGlobalState(state.global) : undefined,
    stages: state.stages ? cloneStages(state.stages) : undefined,
    stakes,
  };
}

export function emptyEngineState(): EngineState {
  return { stakes: new Map() };
}

// ============================================
// IN-MEMORY STORE
// ============================================

export class InMemoryStateStore implements StateStore {
  private state: EngineState;
  private version = 0;

  constructor(initial?: EngineState) {
    this.state = initial ? cloneEngineState(initial) : emptyEngineState();
  }

  async read(): Promise<EngineState> {
    return cloneEngineState(this.state);
  }

  async commit(state: EngineState): Promise<void> {
    this.state = cloneEngineState(state);
    this.version++;
  }

  /** Number of commits so far */
  getVersion(): number {
    return this.version;
  }
}
