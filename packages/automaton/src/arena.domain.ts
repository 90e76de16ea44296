export type StateId = number;

/** Id of the initial state; it represents the empty string. */
export const ROOT: StateId = 0;

/** Sentinel for "no state": the root's suffix link. */
export const NO_STATE: StateId = -1;

export type StateKind = "root" | "extension" | "clone";

/**
 * Read-only view of one state
 */
export interface IStateView {
  readonly id: StateId;
  readonly kind: StateKind;
  /** Length of the longest string in the state's class */
  readonly length: number;
  /** Suffix link, NO_STATE only for the root */
  readonly link: StateId;
  /** End index of the first occurrence of the class, -1 for the root */
  readonly firstEndPosition: number;
  readonly terminal: boolean;
  readonly transitions: ReadonlyMap<number, StateId>;
}

export interface IAllocateOptions {
  kind: Exclude<StateKind, "root">;
  firstEndPosition: number;
}

export interface IStateArenaConfig {
  /** Upper bound on the number of states, root included */
  maxStates?: number;
  /** Number of states the typed arrays are sized for up front */
  initialCapacity?: number;
}

/**
 * Append-only store of automaton states addressed by integer ids.
 * Ids stay valid for the lifetime of the arena (until `reset`).
 */
export interface IStateArena {
  /** Number of states, root included */
  readonly size: number;

  /** Number of transitions across all states */
  readonly transitionCount: number;

  readonly maxStates: number;

  /** Bumped by every structural mutation; used to invalidate derived data */
  readonly version: number;

  // ===== ALLOCATION =====

  /**
   * Create a state with the given length, no transitions and no link
   */
  allocate(length: number, options: IAllocateOptions): StateId;

  /**
   * Throw ArenaExhaustedError unless `count` more states fit
   */
  ensureAvailable(count: number): void;

  /**
   * Drop every state and recreate the root
   */
  reset(): void;

  // ===== READS =====

  get(id: StateId): IStateView;
  length(id: StateId): number;
  link(id: StateId): StateId;
  kind(id: StateId): StateKind;
  firstEndPosition(id: StateId): number;
  transition(id: StateId, symbol: number): StateId | undefined;
  isTerminal(id: StateId): boolean;

  // ===== WRITES =====

  setLink(id: StateId, link: StateId): void;
  setTransition(id: StateId, symbol: number, target: StateId): void;

  /**
   * Copy the transition mapping of `from` into `to` by value; later writes to
   * either map never show up in the other.
   */
  copyTransitions(from: StateId, to: StateId): void;

  setTerminal(id: StateId): void;
  clearTerminals(): void;
}

export function isIStateArena(obj: unknown): obj is IStateArena {
  if (typeof obj !== "object" || obj === null) return false;
  return (
    "allocate" in obj &&
    typeof obj.allocate === "function" &&
    "ensureAvailable" in obj &&
    typeof obj.ensureAvailable === "function" &&
    "copyTransitions" in obj &&
    typeof obj.copyTransitions === "function" &&
    "version" in obj &&
    typeof obj.version === "number"
  );
}
