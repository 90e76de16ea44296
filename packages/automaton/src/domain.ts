import type {
  IStateArena,
  IStateArenaConfig,
  IStateView,
  StateId,
  StateKind,
} from "./arena.domain";
import type {
  IStats,
  ISuffixAutomatonMonitor,
  ISuffixAutomatonMonitorConfig,
} from "./monitor.domain";
import type { Sequence } from "./symbols";

/**
 * Configuration interface for SuffixAutomaton instances
 */
export interface ISuffixAutomatonConfig {
  /** A fresh arena (root only) or the settings for one */
  arena?: IStateArenaConfig | IStateArena;
  /** Walk cache for repeated queries; `false` or size 0 disables it */
  cache?: IQueryCacheConfig | IQueryCache | false;
  monitor?: ISuffixAutomatonMonitor | ISuffixAutomatonMonitorConfig | false;
}

export type Phase = "mutable" | "frozen";

/**
 * Record of one `extend` call
 */
export interface IExtension {
  symbol: number;
  /** 0-based index of the symbol in the consumed input */
  position: number;
  /** The state created for the whole prefix */
  state: StateId;
  /** The clone split off during this extension, if any */
  clone: StateId | null;
}

export interface IStateSnapshot {
  id: StateId;
  kind: StateKind;
  length: number;
  link: StateId;
  firstEndPosition: number;
  terminal: boolean;
  transitions: [symbol: number, target: StateId][];
}

/**
 * Inspection dump of the whole automaton. Not a persistence format.
 */
export interface ISuffixAutomatonSnapshot {
  phase: Phase;
  symbolsConsumed: number;
  last: StateId;
  states: IStateSnapshot[];
}

/**
 * Interface for the online suffix automaton
 * Construction is single-writer; once frozen, every query is read-only.
 */
export interface ISuffixAutomaton {
  readonly phase: Phase;

  /** Number of states, root included */
  readonly size: number;

  readonly transitionCount: number;

  /** Length of the input consumed so far */
  readonly symbolsConsumed: number;

  /** The state representing the whole consumed input */
  readonly last: StateId;

  /**
   * Current construction/query metrics, null when monitoring is disabled or
   * nothing has been processed
   */
  readonly stats: IStats | null;

  /**
   * Append one symbol, keeping the automaton minimal for the longer input
   */
  extend(symbol: number): IExtension;

  /**
   * Append every symbol of a sequence
   */
  extendAll(sequence: Sequence): this;

  /**
   * Mark terminal states and freeze the automaton
   */
  finalize(): void;

  /**
   * Re-enter the mutable phase; terminal marks are dropped
   */
  thaw(): void;

  /**
   * Return to the empty automaton
   */
  clear(): void;

  containsSubstring(sequence: Sequence): boolean;

  /**
   * True if the sequence ends the input. Requires finalize().
   */
  isSuffix(sequence: Sequence): boolean;

  countDistinctSubstrings(): number;

  /**
   * Number of end positions of the sequence in the input, 0 if absent
   */
  occurrenceCount(sequence: Sequence): number;

  /**
   * 0-based start of the leftmost occurrence, -1 if absent
   */
  firstOccurrence(sequence: Sequence): number;

  state(id: StateId): IStateView;

  toJSON(): ISuffixAutomatonSnapshot;
}

export interface IQueryCacheConfig {
  size?: number;
}

/**
 * Memo of `sequence key -> reached state` (NO_STATE for misses).
 * Any LRU-style cache with this shape will do.
 */
export interface IQueryCache {
  get(key: string): StateId | undefined;
  set(key: string, state: StateId): unknown;
  clear(): void;
  readonly size: number;
}

export function isIQueryCache(obj: unknown): obj is IQueryCache {
  if (typeof obj !== "object" || obj === null) return false;
  return (
    "get" in obj &&
    typeof obj.get === "function" &&
    "set" in obj &&
    typeof obj.set === "function" &&
    "clear" in obj &&
    typeof obj.clear === "function" &&
    "size" in obj &&
    typeof obj.size === "number"
  );
}
