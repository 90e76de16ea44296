import { logger } from "@sfx/shared";
import {
  NO_STATE,
  ROOT,
  type IStateArena,
  type StateId,
} from "./arena.domain";
import type { IQueryCache } from "./domain";
import type { ISuffixAutomatonMonitor } from "./monitor.domain";
import { sequenceKey } from "./symbols";

/**
 * Read-only operations over a state arena. The only state it owns is derived
 * data (occurrence counts, walk cache), rebuilt whenever the arena version
 * moves.
 */
export class QueryEngine {
  private _occurrences = new Uint32Array(0);
  private _countsVersion = -1;
  private _cacheVersion: number;

  constructor(
    private readonly _arena: IStateArena,
    private readonly _cache: IQueryCache | null,
    private readonly _monitor: ISuffixAutomatonMonitor
  ) {
    this._cacheVersion = _arena.version;
  }

  /**
   * Follow transitions from the root; undefined at the first missing edge.
   */
  walk(symbols: ArrayLike<number>): StateId | undefined {
    this._monitor.increment("queries");

    const key = this._cache ? sequenceKey(symbols) : null;
    if (this._cache && key !== null) {
      if (this._cacheVersion !== this._arena.version) {
        this._cache.clear();
        this._cacheVersion = this._arena.version;
      }
      const cached = this._cache.get(key);
      if (cached !== undefined) {
        this._monitor.increment("cacheHits");
        return this.reached(cached);
      }
    }

    let state: StateId = ROOT;
    for (let i = 0; i < symbols.length; i++) {
      const next = this._arena.transition(state, symbols[i]);
      if (next === undefined) {
        state = NO_STATE;
        break;
      }
      state = next;
    }

    if (this._cache && key !== null) this._cache.set(key, state);
    return this.reached(state);
  }

  private reached(state: StateId): StateId | undefined {
    if (state === NO_STATE) return undefined;
    this._monitor.increment("queryHits");
    return state;
  }

  /**
   * Mark every state on the suffix-link path from `last` to the root,
   * the root included.
   */
  markTerminals(last: StateId): void {
    this._arena.clearTerminals();
    for (let p = last; p !== NO_STATE; p = this._arena.link(p)) {
      this._arena.setTerminal(p);
    }
  }

  containsSubstring(symbols: ArrayLike<number>): boolean {
    return this.walk(symbols) !== undefined;
  }

  isSuffix(symbols: ArrayLike<number>): boolean {
    const state = this.walk(symbols);
    return state !== undefined && this._arena.isTerminal(state);
  }

  countDistinctSubstrings(): number {
    let total = 0;
    for (let s = 1; s < this._arena.size; s++) {
      total += this._arena.length(s) - this._arena.length(this._arena.link(s));
    }
    return total;
  }

  occurrenceCount(symbols: ArrayLike<number>): number {
    const state = this.walk(symbols);
    if (state === undefined) return 0;
    this.ensureCounts();
    return this._occurrences[state];
  }

  firstOccurrence(symbols: ArrayLike<number>): number {
    const state = this.walk(symbols);
    if (state === undefined) return -1;
    if (symbols.length === 0) return 0;
    return this._arena.firstEndPosition(state) - symbols.length + 1;
  }

  /** Recompute occurrence counts if the arena changed since the last pass. */
  ensureCounts(): void {
    if (this._countsVersion === this._arena.version) return;
    this.propagateCounts();
  }

  /**
   * Extension states start at 1, clones and the root at 0; states are then
   * visited by decreasing length (counting sort) and each count is added to
   * its suffix link.
   */
  private propagateCounts(): void {
    const arena = this._arena;
    const size = arena.size;

    let maxLength = 0;
    for (let s = 0; s < size; s++) {
      if (arena.length(s) > maxLength) maxLength = arena.length(s);
    }

    const buckets = new Uint32Array(maxLength + 1);
    for (let s = 0; s < size; s++) buckets[arena.length(s)]++;
    for (let l = 1; l <= maxLength; l++) buckets[l] += buckets[l - 1];

    const order = new Int32Array(size);
    for (let s = size - 1; s >= 0; s--) order[--buckets[arena.length(s)]] = s;

    const occurrences = new Uint32Array(size);
    for (let s = 0; s < size; s++) {
      occurrences[s] = arena.kind(s) === "extension" ? 1 : 0;
    }
    for (let i = size - 1; i >= 0; i--) {
      const s = order[i];
      const link = arena.link(s);
      if (link !== NO_STATE) occurrences[link] += occurrences[s];
    }

    this._occurrences = occurrences;
    this._countsVersion = arena.version;
    this._monitor.increment("countPropagations");
    logger.query.debug("Propagated occurrence counts", { states: size });
  }
}
