import { LRUCache } from "lru-cache";
import { logger } from "@sfx/shared";
import { StateArena } from "./arena";
import {
  NO_STATE,
  ROOT,
  isIStateArena,
  type IStateArena,
  type IStateView,
  type StateId,
} from "./arena.domain";
import {
  isIQueryCache,
  type IExtension,
  type IQueryCache,
  type ISuffixAutomaton,
  type ISuffixAutomatonConfig,
  type IStateSnapshot,
  type ISuffixAutomatonSnapshot,
  type Phase,
} from "./domain";
import { variables } from "./environment";
import {
  AutomatonFrozenError,
  InvalidSymbolError,
  NotFinalizedError,
  SuffixAutomatonError,
} from "./errors";
import { NoOpSuffixAutomatonMonitor, SuffixAutomatonMonitor } from "./monitor";
import {
  isISuffixAutomatonMonitor,
  type IStats,
  type ISuffixAutomatonMonitor,
} from "./monitor.domain";
import { QueryEngine } from "./query-engine";
import { isSymbol, toSymbols, type Sequence } from "./symbols";

/**
 * Online suffix automaton
 * - extend() appends one symbol in amortized O(1) map operations
 * - every prefix is a minimal DFA for the substrings consumed so far
 * - finalize() freezes it for suffix and occurrence queries
 */
export class SuffixAutomaton implements ISuffixAutomaton {
  private readonly _arena: IStateArena;
  private readonly _queries: QueryEngine;
  private readonly _monitor: ISuffixAutomatonMonitor;

  private _last: StateId = ROOT;
  private _phase: Phase = "mutable";

  static from(
    sequence: Sequence,
    config?: ISuffixAutomatonConfig
  ): SuffixAutomaton {
    return new SuffixAutomaton(config).extendAll(sequence);
  }

  // ---------- Construction ----------

  extend(symbol: number): IExtension {
    this.assertMutable();
    if (!isSymbol(symbol)) throw new InvalidSymbolError(symbol);

    const arena = this._arena;

    // Read-only walk up from last until some state already has an edge on
    // `symbol`; nothing is touched until the needed states are reserved
    let p: StateId = this._last;
    let q: StateId | undefined = arena.transition(p, symbol);
    while (q === undefined) {
      p = arena.link(p);
      if (p === NO_STATE) break;
      q = arena.transition(p, symbol);
    }
    const needsClone =
      q !== undefined && arena.length(q) !== arena.length(p) + 1;
    arena.ensureAvailable(needsClone ? 2 : 1);
    this._monitor.start();

    const position = arena.length(this._last);
    const cur = arena.allocate(position + 1, {
      kind: "extension",
      firstEndPosition: position,
    });

    let added = 0;
    let steps = 0;
    for (let r: StateId = this._last; r !== p; r = arena.link(r)) {
      arena.setTransition(r, symbol, cur);
      added++;
      steps++;
    }

    let clone: StateId | null = null;
    let redirected = 0;

    if (q === undefined) {
      arena.setLink(cur, ROOT);
    } else if (!needsClone) {
      arena.setLink(cur, q);
    } else {
      // q's class is too long to be cur's parent: split it
      clone = arena.allocate(arena.length(p) + 1, {
        kind: "clone",
        firstEndPosition: arena.firstEndPosition(q),
      });
      arena.copyTransitions(q, clone);
      arena.setLink(clone, arena.link(q));

      for (
        let r: StateId = p;
        r !== NO_STATE && arena.transition(r, symbol) === q;
        r = arena.link(r)
      ) {
        arena.setTransition(r, symbol, clone);
        redirected++;
        steps++;
      }

      arena.setLink(q, clone);
      arena.setLink(cur, clone);
    }

    this._last = cur;
    this.monitorExtension(added, redirected, steps, clone !== null);

    return { symbol, position, state: cur, clone };
  }

  extendAll(sequence: Sequence): this {
    this.assertMutable();
    const symbols = toSymbols(sequence);
    for (const symbol of symbols) {
      if (!isSymbol(symbol)) throw new InvalidSymbolError(symbol);
    }
    for (const symbol of symbols) this.extend(symbol);
    return this;
  }

  private assertMutable(): void {
    if (this._phase === "frozen") throw new AutomatonFrozenError();
  }

  // ---------- Lifecycle ----------

  finalize(): void {
    this._queries.markTerminals(this._last);
    this._queries.ensureCounts();
    this._phase = "frozen";

    logger.automaton.debug("Finalized automaton", {
      states: this._arena.size,
      transitions: this._arena.transitionCount,
      symbols: this.symbolsConsumed,
    });
  }

  thaw(): void {
    this._arena.clearTerminals();
    this._phase = "mutable";
    logger.automaton.debug("Thawed automaton", { states: this._arena.size });
  }

  clear(): void {
    this._arena.reset();
    this._last = ROOT;
    this._phase = "mutable";
    this._monitor.reset();
    logger.automaton.debug("Cleared automaton");
  }

  // ---------- Queries ----------

  containsSubstring(sequence: Sequence): boolean {
    return this._queries.containsSubstring(toSymbols(sequence));
  }

  isSuffix(sequence: Sequence): boolean {
    if (this._phase !== "frozen") throw new NotFinalizedError("isSuffix");
    return this._queries.isSuffix(toSymbols(sequence));
  }

  countDistinctSubstrings(): number {
    return this._queries.countDistinctSubstrings();
  }

  occurrenceCount(sequence: Sequence): number {
    return this._queries.occurrenceCount(toSymbols(sequence));
  }

  firstOccurrence(sequence: Sequence): number {
    return this._queries.firstOccurrence(toSymbols(sequence));
  }

  // ---------- Inspection ----------

  get phase(): Phase {
    return this._phase;
  }

  get size(): number {
    return this._arena.size;
  }

  get transitionCount(): number {
    return this._arena.transitionCount;
  }

  get symbolsConsumed(): number {
    return this._arena.length(this._last);
  }

  get last(): StateId {
    return this._last;
  }

  get stats(): IStats | null {
    return this._monitor.stats;
  }

  state(id: StateId): IStateView {
    return this._arena.get(id);
  }

  toJSON(): ISuffixAutomatonSnapshot {
    const states: IStateSnapshot[] = [];
    for (let id = 0; id < this._arena.size; id++) {
      const view = this._arena.get(id);
      states.push({
        id,
        kind: view.kind,
        length: view.length,
        link: view.link,
        firstEndPosition: view.firstEndPosition,
        terminal: view.terminal,
        transitions: [...view.transitions].sort((a, b) => a[0] - b[0]),
      });
    }
    return {
      phase: this._phase,
      symbolsConsumed: this.symbolsConsumed,
      last: this._last,
      states,
    };
  }

  // ---------- Monitor helpers ----------

  private monitorExtension(
    added: number,
    redirected: number,
    steps: number,
    cloned: boolean
  ) {
    this._monitor.increment("symbolsIn");
    this._monitor.increment("statesAllocated", cloned ? 2 : 1);
    if (cloned) this._monitor.increment("clonesCreated");
    this._monitor.increment("transitionsAdded", added);
    if (redirected) this._monitor.increment("transitionsRedirected", redirected);
    this._monitor.increment("suffixLinkSteps", steps);
  }

  // ---------- Ctor ----------

  constructor({ arena, cache, monitor }: ISuffixAutomatonConfig = {}) {
    const env = variables();

    if (isIStateArena(arena) && arena.size !== 1) {
      throw new SuffixAutomatonError(
        `Arena must hold only the root to start an automaton, found ${arena.size} states.`
      );
    }
    this._arena = isIStateArena(arena)
      ? arena
      : new StateArena({
          maxStates: arena?.maxStates ?? env.SFX_MAX_STATES,
          initialCapacity: arena?.initialCapacity,
        });

    // Monitor
    if (monitor === false) {
      this._monitor = new NoOpSuffixAutomatonMonitor();
    } else if (isISuffixAutomatonMonitor(monitor)) {
      this._monitor = monitor;
    } else {
      const mode = monitor?.mode ?? env.SFX_MONITOR_MODE;
      this._monitor =
        mode === "disabled"
          ? new NoOpSuffixAutomatonMonitor()
          : new SuffixAutomatonMonitor({
              mode,
              batchSize: monitor?.batchSize ?? env.SFX_MONITOR_BATCH_SIZE,
            });
    }

    // Walk cache
    let queryCache: IQueryCache | null = null;
    if (isIQueryCache(cache)) {
      queryCache = cache;
    } else if (cache !== false) {
      const size = cache?.size ?? env.SFX_QUERY_CACHE_SIZE;
      if (size > 0) queryCache = new LRUCache<string, number>({ max: size });
    }

    this._queries = new QueryEngine(this._arena, queryCache, this._monitor);
  }
}
