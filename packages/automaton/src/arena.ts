import { logger } from "@sfx/shared";
import {
  NO_STATE,
  ROOT,
  type IAllocateOptions,
  type IStateArena,
  type IStateArenaConfig,
  type IStateView,
  type StateId,
  type StateKind,
} from "./arena.domain";
import { ArenaExhaustedError } from "./errors";

// Int32Array index range
export const MAX_ADDRESSABLE_STATES = 0x7fffffff;

const KIND_ROOT = 0;
const KIND_EXTENSION = 1;
const KIND_CLONE = 2;

const kindNames: readonly StateKind[] = ["root", "extension", "clone"];

/**
 * Flat state arena
 * - Typed arrays for length/link/kind/firstEnd/terminal with exponential growth
 * - One Map per state for transitions, so the alphabet is open and a clone's
 *   mapping is a copy, never an alias
 */
export class StateArena implements IStateArena {
  readonly maxStates: number;
  private readonly _initialCapacity: number;

  private _size = 0;
  private _transitionCount = 0;
  private _version = 0;

  // Per-state metadata (grown as needed)
  private capacity: number;
  private lengths: Int32Array;
  private links: Int32Array;
  private kinds: Uint8Array;
  private firstEnds: Int32Array;
  private terminal: Uint8Array;
  private transitions: Map<number, StateId>[] = [];

  constructor({ maxStates, initialCapacity = 1024 }: IStateArenaConfig = {}) {
    this.maxStates = Math.min(
      Math.max(1, maxStates ?? MAX_ADDRESSABLE_STATES),
      MAX_ADDRESSABLE_STATES
    );
    this._initialCapacity = Math.max(
      1,
      Math.min(initialCapacity, this.maxStates)
    );

    this.capacity = this._initialCapacity;
    this.lengths = new Int32Array(this.capacity);
    this.links = new Int32Array(this.capacity);
    this.kinds = new Uint8Array(this.capacity);
    this.firstEnds = new Int32Array(this.capacity);
    this.terminal = new Uint8Array(this.capacity);

    this.createRoot();
  }

  // ---- helpers ----

  private createRoot(): void {
    this.transitions.push(new Map());
    this.lengths[ROOT] = 0;
    this.links[ROOT] = NO_STATE;
    this.kinds[ROOT] = KIND_ROOT;
    this.firstEnds[ROOT] = -1;
    this._size = 1;
  }

  private ensureCapacity(minIdExclusive: number): void {
    if (minIdExclusive < this.capacity) return;
    let cap = this.capacity;
    while (cap <= minIdExclusive) cap *= 2;
    cap = Math.min(cap, this.maxStates);

    const len = new Int32Array(cap);
    len.set(this.lengths);
    this.lengths = len;

    const ln = new Int32Array(cap);
    ln.set(this.links);
    this.links = ln;

    const k = new Uint8Array(cap);
    k.set(this.kinds);
    this.kinds = k;

    const fe = new Int32Array(cap);
    fe.set(this.firstEnds);
    this.firstEnds = fe;

    const t = new Uint8Array(cap);
    t.set(this.terminal);
    this.terminal = t;

    logger.arena.debug("Grew state arena", {
      from: this.capacity,
      to: cap,
    });
    this.capacity = cap;
  }

  private assertState(id: StateId): void {
    if (!Number.isInteger(id) || id < 0 || id >= this._size) {
      throw new RangeError(`StateArena: unknown state ${id}`);
    }
  }

  // ---- Allocation ----

  get size(): number {
    return this._size;
  }

  get transitionCount(): number {
    return this._transitionCount;
  }

  get version(): number {
    return this._version;
  }

  ensureAvailable(count: number): void {
    if (this._size + count > this.maxStates) {
      logger.arena.error("State arena exhausted", {
        size: this._size,
        requested: count,
        maxStates: this.maxStates,
      });
      throw new ArenaExhaustedError(this.maxStates, count);
    }
  }

  allocate(length: number, { kind, firstEndPosition }: IAllocateOptions): StateId {
    this.ensureAvailable(1);

    const id = this._size;
    this.ensureCapacity(id);

    this.lengths[id] = length;
    this.links[id] = NO_STATE;
    this.kinds[id] = kind === "clone" ? KIND_CLONE : KIND_EXTENSION;
    this.firstEnds[id] = firstEndPosition;
    this.terminal[id] = 0;
    this.transitions.push(new Map());

    this._size++;
    this._version++;
    return id;
  }

  reset(): void {
    this.capacity = this._initialCapacity;
    this.lengths = new Int32Array(this.capacity);
    this.links = new Int32Array(this.capacity);
    this.kinds = new Uint8Array(this.capacity);
    this.firstEnds = new Int32Array(this.capacity);
    this.terminal = new Uint8Array(this.capacity);
    this.transitions = [];
    this._transitionCount = 0;
    this._version++;

    this.createRoot();
  }

  // ---- Reads ----

  get(id: StateId): IStateView {
    this.assertState(id);
    return {
      id,
      kind: this.kind(id),
      length: this.lengths[id],
      link: this.links[id],
      firstEndPosition: this.firstEnds[id],
      terminal: this.terminal[id] === 1,
      transitions: new Map(this.transitions[id]),
    };
  }

  length(id: StateId): number {
    return this.lengths[id];
  }

  link(id: StateId): StateId {
    return this.links[id];
  }

  kind(id: StateId): StateKind {
    return kindNames[this.kinds[id]];
  }

  firstEndPosition(id: StateId): number {
    return this.firstEnds[id];
  }

  /** Target of `id` on `symbol`, or undefined if the edge doesn't exist. */
  transition(id: StateId, symbol: number): StateId | undefined {
    return this.transitions[id]?.get(symbol);
  }

  isTerminal(id: StateId): boolean {
    return this.terminal[id] === 1;
  }

  // ---- Writes ----

  setLink(id: StateId, link: StateId): void {
    this.links[id] = link;
    this._version++;
  }

  setTransition(id: StateId, symbol: number, target: StateId): void {
    const edges = this.transitions[id];
    if (!edges.has(symbol)) this._transitionCount++;
    edges.set(symbol, target);
    this._version++;
  }

  copyTransitions(from: StateId, to: StateId): void {
    const source = this.transitions[from];
    const edges = this.transitions[to];
    for (const [symbol, target] of source) {
      if (!edges.has(symbol)) this._transitionCount++;
      edges.set(symbol, target);
    }
    this._version++;
  }

  setTerminal(id: StateId): void {
    this.terminal[id] = 1;
  }

  clearTerminals(): void {
    this.terminal.fill(0);
  }
}
