import type {
  CounterType,
  IStats,
  ISuffixAutomatonMonitor,
  ISuffixAutomatonMonitorConfig,
  MonitorMode,
} from "./monitor.domain";

const counterTypes: readonly CounterType[] = [
  "symbolsIn",
  "statesAllocated",
  "clonesCreated",
  "transitionsAdded",
  "transitionsRedirected",
  "suffixLinkSteps",
  "queries",
  "queryHits",
  "cacheHits",
  "countPropagations",
];

// Tracked in every mode
const basicCounters: ReadonlySet<CounterType> = new Set<CounterType>([
  "symbolsIn",
  "statesAllocated",
  "clonesCreated",
  "queries",
]);

const zeroCounters = (): Record<CounterType, number> => ({
  symbolsIn: 0,
  statesAllocated: 0,
  clonesCreated: 0,
  transitionsAdded: 0,
  transitionsRedirected: 0,
  suffixLinkSteps: 0,
  queries: 0,
  queryHits: 0,
  cacheHits: 0,
  countPropagations: 0,
});

const ratio = (numerator: number, denominator: number) =>
  denominator ? numerator / denominator : 0;

/**
 * Monitor with batched counter updates
 * Keeps the extend hot path to one addition per counter; pending updates are
 * applied every `batchSize` increments or whenever counters are read.
 */
export class SuffixAutomatonMonitor implements ISuffixAutomatonMonitor {
  readonly _config: ISuffixAutomatonMonitorConfig;
  readonly _mode: MonitorMode;
  readonly _batchSize: number;
  private _batchCount = 0;
  private _timeStart: number | null = null;

  // Current counter values
  private _counters = zeroCounters();

  // Batched pending updates
  private _pending = zeroCounters();

  constructor({
    mode = "performance-only",
    batchSize = 1000,
  }: ISuffixAutomatonMonitorConfig = {}) {
    this._mode = mode;
    this._batchSize = Math.max(1, batchSize);
    this._config = { mode, batchSize: this._batchSize };
  }

  start(): void {
    if (this._timeStart !== null) return;
    this._timeStart = performance.now();
  }

  increment(counter: CounterType, amount = 1): void {
    if (this._mode !== "extended" && !basicCounters.has(counter)) return;

    this._pending[counter] += amount;
    this._batchCount++;

    if (this._batchCount >= this._batchSize) this.flush();
  }

  getCounters(): Record<CounterType, number> {
    this.flush(); // Ensure all pending updates are included
    return { ...this._counters };
  }

  reset(): void {
    this._counters = zeroCounters();
    this._pending = zeroCounters();
    this._batchCount = 0;
    this._timeStart = null;
  }

  flush(): void {
    if (this._batchCount === 0) return;

    for (const counter of counterTypes) {
      this._counters[counter] += this._pending[counter];
      this._pending[counter] = 0;
    }

    this._batchCount = 0;
  }

  get config(): ISuffixAutomatonMonitorConfig {
    return this._config;
  }

  get stats(): IStats | null {
    if (this._timeStart === null) return null;
    const durationMS = performance.now() - this._timeStart;
    const counters = this.getCounters();

    return {
      durationMS,
      symbolsIn: counters.symbolsIn,
      statesAllocated: counters.statesAllocated,
      clonesCreated: counters.clonesCreated,
      statesPerSymbol: ratio(counters.statesAllocated, counters.symbolsIn),
      clonesPerSymbol: ratio(counters.clonesCreated, counters.symbolsIn),

      transitionsAdded: counters.transitionsAdded,
      transitionsRedirected: counters.transitionsRedirected,
      avgSuffixLinkSteps: ratio(counters.suffixLinkSteps, counters.symbolsIn),

      queries: counters.queries,
      queryHitRate: ratio(counters.queryHits, counters.queries),
      cacheHitRate: ratio(counters.cacheHits, counters.queries),
      countPropagations: counters.countPropagations,
    };
  }
}

export class NoOpSuffixAutomatonMonitor implements ISuffixAutomatonMonitor {
  readonly _config: ISuffixAutomatonMonitorConfig = {
    mode: "disabled",
    batchSize: 1000,
  };
  readonly _mode: MonitorMode = "disabled";
  readonly _batchSize: number = 1000;

  increment(_counter: CounterType, _amount = 1): void {
    // No-op
  }

  getCounters(): Record<CounterType, number> {
    return zeroCounters();
  }

  reset(): void {
    // No-op
  }

  flush(): void {
    // No-op
  }

  start(): void {
    // No-op
  }

  get stats(): IStats | null {
    return null;
  }

  get config(): ISuffixAutomatonMonitorConfig {
    return this._config;
  }
}
