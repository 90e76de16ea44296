/**
 * Counter types for automaton monitoring
 */
export type CounterType =
  // Construction metrics
  | "symbolsIn"
  | "statesAllocated"
  | "clonesCreated"
  | "transitionsAdded"
  | "transitionsRedirected"
  | "suffixLinkSteps"

  // Query metrics
  | "queries"
  | "queryHits"
  | "cacheHits"
  | "countPropagations";

export type MonitorMode = "disabled" | "performance-only" | "extended";

/**
 * Derived construction and query metrics
 */
export interface IStats {
  // Basic performance
  durationMS: number;
  symbolsIn: number;
  statesAllocated: number;
  clonesCreated: number;
  statesPerSymbol: number;
  clonesPerSymbol: number;

  // Extension work
  transitionsAdded: number;
  transitionsRedirected: number;
  avgSuffixLinkSteps: number;

  // Queries
  queries: number;
  queryHitRate: number;
  cacheHitRate: number;
  countPropagations: number;
}

/**
 * Interface for automaton monitoring with batched counter updates
 */
export interface ISuffixAutomatonMonitor {
  readonly _config: ISuffixAutomatonMonitorConfig;
  readonly _mode: MonitorMode;
  readonly _batchSize: number;

  /**
   * Increment a counter by the specified amount
   */
  increment(counter: CounterType, amount?: number): void;

  /**
   * Get current counter values (forces flush of pending updates)
   */
  getCounters(): Record<CounterType, number>;

  /**
   * Reset all counters to zero
   */
  reset(): void;

  /**
   * Force flush any pending counter updates
   */
  flush(): void;

  /**
   * Start tracking time. This will skip if there's already a running timer
   */
  start(): void;

  /**
   * Get current stats, null until the first symbol arrives
   */
  readonly stats: IStats | null;

  readonly config: ISuffixAutomatonMonitorConfig;
}

export interface ISuffixAutomatonMonitorConfig {
  mode?: MonitorMode;
  batchSize?: number;
}

export function isISuffixAutomatonMonitor(
  obj: unknown
): obj is ISuffixAutomatonMonitor {
  if (typeof obj !== "object" || obj === null) return false;
  return (
    "increment" in obj &&
    typeof obj.increment === "function" &&
    "getCounters" in obj &&
    typeof obj.getCounters === "function" &&
    "start" in obj &&
    typeof obj.start === "function"
  );
}
