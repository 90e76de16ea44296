/**
 * Base class for every error raised by the automaton. Missing transitions
 * during a query are negative results, never errors.
 */
export class SuffixAutomatonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SuffixAutomatonError";
  }
}

/** `extend` was called while the automaton is frozen. */
export class AutomatonFrozenError extends SuffixAutomatonError {
  constructor() {
    super("Automaton is frozen: call thaw() before extending it again.");
    this.name = "AutomatonFrozenError";
  }
}

/** A suffix query ran before `finalize()` marked the terminal states. */
export class NotFinalizedError extends SuffixAutomatonError {
  constructor(operation: string) {
    super(`${operation} requires finalize() to be called first.`);
    this.name = "NotFinalizedError";
  }
}

export class InvalidSymbolError extends SuffixAutomatonError {
  readonly symbol: unknown;

  constructor(symbol: unknown) {
    super(`Invalid symbol ${String(symbol)}: symbols must be safe integers.`);
    this.name = "InvalidSymbolError";
    this.symbol = symbol;
  }
}

/**
 * The arena cannot hold the requested states. Fatal: the automaton built so
 * far stays consistent but cannot grow.
 */
export class ArenaExhaustedError extends SuffixAutomatonError {
  readonly maxStates: number;
  readonly requested: number;

  constructor(maxStates: number, requested: number) {
    super(
      `State arena exhausted: ${requested} more state(s) requested, limit is ${maxStates}.`
    );
    this.name = "ArenaExhaustedError";
    this.maxStates = maxStates;
    this.requested = requested;
  }
}
