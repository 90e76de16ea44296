/**
 * Anything the automaton can consume or be queried with: text is read as
 * Unicode code points, one symbol per logical character.
 */
export type Sequence = string | ArrayLike<number>;

export function toSymbols(sequence: Sequence): number[] {
  if (typeof sequence !== "string") return Array.from(sequence);

  const symbols: number[] = [];
  for (let i = 0; i < sequence.length; ) {
    const cp = sequence.codePointAt(i) ?? 0;
    symbols.push(cp);
    i += cp > 0xffff ? 2 : 1;
  }
  return symbols;
}

/** Inverse of `toSymbols` for symbols that are valid code points. */
export function fromSymbols(symbols: ArrayLike<number>): string {
  let out = "";
  for (let i = 0; i < symbols.length; i++) {
    out += String.fromCodePoint(symbols[i]);
  }
  return out;
}

export function isSymbol(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

/** Stable cache key for a symbol sequence. */
export function sequenceKey(symbols: ArrayLike<number>): string {
  return Array.from(symbols).join(",");
}
