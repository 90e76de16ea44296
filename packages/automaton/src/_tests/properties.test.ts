import { test, expect, describe } from "vitest";
import { SuffixAutomaton } from "../suffix-automaton";
import { NO_STATE } from "../arena.domain";

// Every string of exactly `length` symbols over `alphabet`
function* allStrings(alphabet: string, length: number): Generator<string> {
  if (length === 0) {
    yield "";
    return;
  }
  for (const prefix of allStrings(alphabet, length - 1)) {
    for (const symbol of alphabet) yield prefix + symbol;
  }
}

// Brute force: substring -> sorted end positions
function endPositions(text: string): Map<string, number[]> {
  const ends = new Map<string, number[]>();
  for (let start = 0; start < text.length; start++) {
    for (let end = start + 1; end <= text.length; end++) {
      const sub = text.slice(start, end);
      const list = ends.get(sub) ?? [];
      list.push(end - 1);
      ends.set(sub, list);
    }
  }
  return ends;
}

function expectStructure(sam: SuffixAutomaton, text: string) {
  const n = text.length;
  const ends = endPositions(text);

  expect(sam.countDistinctSubstrings()).toBe(ends.size);

  // Minimal: one state per distinct end-position set, plus the root
  const classes = new Set<string>();
  for (const list of ends.values()) classes.add(list.join(","));
  expect(sam.size).toBe(classes.size + 1);

  if (n >= 2) expect(sam.size).toBeLessThanOrEqual(2 * n - 1);
  if (n >= 3) expect(sam.transitionCount).toBeLessThanOrEqual(3 * n - 4);

  for (let id = 0; id < sam.size; id++) {
    const state = sam.state(id);
    if (id === 0) {
      expect(state.link).toBe(NO_STATE);
      expect(state.length).toBe(0);
    } else {
      expect(sam.state(state.link).length).toBeLessThan(state.length);
    }
  }
}

function expectQueries(sam: SuffixAutomaton, text: string, alphabet: string) {
  const ends = endPositions(text);

  for (const [sub, list] of ends) {
    expect(sam.containsSubstring(sub)).toBe(true);
    expect(sam.occurrenceCount(sub)).toBe(list.length);
    expect(sam.firstOccurrence(sub)).toBe(list[0] - sub.length + 1);
    expect(sam.isSuffix(sub)).toBe(text.endsWith(sub));
  }

  // Short strings that never occur
  for (let length = 1; length <= 3; length++) {
    for (const candidate of allStrings(alphabet, length)) {
      if (ends.has(candidate)) continue;
      expect(sam.containsSubstring(candidate)).toBe(false);
      expect(sam.occurrenceCount(candidate)).toBe(0);
      expect(sam.firstOccurrence(candidate)).toBe(-1);
    }
  }
}

describe.each([
  { alphabet: "ab", length: 8 },
  { alphabet: "abc", length: 6 },
  { alphabet: "abcd", length: 5 },
])("every string over \"$alphabet\" up to length $length", ({ alphabet, length }) => {
  test("stays minimal and within bounds after every extension", () => {
    for (const text of allStrings(alphabet, length)) {
      const sam = new SuffixAutomaton({ cache: false });
      for (let i = 0; i < text.length; i++) {
        sam.extend(text.charCodeAt(i));
        expectStructure(sam, text.slice(0, i + 1));
      }
    }
  });

  test("answers every query like brute force", () => {
    for (const text of allStrings(alphabet, length)) {
      const sam = SuffixAutomaton.from(text, { cache: false });
      sam.finalize();
      expectQueries(sam, text, alphabet);
    }
  });
});

test("a longer periodic input keeps the linear bounds", () => {
  const text = "abcab".repeat(40) + "cba".repeat(20);
  const sam = SuffixAutomaton.from(text);
  sam.finalize();

  expect(sam.size).toBeLessThanOrEqual(2 * text.length - 1);
  expect(sam.transitionCount).toBeLessThanOrEqual(3 * text.length - 4);
  expect(sam.countDistinctSubstrings()).toBe(endPositions(text).size);
  expect(sam.occurrenceCount("abcab")).toBe(40);
  expect(sam.isSuffix("cbacba")).toBe(true);
});
