import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { test, expect, describe, beforeAll, afterAll } from "vitest";
import { buildFromFile, buildFromText, processCommand, runCommand } from "../processor";
import { UsageError } from "../types";

describe("processCommand over text", () => {
  test("counts overlapping occurrences", async () => {
    await expect(
      processCommand({
        command: "count",
        pattern: "ana",
        text: "banana",
        verbose: false,
      })
    ).resolves.toEqual({ command: "count", pattern: "ana", result: 2 });
  });

  test("answers suffix, contains and first", async () => {
    const base = { text: "banana", verbose: false };

    expect(
      await processCommand({ ...base, command: "suffix", pattern: "na" })
    ).toEqual({ command: "suffix", pattern: "na", result: true });
    expect(
      await processCommand({ ...base, command: "contains", pattern: "nab" })
    ).toEqual({ command: "contains", pattern: "nab", result: false });
    expect(
      await processCommand({ ...base, command: "first", pattern: "nan" })
    ).toEqual({ command: "first", pattern: "nan", result: 2 });
  });

  test("reports automaton size", async () => {
    expect(
      await processCommand({ command: "stats", text: "banana", verbose: false })
    ).toEqual({
      command: "stats",
      symbols: 6,
      states: 10,
      transitions: 11,
      distinctSubstrings: 15,
    });
  });

  test("adds construction metrics when verbose", async () => {
    const result = await processCommand({
      command: "stats",
      text: "banana",
      verbose: true,
    });

    if (result.command !== "stats") throw new Error("expected stats");
    expect(result.metrics?.symbolsIn).toBe(6);
    expect(result.metrics?.statesAllocated).toBe(9);
    expect(result.metrics?.clonesCreated).toBe(3);
  });

  test("dumps the finalized automaton", async () => {
    const result = await processCommand({
      command: "dump",
      text: "ab",
      verbose: false,
    });

    if (result.command !== "dump") throw new Error("expected dump");
    expect(result.phase).toBe("frozen");
    expect(result.symbolsConsumed).toBe(2);
    expect(result.states.map((s) => s.terminal)).toEqual([true, false, true]);
  });
});

describe("file input", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "sfx-cli-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("streams the file through the automaton", async () => {
    const file = join(dir, "rockets.txt");
    await writeFile(file, "🚀a🚀", "utf8");

    const automaton = await buildFromFile(file);
    expect(automaton.phase).toBe("frozen");
    expect(automaton.symbolsConsumed).toBe(3);
    expect(automaton.occurrenceCount("🚀")).toBe(2);
    expect(automaton.isSuffix("a🚀")).toBe(true);
  });

  test("answers commands like inline text", async () => {
    const file = join(dir, "banana.txt");
    await writeFile(file, "banana", "utf8");

    expect(
      await processCommand({
        command: "count",
        pattern: "an",
        file,
        verbose: false,
      })
    ).toEqual({ command: "count", pattern: "an", result: 2 });
  });

  test("propagates read errors", async () => {
    await expect(
      processCommand({
        command: "stats",
        file: join(dir, "missing.txt"),
        verbose: false,
      })
    ).rejects.toMatchObject({ code: "ENOENT" });
  });
});

test("help is not a query", () => {
  expect(() =>
    runCommand(buildFromText("ab"), { command: "help", verbose: false })
  ).toThrow(UsageError);
});
