import { createReadStream } from "node:fs";
import { Readable } from "node:stream";
import { TextDecoderStream, WritableStream } from "node:stream/web";
import {
  SuffixAutomaton,
  SuffixAutomatonStream,
  type ISuffixAutomatonConfig,
} from "@sfx/automaton";
import { createStructuredLogger } from "@sfx/shared";
import { UsageError, type CliOptions, type CommandResult } from "./types";

const log = createStructuredLogger("cli");

/**
 * Index `text` and finalize the automaton.
 */
export function buildFromText(
  text: string,
  config?: ISuffixAutomatonConfig
): SuffixAutomaton {
  const automaton = SuffixAutomaton.from(text, config);
  automaton.finalize();
  return automaton;
}

/**
 * Stream a UTF-8 file through the automaton; the stream finalizes it on close.
 */
export async function buildFromFile(
  path: string,
  config?: ISuffixAutomatonConfig
): Promise<SuffixAutomaton> {
  const automaton = new SuffixAutomaton(config);
  const adapter = new SuffixAutomatonStream(automaton);

  // Drain extension records so the readable side never backs up
  await Promise.all([
    adapter.readable.pipeTo(new WritableStream()),
    Readable.toWeb(createReadStream(path))
      .pipeThrough(new TextDecoderStream())
      .pipeTo(adapter.writable),
  ]);

  return automaton;
}

export function runCommand(
  automaton: SuffixAutomaton,
  options: CliOptions
): CommandResult {
  const pattern = options.pattern ?? "";

  switch (options.command) {
    case "contains":
      return {
        command: "contains",
        pattern,
        result: automaton.containsSubstring(pattern),
      };
    case "suffix":
      return { command: "suffix", pattern, result: automaton.isSuffix(pattern) };
    case "count":
      return {
        command: "count",
        pattern,
        result: automaton.occurrenceCount(pattern),
      };
    case "first":
      return {
        command: "first",
        pattern,
        result: automaton.firstOccurrence(pattern),
      };
    case "dump":
      return { command: "dump", ...automaton.toJSON() };
    case "help":
      throw new UsageError("help is not a query");
    case "stats": {
      const metrics = automaton.stats;
      return {
        command: "stats",
        symbols: automaton.symbolsConsumed,
        states: automaton.size,
        transitions: automaton.transitionCount,
        distinctSubstrings: automaton.countDistinctSubstrings(),
        ...(metrics ? { metrics } : {}),
      };
    }
  }
}

/**
 * Build the automaton from the chosen input and answer one command.
 */
export async function processCommand(
  options: CliOptions
): Promise<CommandResult> {
  const config: ISuffixAutomatonConfig = options.verbose
    ? { monitor: { mode: "extended" } }
    : {};

  const { file, text } = options;
  const automaton =
    file !== undefined
      ? await log.timed("index file", () => buildFromFile(file, config), {
          file,
        })
      : buildFromText(text ?? "", config);

  if (options.verbose) {
    log.info("Built automaton", {
      symbols: automaton.symbolsConsumed,
      states: automaton.size,
      transitions: automaton.transitionCount,
    });
  }

  return runCommand(automaton, options);
}
