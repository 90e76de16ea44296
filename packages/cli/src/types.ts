import type { ISuffixAutomatonSnapshot, IStats } from "@sfx/automaton";

export const commands = [
  "stats",
  "contains",
  "suffix",
  "count",
  "first",
  "dump",
  "help",
] as const;

export type Command = (typeof commands)[number];

// Commands that take a pattern argument
export const patternCommands: ReadonlySet<Command> = new Set<Command>([
  "contains",
  "suffix",
  "count",
  "first",
]);

export interface CliOptions {
  command: Command;
  pattern?: string;
  text?: string;
  file?: string;
  verbose: boolean;
}

/** Bad arguments; the CLI prints usage and exits 1. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface StatsResult {
  command: "stats";
  symbols: number;
  states: number;
  transitions: number;
  distinctSubstrings: number;
  metrics?: IStats;
}

export interface PatternResult<C extends Command, T> {
  command: C;
  pattern: string;
  result: T;
}

export type CommandResult =
  | StatsResult
  | PatternResult<"contains" | "suffix", boolean>
  | PatternResult<"count" | "first", number>
  | ({ command: "dump" } & ISuffixAutomatonSnapshot);
