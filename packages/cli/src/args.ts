import { parseArgs } from "node:util";
import { z } from "zod";
import {
  commands,
  patternCommands,
  UsageError,
  type CliOptions,
} from "./types";

export function printUsage(): void {
  console.log(`
sfx - Build a suffix automaton over a text and query it

Usage:
  sfx <command> [pattern] (--text <string> | --file <path>) [options]

Commands:
  stats                 Symbols, states, transitions and distinct substrings
  contains <pattern>    Whether the pattern occurs anywhere
  suffix <pattern>      Whether the text ends with the pattern
  count <pattern>       Number of occurrences (overlaps included)
  first <pattern>       0-based start of the leftmost occurrence, -1 if absent
  dump                  Every state with its link and transitions
  help                  Show this help

Options:
  --text <string>       Text to index
  --file, -f <path>     UTF-8 file to index
  --verbose, -v         Collect construction metrics and log progress
  --help, -h            Show this help

Environment Variables:
  SFX_MAX_STATES        Upper bound on automaton states
  SFX_QUERY_CACHE_SIZE  Walk cache entries (0 disables it)
  LOG_LEVEL             pino level for stderr logs

Examples:
  sfx count ana --text banana
  sfx suffix "</html>" --file index.html
  sfx stats -f corpus.txt --verbose
`);
}

const optionsSchema = z
  .object({
    command: z.enum(commands),
    pattern: z.string().optional(),
    text: z.string().optional(),
    file: z.string().min(1).optional(),
    verbose: z.boolean(),
  })
  .superRefine((options, ctx) => {
    if (options.command === "help") return;

    if ((options.text === undefined) === (options.file === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["text"],
        message: "exactly one of --text or --file is required",
      });
    }

    if (patternCommands.has(options.command) && options.pattern === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pattern"],
        message: `${options.command} needs a pattern`,
      });
    }

    if (!patternCommands.has(options.command) && options.pattern !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pattern"],
        message: `${options.command} takes no pattern`,
      });
    }
  });

function tokenize(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        text: { type: "string" },
        file: { type: "string", short: "f" },
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = tokenize(argv);
  if (values.help) return { command: "help", verbose: false };
  if (positionals.length > 2) {
    throw new UsageError(`unexpected argument: ${positionals[2]}`);
  }

  const result = optionsSchema.safeParse({
    command: positionals[0] ?? "help",
    pattern: positionals[1],
    text: values.text,
    file: values.file,
    verbose: values.verbose ?? false,
  });

  if (!result.success) {
    throw new UsageError(
      result.error.issues.map((issue) => issue.message).join("; ")
    );
  }

  return result.data;
}
