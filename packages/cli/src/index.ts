#!/usr/bin/env node

import { SuffixAutomatonError } from "@sfx/automaton";
import { createStructuredLogger } from "@sfx/shared";
import { parseCliArgs, printUsage } from "./args";
import { processCommand } from "./processor";
import { UsageError } from "./types";

const log = createStructuredLogger("cli");

async function main() {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.command === "help") {
    printUsage();
    return;
  }

  const result = await processCommand(options);
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

// Run the CLI
main().catch((error: unknown) => {
  if (error instanceof UsageError) {
    console.error(`sfx: ${error.message}`);
    printUsage();
  } else if (error instanceof SuffixAutomatonError) {
    log.error("Automaton error", error);
    console.error(`sfx: ${error.message}`);
  } else {
    console.error("Unexpected error:", error);
  }
  process.exit(1);
});
