#!/usr/bin/env node
import { parseArgs } from "./parse-args.js";
import { runDerive, runHelp, runPlan } from "./commands.js";

function main(): number {
  const result = parseArgs(process.argv);

  if (!result.ok) {
    console.error(`Error: ${result.error.error}`);
    if (result.error.usage) {
      console.error(result.error.usage);
    }
    return 1;
  }

  const { args } = result;

  switch (args.command) {
    case "help":
      return runHelp(args);
    case "derive":
      return runDerive(args);
    case "plan":
      return runPlan(args);
  }
}

try {
  process.exitCode = main();
} catch (err: unknown) {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
