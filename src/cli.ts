#!/usr/bin/env tsx

// bgjob CLI - run shell commands inline or as tracked background jobs

import { parseArgs } from "./args.ts";
import { HELP, dispatch } from "./commands.ts";
import { loadConfig } from "./config.ts";
import { UsageError, errorMessage } from "./errors.ts";

async function main() {
  const args = process.argv.slice(2);

  try {
    const { command, positional, options } = parseArgs(args);
    if (args.length === 0 || options.help) {
      console.log(HELP);
      process.exit(0);
    }

    const code = await dispatch(command, positional, options, loadConfig());
    process.exit(code);
  } catch (err) {
    console.error("Error:", errorMessage(err));
    if (err instanceof UsageError) console.error("Run 'bgjob --help' for usage.");
    process.exit(1);
  }
}

void main();
