// Argument parsing for the bgjob CLI

import { UsageError } from "./errors.ts";

export interface Options {
  name: string | null;
  json: boolean;
  limit: number | null;
  stripAnsi: boolean;
  help: boolean;
}

export interface ParsedArgs {
  command: string;
  positional: string[];
  options: Options;
}

// Subcommands whose trailing words form a shell command line. Option parsing
// stops at the first word of that command line so its own flags pass through.
const COMMAND_LINE_SUBCOMMANDS = new Set(["run", "start"]);

function parsePositiveInt(flag: string, value: string | undefined): number {
  if (value === undefined) throw new UsageError(`${flag} requires a value`);
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0 || String(n) !== value.trim()) {
    throw new UsageError(`${flag} expects a positive integer, got "${value}"`);
  }
  return n;
}

export function parseArgs(args: string[]): ParsedArgs {
  const options: Options = {
    name: null,
    json: false,
    limit: null,
    stripAnsi: false,
    help: false,
  };

  const positional: string[] = [];
  let command = "";

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--") {
      positional.push(...args.slice(i + 1));
      break;
    }
    if (command && COMMAND_LINE_SUBCOMMANDS.has(command) && positional.length > 0) {
      positional.push(...args.slice(i));
      break;
    }

    if (arg === "-h" || arg === "--help") {
      options.help = true;
    } else if (arg === "-n" || arg === "--name") {
      const value = args[++i];
      if (value === undefined) throw new UsageError(`${arg} requires a value`);
      options.name = value;
    } else if (arg === "-l" || arg === "--limit") {
      options.limit = parsePositiveInt(arg, args[++i]);
    } else if (arg === "--json") {
      options.json = true;
    } else if (arg === "--strip-ansi") {
      options.stripAnsi = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (!command) {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, options };
}

/** Join command-line words back into the single string handed to the shell. */
export function commandLine(positional: string[]): string {
  return positional.join(" ");
}
