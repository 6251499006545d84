/**
 * Command-line argument parsing for `codeway`
 */

import { parsePositiveInt } from "@codeway/core";

export interface CliOptions {
  files: string[];
  model?: string;
  maxTokens?: number;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export type ParsedArgs =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

export function parseArgs(args: string[]): ParsedArgs {
  const options: CliOptions = {
    files: [],
    verbose: false,
    help: false,
    version: false,
  };
  let positionalOnly = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (positionalOnly || arg === "-" || !arg.startsWith("-")) {
      options.files.push(arg);
      continue;
    }

    // --model=NAME and --max-tokens=N carry their value inline
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inline = eq > 0 ? arg.slice(eq + 1) : undefined;
    const value = inline ?? next;
    const consumed = inline === undefined ? 1 : 0;

    switch (flag) {
      case "--":
        positionalOnly = true;
        break;
      case "--model":
        if (!value || (inline === undefined && value.startsWith("-"))) {
          return { ok: false, error: "--model requires a model name" };
        }
        options.model = value;
        i += consumed;
        break;
      case "--max-tokens": {
        const parsed = value === undefined ? undefined : parsePositiveInt(value);
        if (parsed === undefined) {
          return {
            ok: false,
            error: `--max-tokens requires a positive integer (got ${value || "nothing"})`,
          };
        }
        options.maxTokens = parsed;
        i += consumed;
        break;
      }
      case "-v":
      case "--verbose":
      case "-h":
      case "--help":
      case "--version":
        if (inline !== undefined) {
          return { ok: false, error: `${flag} does not take a value` };
        }
        if (flag === "-v" || flag === "--verbose") {
          options.verbose = true;
        } else if (flag === "--version") {
          options.version = true;
        } else {
          options.help = true;
        }
        break;
      default:
        return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  if (!options.help && !options.version && options.files.length === 0) {
    return { ok: false, error: "At least one code file is required" };
  }

  return { ok: true, options };
}
