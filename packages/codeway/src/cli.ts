#!/usr/bin/env node
/**
 * codeway CLI - analyze code files with the Code Way framework via Claude
 *
 * Usage:
 *   codeway <file>... [--model NAME] [--max-tokens N] [-v|--verbose]
 */

import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

import {
  consoleOutput,
  createMessageSender,
  EXIT,
  type ExitCode,
  loadAnalysisConfig,
  loadEnvFile,
} from "@codeway/core";

import { runAnalysis } from "./analyze.js";
import { parseArgs } from "./args.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** The Code Way framework, shipped beside the sources */
export const FRAMEWORK_PATH = join(__dirname, "..", "prompts", "codeway.md");

function getVersion(): string {
  try {
    const pkgPath = join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function showHelp(): void {
  const defaults = loadAnalysisConfig();
  console.log(`
codeway - Analyze code files using the Code Way framework via the Claude API

Usage:
  codeway <file>... [options]

Options:
  --model <name>       Claude model to use (default: ${defaults.model})
  --max-tokens <n>     Maximum tokens for the analysis response (default: ${defaults.maxTokens})
  -v, --verbose        Print the prompts before sending them
  -h, --help           Show this help message
  --version            Show version

Environment:
  ANTHROPIC_API_KEY        Required. Read from .env in the current directory if unset
  CODEWAY_MODEL            Default model
  CODEWAY_MAX_TOKENS       Default response token budget
  CODEWAY_CONTEXT_WINDOW   Context window used for the size warning

Examples:
  codeway src/server.ts src/routes.ts
  codeway main.py --model claude-opus-4-20250514 --max-tokens 8000 -v
`);
}

async function main(): Promise<ExitCode> {
  const parsed = parseArgs(process.argv.slice(2));

  if (!parsed.ok) {
    console.error(`Error: ${parsed.error}`);
    console.error('Run "codeway --help" for usage');
    return EXIT.FAILURE;
  }

  const { options } = parsed;
  if (options.help) {
    showHelp();
    return EXIT.SUCCESS;
  }
  if (options.version) {
    console.log(getVersion());
    return EXIT.SUCCESS;
  }

  loadEnvFile(join(process.cwd(), ".env"));
  const defaults = loadAnalysisConfig();

  return runAnalysis(
    {
      files: options.files,
      model: options.model ?? defaults.model,
      maxTokens: options.maxTokens ?? defaults.maxTokens,
      contextWindow: defaults.contextWindow,
      verbose: options.verbose,
      frameworkPath: FRAMEWORK_PATH,
    },
    {
      env: process.env,
      createSender: createMessageSender,
      output: consoleOutput,
    },
  );
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    process.exit(EXIT.FAILURE);
  });
