/**
 * Analysis run: credential → framework → code files → one request → rendered result
 */

import {
  API_KEY_ENV_VAR,
  type AnalysisRequest,
  buildAnalysisPrompt,
  type CodeFileEntry,
  describeReadFailure,
  estimateTokens,
  EXIT,
  type ExitCode,
  exceedsTokenLimit,
  type MessageSender,
  type Output,
  previewSystemPrompt,
  readCodeFile,
  requestAnalysis,
} from "@codeway/core";

/** Fixed inputs for one run */
export interface RunConfig {
  files: readonly string[];
  model: string;
  maxTokens: number;
  contextWindow: number;
  verbose: boolean;
  frameworkPath: string;
}

/** Collaborators supplied by the caller */
export interface RunDeps {
  env: Record<string, string | undefined>;
  createSender: (apiKey: string) => MessageSender;
  output: Output;
}

const RESPONSE_RULE = "----------------------------------";
const PROMPT_RULE = "------------------------------------";

async function readCodeFiles(
  paths: readonly string[],
  output: Output,
): Promise<CodeFileEntry[]> {
  const entries: CodeFileEntry[] = [];

  // One at a time, in argument order
  for (const path of paths) {
    output.log(`Processing: ${path}...`);
    const read = await readCodeFile(path);
    if (read.ok) {
      entries.push(read.entry);
    } else {
      output.error(describeReadFailure(read));
      output.error(`Skipping file ${path} due to read error.`);
    }
  }

  return entries;
}

function showPrompts(request: AnalysisRequest, frameworkPath: string, output: Output): void {
  output.log("\n--- Prompts Being Sent to Claude ---");
  output.log(`[SYSTEM PROMPT from ${frameworkPath}]:\n${previewSystemPrompt(request.system)}`);
  output.log("\n[USER PROMPT]:");
  output.log(request.userContent);
  output.log(
    `\nEstimated input tokens: ${estimateTokens(`${request.system}\n\n${request.userContent}`)}`,
  );
  output.log(PROMPT_RULE);
}

/**
 * Execute one analysis and return the process exit code. Never throws.
 */
export async function runAnalysis(config: RunConfig, deps: RunDeps): Promise<ExitCode> {
  const { output } = deps;

  try {
    const apiKey = deps.env[API_KEY_ENV_VAR];
    if (!apiKey) {
      output.error(`⚠️ Error: Environment variable '${API_KEY_ENV_VAR}' not set.`);
      output.error("Please set the environment variable with your Anthropic API key.");
      return EXIT.FAILURE;
    }

    const send = deps.createSender(apiKey);

    output.log(`--- Reading Code Way framework from: ${config.frameworkPath} ---`);
    const framework = await readCodeFile(config.frameworkPath);
    if (!framework.ok) {
      output.error(describeReadFailure(framework));
      return EXIT.FAILURE;
    }

    output.log("--- Reading Code Files ---");
    const entries = await readCodeFiles(config.files, output);
    if (entries.length === 0) {
      output.error("\n⚠️ Error: No valid code files could be read. Exiting.");
      return EXIT.FAILURE;
    }
    output.log(`Successfully read ${entries.length} code file(s).`);

    const request: AnalysisRequest = Object.freeze({
      model: config.model,
      maxTokens: config.maxTokens,
      system: framework.entry.content,
      userContent: buildAnalysisPrompt(entries),
    });

    if (config.verbose) {
      showPrompts(request, config.frameworkPath, output);
    }

    const combined = `${request.system}\n\n${request.userContent}`;
    if (exceedsTokenLimit(combined, config.contextWindow)) {
      output.error(
        `⚠️ Warning: Input is ~${estimateTokens(combined)} tokens, which may exceed the model's context window (${config.contextWindow}).`,
      );
    }

    output.log(`\nSending request to Claude (model: ${request.model})...`);
    const result = await requestAnalysis(send, request, output);

    if (!result.ok) {
      output.error("\nFailed to get analysis from Claude.");
      return EXIT.FAILURE;
    }

    output.log("\n--- Code Way Analysis Response ---");
    output.log(result.text);
    output.log(RESPONSE_RULE);
    return EXIT.SUCCESS;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    output.error(`⚠️ Error: ${message}`);
    return EXIT.FAILURE;
  }
}
