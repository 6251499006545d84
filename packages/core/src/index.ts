/**
 * @codeway/core - Shared utilities for the codeway CLI
 */

export * from "./config.js";
export * from "./files.js";
export * from "./llm.js";
export * from "./output.js";
export * from "./prompts.js";
export * from "./tokens.js";
