/**
 * User prompt assembly for Code Way analysis
 */

import { type CodeFileEntry, formatCodeFiles } from './files.js'

/** Characters of the system prompt shown in verbose previews */
export const SYSTEM_PREVIEW_CHARS = 500

/**
 * Build the user message: a directive wrapped around the delimited code files.
 * The framework itself travels separately as the system prompt.
 */
export function buildAnalysisPrompt(entries: readonly CodeFileEntry[]): string {
	return `Apply the Code Way framework (provided in the system prompt) to analyze the following code contained in ${ entries.length } file(s):

${ formatCodeFiles(entries) }

Provide your analysis based *only* on the framework and the code provided.`
}

/**
 * Leading slice of the system prompt for display, cut on code points
 */
export function previewSystemPrompt(system: string, maxChars: number = SYSTEM_PREVIEW_CHARS): string {
	return `${ Array.from(system).slice(0, maxChars).join('') }... (truncated)`
}
