/**
 * Input size checks for the context-window warning
 */

import { get_encoding, type Tiktoken } from 'tiktoken'

const CHARS_PER_TOKEN = 4

/** Below this share of the limit the cheap estimate decides on its own */
const EXACT_COUNT_RATIO = 0.8

let cl100k: Tiktoken | undefined

/**
 * Count tokens with cl100k_base. Special-token strings such as `<|endoftext|>`
 * are counted as ordinary text, since code files quote them routinely.
 */
export function countTokens(text: string): number {
	cl100k ??= get_encoding('cl100k_base')
	return cl100k.encode(text, [], []).length
}

export function estimateTokens(text: string): number {
	return Math.ceil(text.length / CHARS_PER_TOKEN)
}

/**
 * Whether text is over `limit` tokens. Only texts whose estimate comes near
 * the limit pay for an exact count.
 */
export function exceedsTokenLimit(text: string, limit: number): boolean {
	return estimateTokens(text) >= limit * EXACT_COUNT_RATIO && countTokens(text) > limit
}
