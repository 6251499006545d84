import { describe, expect, test } from 'vitest'

import { countTokens, estimateTokens, exceedsTokenLimit } from '../src/tokens.js'

describe('estimateTokens', () => {
	test('rounds up at four characters per token', () => {
		expect(estimateTokens('')).toBe(0)
		expect(estimateTokens('abc')).toBe(1)
		expect(estimateTokens('abcdefgh')).toBe(2)
		expect(estimateTokens('abcdefghi')).toBe(3)
	})
})

describe('countTokens', () => {
	test('counts with cl100k_base', () => {
		expect(countTokens('hello world')).toBe(2)
	})

	test('counts special-token strings as plain text', () => {
		expect(() => countTokens('EOT = "<|endoftext|>"')).not.toThrow()
		expect(countTokens('<|endoftext|>')).toBeGreaterThan(1)
	})
})

describe('exceedsTokenLimit', () => {
	test('short text is under a large limit', () => {
		expect(exceedsTokenLimit('short', 1000)).toBe(false)
	})

	test('falls through to an exact count near the limit', () => {
		expect(exceedsTokenLimit('hello world hello world', 2)).toBe(true)
		expect(exceedsTokenLimit('hello world', 2)).toBe(false)
	})

	test('handles special-token strings near the limit', () => {
		const source = 'EOT = "<|endoftext|>"\n'.repeat(20)
		expect(exceedsTokenLimit(source, 10)).toBe(true)
	})
})
