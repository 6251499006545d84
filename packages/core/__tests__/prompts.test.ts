import { describe, expect, test } from 'vitest'

import { buildAnalysisPrompt, previewSystemPrompt } from '../src/prompts.js'

describe('buildAnalysisPrompt', () => {
	test('wraps code files in the analysis directive', () => {
		const prompt = buildAnalysisPrompt([{ originalPath: './a.py', baseName: 'a.py', content: 'x = 1' }])
		expect(prompt).toBe(
			'Apply the Code Way framework (provided in the system prompt) to analyze the following code contained in 1 file(s):\n\n' +
				'--- Start of code file: a.py ---\nx = 1\n--- End of code file: a.py ---\n\n\n' +
				'Provide your analysis based *only* on the framework and the code provided.'
		)
	})

	test('counts files', () => {
		const prompt = buildAnalysisPrompt([
			{ originalPath: 'a.ts', baseName: 'a.ts', content: '' },
			{ originalPath: 'b.ts', baseName: 'b.ts', content: '' }
		])
		expect(prompt).toContain('contained in 2 file(s):')
	})
})

describe('previewSystemPrompt', () => {
	test('truncates to 500 characters', () => {
		const preview = previewSystemPrompt('x'.repeat(600))
		expect(preview).toBe(`${ 'x'.repeat(500) }... (truncated)`)
	})

	test('never splits a surrogate pair', () => {
		const preview = previewSystemPrompt(`${ 'x'.repeat(499) }😀tail`)
		expect(preview).toBe(`${ 'x'.repeat(499) }😀... (truncated)`)
	})

	test('marks short prompts as truncated too', () => {
		expect(previewSystemPrompt('abc')).toBe('abc... (truncated)')
	})
})
