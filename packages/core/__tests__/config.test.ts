import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterAll, beforeAll, describe, expect, test } from 'vitest'

import { DEFAULT_CONFIG, loadAnalysisConfig, loadEnvFile, parsePositiveInt } from '../src/config.js'

describe('parsePositiveInt', () => {
	test('accepts plain positive integers', () => {
		expect(parsePositiveInt('42')).toBe(42)
		expect(parsePositiveInt(' 8000 ')).toBe(8000)
	})

	test('rejects zero, negatives and partial numbers', () => {
		expect(parsePositiveInt('0')).toBeUndefined()
		expect(parsePositiveInt('-3')).toBeUndefined()
		expect(parsePositiveInt('12abc')).toBeUndefined()
		expect(parsePositiveInt('1.5')).toBeUndefined()
		expect(parsePositiveInt('')).toBeUndefined()
	})
})

describe('loadAnalysisConfig', () => {
	test('uses defaults with an empty environment', () => {
		expect(loadAnalysisConfig({})).toEqual({
			model: 'claude-sonnet-4-20250514',
			maxTokens: 4000,
			contextWindow: 200_000
		})
	})

	test('reads CODEWAY_* overrides', () => {
		const config = loadAnalysisConfig({
			CODEWAY_MODEL: 'claude-test-model',
			CODEWAY_MAX_TOKENS: '8000',
			CODEWAY_CONTEXT_WINDOW: '100000'
		})
		expect(config).toEqual({ model: 'claude-test-model', maxTokens: 8000, contextWindow: 100_000 })
	})

	test('keeps defaults for blank or invalid values', () => {
		const config = loadAnalysisConfig({
			CODEWAY_MODEL: '   ',
			CODEWAY_MAX_TOKENS: 'lots',
			CODEWAY_CONTEXT_WINDOW: '0'
		})
		expect(config).toEqual(DEFAULT_CONFIG)
	})
})

describe('loadEnvFile', () => {
	let dir: string

	beforeAll(() => {
		dir = mkdtempSync(join(tmpdir(), 'codeway-env-'))
		writeFileSync(
			join(dir, '.env'),
			[
				'# comment',
				'ANTHROPIC_API_KEY=test-secret',
				'CODEWAY_MODEL="claude-quoted"',
				'EXISTING=from-file',
				'not a pair',
				''
			].join('\n')
		)
	})

	afterAll(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	test('sets missing keys and leaves existing ones alone', () => {
		const env: Record<string, string | undefined> = { EXISTING: 'kept' }
		const loaded = loadEnvFile(join(dir, '.env'), env)
		expect(loaded).toEqual(['ANTHROPIC_API_KEY', 'CODEWAY_MODEL'])
		expect(env).toEqual({
			ANTHROPIC_API_KEY: 'test-secret',
			CODEWAY_MODEL: 'claude-quoted',
			EXISTING: 'kept'
		})
	})

	test('ignores a missing file', () => {
		const env: Record<string, string | undefined> = {}
		expect(loadEnvFile(join(dir, 'absent.env'), env)).toEqual([])
		expect(env).toEqual({})
	})
})
