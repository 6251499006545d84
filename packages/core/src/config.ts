/**
 * Configuration: built-in defaults, CODEWAY_* environment overrides, .env loading
 */

import { existsSync, readFileSync } from 'fs'

/** Environment variable holding the Anthropic credential */
export const API_KEY_ENV_VAR = 'ANTHROPIC_API_KEY'

/** Prefix for optional overrides, e.g. CODEWAY_MAX_TOKENS */
export const ENV_PREFIX = 'CODEWAY'

export interface AnalysisConfig {
	model: string
	maxTokens: number
	contextWindow: number
}

export const DEFAULT_CONFIG: Readonly<AnalysisConfig> = {
	model: 'claude-sonnet-4-20250514',
	maxTokens: 4000,
	contextWindow: 200_000
}

type Env = Record<string, string | undefined>

/**
 * Parse a strictly positive integer, rejecting partial matches like "12abc"
 */
export function parsePositiveInt(value: string): number | undefined {
	if (!/^\d+$/.test(value.trim())) {
		return undefined
	}
	const parsed = Number.parseInt(value, 10)
	return parsed > 0 ? parsed : undefined
}

/**
 * Resolve defaults from the environment. Unparseable numbers keep the default.
 */
export function loadAnalysisConfig(env: Env = process.env): AnalysisConfig {
	const read = (key: string): string | undefined => {
		const value = env[`${ ENV_PREFIX }_${ key }`]
		return value && value.trim() ? value.trim() : undefined
	}
	const readInt = (key: string, fallback: number): number => {
		const value = read(key)
		return (value && parsePositiveInt(value)) || fallback
	}

	return {
		model: read('MODEL') ?? DEFAULT_CONFIG.model,
		maxTokens: readInt('MAX_TOKENS', DEFAULT_CONFIG.maxTokens),
		contextWindow: readInt('CONTEXT_WINDOW', DEFAULT_CONFIG.contextWindow)
	}
}

/**
 * Load KEY=VALUE lines from a .env file into env. Existing keys win.
 * Returns the keys that were set.
 */
export function loadEnvFile(path: string, env: Env = process.env): string[] {
	if (!existsSync(path)) {
		return []
	}

	const loaded: string[] = []
	for (const line of readFileSync(path, 'utf-8').split('\n')) {
		const trimmed = line.trim()
		if (!trimmed || trimmed.startsWith('#')) {
			continue
		}
		const eqIdx = trimmed.indexOf('=')
		if (eqIdx <= 0) {
			continue
		}
		const key = trimmed.slice(0, eqIdx).trim()
		const value = trimmed.slice(eqIdx + 1).trim().replace(/^(['"])(.*)\1$/, '$2')
		if (!env[key]) {
			env[key] = value
			loaded.push(key)
		}
	}
	return loaded
}
