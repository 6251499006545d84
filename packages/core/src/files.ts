/**
 * File utilities: code file reading and delimited formatting
 */

import { readFile } from 'fs/promises'
import { basename } from 'path'

/** A code file that was read successfully */
export interface CodeFileEntry {
	originalPath: string
	baseName: string
	content: string
}

/** Outcome of reading one file */
export type CodeFileRead =
	| { ok: true; entry: CodeFileEntry }
	| { ok: false; path: string; notFound: boolean; message: string }

function isNotFound(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Read a file as UTF-8 text. Never throws; failures come back as `ok: false`.
 */
export async function readCodeFile(path: string): Promise<CodeFileRead> {
	try {
		const content = await readFile(path, 'utf8')
		return {
			ok: true,
			entry: { originalPath: path, baseName: basename(path), content }
		}
	} catch (error) {
		return {
			ok: false,
			path,
			notFound: isNotFound(error),
			message: error instanceof Error ? error.message : String(error)
		}
	}
}

/**
 * Diagnostic line for a failed read
 */
export function describeReadFailure(failure: Extract<CodeFileRead, { ok: false }>): string {
	if (failure.notFound) {
		return `⚠️ Error: File not found: ${ failure.path }`
	}
	return `⚠️ Error reading file ${ failure.path }: ${ failure.message }`
}

/**
 * Wrap each file in start/end markers, keeping input order
 */
export function formatCodeFiles(entries: readonly CodeFileEntry[]): string {
	return entries
		.flatMap(entry => [
			`--- Start of code file: ${ entry.baseName } ---`,
			entry.content,
			`--- End of code file: ${ entry.baseName } ---\n`
		])
		.join('\n')
}
