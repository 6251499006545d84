/**
 * Line-oriented output sink: normal output vs diagnostics
 */

export interface Output {
	log(line: string): void
	error(line: string): void
}

export const consoleOutput: Output = {
	log: line => console.log(line),
	error: line => console.error(line)
}

/**
 * Exit codes for the CLI
 */
export const EXIT = {
	SUCCESS: 0,
	FAILURE: 1
} as const

export type ExitCode = (typeof EXIT)[keyof typeof EXIT]
