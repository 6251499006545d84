/**
 * LLM utilities: Anthropic Messages API transport, error classification, text extraction
 */

import Anthropic, { AnthropicError, APIConnectionError, APIError } from '@anthropic-ai/sdk'

import type { Output } from './output.js'

/** Everything the single request needs, fixed before the call */
export interface AnalysisRequest {
  readonly model: string
  readonly maxTokens: number
  readonly system: string
  readonly userContent: string
}

/** Canonical response contract: a Messages API message and its content blocks */
export type AnalysisResponse = Pick<Anthropic.Message, 'content'>

export type ContentPart = Anthropic.ContentBlock

/** Sends one request; throws SDK errors on failure */
export type MessageSender = (request: AnalysisRequest) => Promise<AnalysisResponse>

/** Closed set of failures at the API boundary */
export type LlmError =
  | { kind: 'connectivity'; message: string }
  | { kind: 'status'; status: number; detail: string }
  | { kind: 'precondition'; message: string }
  | { kind: 'unexpected'; vendor: boolean; message: string }

/**
 * Result of a request. `ok: true` with empty text means the model returned
 * nothing usable, which is not a failure.
 */
export type AnalysisResult = { ok: true; text: string } | { ok: false; error: LlmError }

export type Extraction =
  | { kind: 'text'; text: string }
  | { kind: 'no-text' }
  | { kind: 'unrecognized' }

const CONTEXT_OVERFLOW_MARKERS = [
  'context_length_exceeded',
  'token limit',
  'prompt is too long',
  'context window'
]

/**
 * Create a sender backed by the Anthropic SDK. SDK retries are disabled:
 * one run sends exactly one request.
 */
export function createMessageSender(apiKey: string): MessageSender {
  const client = new Anthropic({ apiKey, maxRetries: 0 })

  return (request) =>
    client.messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      system: request.system,
      messages: [{ role: 'user', content: request.userContent }]
    })
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function statusDetail(error: APIError): string {
  return error.error ? JSON.stringify(error.error) : error.message
}

/**
 * Map anything thrown by a sender onto LlmError
 */
export function classifyError(error: unknown): LlmError {
  // APIConnectionError extends APIError, so it must be checked first
  if (error instanceof APIConnectionError) {
    return { kind: 'connectivity', message: error.message }
  }
  if (error instanceof APIError && typeof error.status === 'number') {
    return { kind: 'status', status: error.status, detail: statusDetail(error) }
  }
  if (error instanceof AnthropicError) {
    return { kind: 'unexpected', vendor: true, message: error.message }
  }
  return { kind: 'unexpected', vendor: false, message: errorMessage(error) }
}

export function isContextOverflow(detail: string): boolean {
  const lowered = detail.toLowerCase()
  return CONTEXT_OVERFLOW_MARKERS.some((marker) => lowered.includes(marker))
}

/**
 * Guidance for a status-coded failure, if any
 */
export function statusHint(status: number, detail: string): string | undefined {
  switch (status) {
    case 401:
      return '(Check if your API key is correct and active)'
    case 429:
      return '(You might be exceeding rate limits)'
    case 400:
      return isContextOverflow(detail)
        ? "(Input code + system prompt likely exceed the model's context window)"
        : '(Bad request - check input formatting or parameters)'
    default:
      return undefined
  }
}

/**
 * Diagnostic lines for a failure
 */
export function describeLlmError(error: LlmError): string[] {
  switch (error.kind) {
    case 'connectivity':
      return [`⚠️ API Connection Error: Please check your network connection. ${error.message}`]
    case 'status': {
      const lines = [`⚠️ API Status Error: ${error.status} - ${error.detail}`]
      const hint = statusHint(error.status, error.detail)
      if (hint) {
        lines.push(`   ${hint}`)
      }
      return lines
    }
    case 'precondition':
      return [`⚠️ Error: ${error.message}`]
    case 'unexpected':
      return error.vendor
        ? [`⚠️ Anthropic API Error: ${error.message}`]
        : [`⚠️ An unexpected error occurred during API call: ${error.message}`]
  }
}

/**
 * Find the first text block in a response
 */
export function extractText(response: AnalysisResponse): Extraction {
  if (!Array.isArray(response.content)) {
    return { kind: 'unrecognized' }
  }
  for (const part of response.content) {
    if (part.type === 'text') {
      return { kind: 'text', text: part.text }
    }
  }
  return { kind: 'no-text' }
}

/**
 * Send a single request and reduce the outcome to text or a classified failure.
 * Warnings and failures are reported through `output`; nothing is thrown.
 */
export async function requestAnalysis(
  send: MessageSender,
  request: AnalysisRequest,
  output: Output
): Promise<AnalysisResult> {
  if (!request.system.trim()) {
    const error: LlmError = {
      kind: 'precondition',
      message: 'System prompt (from codeway.md) is missing or empty.'
    }
    describeLlmError(error).forEach((line) => output.error(line))
    return { ok: false, error }
  }

  let response: AnalysisResponse
  try {
    response = await send(request)
  } catch (thrown) {
    const error = classifyError(thrown)
    describeLlmError(error).forEach((line) => output.error(line))
    return { ok: false, error }
  }

  const extraction = extractText(response)
  switch (extraction.kind) {
    case 'text':
      return { ok: true, text: extraction.text }
    case 'no-text':
      output.error("⚠️ Warning: No text content found in Claude's response.")
      return { ok: true, text: '' }
    case 'unrecognized':
      output.error('⚠️ Warning: Unexpected response structure from Claude.')
      output.error(`Full response object: ${JSON.stringify(response)}`)
      return { ok: true, text: '' }
  }
}
