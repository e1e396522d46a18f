import type { RewritePromptInput, SummaryScope } from '../prompts/simplification.js'

export type { SummaryScope }

export type RewriteRequest = RewritePromptInput

/**
 * Capability interface to an external rewriting service.
 *
 * Implementations throw on transport or backend errors and return raw text;
 * timeouts, validation, retries and fallback live in GuardedRewriteGateway.
 */
export interface RewriteGateway {
  readonly name: string
  rewrite(request: RewriteRequest, signal?: AbortSignal): Promise<string>
  summarize(text: string, scope: SummaryScope, signal?: AbortSignal): Promise<string>
  smoothTransitions(text: string, signal?: AbortSignal): Promise<string>
}

export interface CompletionOptions {
  maxTokens: number
  temperature: number
  signal?: AbortSignal
}

/**
 * Prompt-in, text-out seam of one network backend.
 */
export interface CompletionBackend {
  readonly name: string
  complete(prompt: string, options: CompletionOptions): Promise<string>
}
