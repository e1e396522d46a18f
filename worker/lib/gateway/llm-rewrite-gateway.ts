import {
  generateRewritePrompt,
  generateSmoothingPrompt,
  generateSummaryPrompt
} from '../prompts/simplification.js'
import type {
  CompletionBackend,
  RewriteGateway,
  RewriteRequest,
  SummaryScope
} from './types.js'

export interface LlmGatewayOptions {
  /** Token budget for rewrite and smoothing calls */
  maxNewTokens: number
  temperature: number
}

/**
 * Rewrite gateway over any prompt-completion backend.
 * Summaries get half the rewrite token budget, capped at 600.
 */
export class LlmRewriteGateway implements RewriteGateway {
  readonly name: string

  constructor(
    private readonly backend: CompletionBackend,
    private readonly options: LlmGatewayOptions
  ) {
    this.name = backend.name
  }

  async rewrite(request: RewriteRequest, signal?: AbortSignal): Promise<string> {
    return this.backend.complete(generateRewritePrompt(request), {
      maxTokens: this.options.maxNewTokens,
      temperature: this.options.temperature,
      signal
    })
  }

  async summarize(text: string, scope: SummaryScope, signal?: AbortSignal): Promise<string> {
    return this.backend.complete(generateSummaryPrompt(text, scope), {
      maxTokens: Math.min(600, Math.floor(this.options.maxNewTokens / 2)),
      temperature: this.options.temperature,
      signal
    })
  }

  async smoothTransitions(text: string, signal?: AbortSignal): Promise<string> {
    return this.backend.complete(generateSmoothingPrompt(text), {
      maxTokens: this.options.maxNewTokens,
      temperature: this.options.temperature,
      signal
    })
  }
}
