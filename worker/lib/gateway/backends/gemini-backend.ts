import type { GoogleGenAI } from '../../ai-client.js'
import { GatewayCallError } from '../../errors.js'
import type { CompletionBackend, CompletionOptions } from '../types.js'

/**
 * Strips a code fence the model sometimes wraps plain text in.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim()
  if (!trimmed.startsWith('```')) return trimmed
  return trimmed.replace(/^```[a-z]*\s*\n?/, '').replace(/\n?```\s*$/, '')
}

export class GeminiBackend implements CompletionBackend {
  readonly name = 'gemini'

  constructor(
    private readonly ai: GoogleGenAI,
    private readonly model: string
  ) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const result = await this.ai.models.generateContent({
      model: this.model,
      contents: [{ parts: [{ text: prompt }] }],
      config: {
        maxOutputTokens: options.maxTokens,
        temperature: options.temperature,
        abortSignal: options.signal
      }
    })

    if (!result || !result.text) {
      throw new GatewayCallError('malformed', 'Gemini returned an empty response')
    }

    return stripCodeFence(result.text)
  }
}
