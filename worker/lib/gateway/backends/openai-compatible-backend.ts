import axios from 'axios'
import { z } from 'zod'
import { GatewayCallError } from '../../errors.js'
import type { CompletionBackend, CompletionOptions } from '../types.js'

export interface OpenAiCompatibleSettings {
  baseUrl: string
  apiKey?: string
  model: string
  timeoutMs: number
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() })
      })
    )
    .min(1)
})

/**
 * Any server speaking the `/chat/completions` protocol (hosted or local).
 */
export class OpenAiCompatibleBackend implements CompletionBackend {
  readonly name = 'openai-compatible'

  constructor(private readonly settings: OpenAiCompatibleSettings) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const url = `${this.settings.baseUrl.replace(/\/+$/, '')}/chat/completions`
    const headers: Record<string, string> = {}
    if (this.settings.apiKey) {
      headers.Authorization = `Bearer ${this.settings.apiKey}`
    }

    const response = await axios.post<unknown>(
      url,
      {
        model: this.settings.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: options.maxTokens,
        temperature: options.temperature
      },
      { headers, timeout: this.settings.timeoutMs, signal: options.signal }
    )

    const parsed = ChatCompletionSchema.safeParse(response.data)
    if (!parsed.success) {
      throw new GatewayCallError('malformed', 'Chat completion response has no choices')
    }

    const content = parsed.data.choices[0].message.content
    if (!content || !content.trim()) {
      throw new GatewayCallError('malformed', 'Chat completion returned empty content')
    }
    return content.trim()
  }
}
