import axios from 'axios'
import { ConfigError, GatewayCallError } from '../../errors.js'
import type { CompletionBackend, CompletionOptions } from '../types.js'

export interface HfInferenceSettings {
  url: string
  token?: string
  timeoutMs: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Pulls generated text out of an inference response: `[{ generated_text }]`,
 * `{ generated_text }` or `{ error }`.
 */
export function readGeneratedText(data: unknown): string {
  const first = Array.isArray(data) ? data[0] : data

  if (isRecord(first) && typeof first.generated_text === 'string') {
    return first.generated_text.trim()
  }
  if (isRecord(data) && data.error !== undefined) {
    throw new GatewayCallError('malformed', `HF API error: ${String(data.error)}`)
  }
  throw new GatewayCallError('malformed', 'HF API returned an unexpected response shape')
}

/**
 * Hosted text-generation inference endpoint.
 */
export class HfInferenceBackend implements CompletionBackend {
  readonly name = 'hf-inference'

  constructor(private readonly settings: HfInferenceSettings) {
    if (!settings.token) {
      throw new ConfigError('HF_TOKEN is required for the hf-inference backend')
    }
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await axios.post<unknown>(
      this.settings.url,
      {
        inputs: prompt,
        parameters: {
          temperature: options.temperature,
          top_p: 0.9,
          repetition_penalty: 1.15,
          max_new_tokens: options.maxTokens,
          return_full_text: false
        },
        options: { wait_for_model: true }
      },
      {
        headers: { Authorization: `Bearer ${this.settings.token}` },
        timeout: this.settings.timeoutMs,
        signal: options.signal
      }
    )

    return readGeneratedText(response.data)
  }
}
