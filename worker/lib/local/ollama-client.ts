// worker/lib/local/ollama-client.ts

import { Ollama } from 'ollama'
import { GatewayCallError } from '../errors.js'
import type { CompletionBackend, CompletionOptions } from '../gateway/types.js'

export interface OllamaConfig {
  host: string
  model: string
}

/**
 * Local Ollama server as a completion backend.
 */
export class OllamaClient implements CompletionBackend {
  readonly name = 'ollama'
  private client: Ollama

  constructor(private readonly config: OllamaConfig) {
    this.client = new Ollama({ host: config.host })
  }

  /**
   * Binds the abort signal through a per-call client; the shared client's
   * abort() would cancel every worker's request at once.
   */
  private clientFor(signal?: AbortSignal): Ollama {
    if (!signal) return this.client
    return new Ollama({
      host: this.config.host,
      fetch: (input: Parameters<typeof fetch>[0], init?: RequestInit) => fetch(input, { ...init, signal })
    })
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    try {
      // CRITICAL: stream must be false, the gateway needs the whole text
      const response = await this.clientFor(options.signal).chat({
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        stream: false,
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens
        }
      })

      const content = response.message.content
      if (!content || !content.trim()) {
        throw new GatewayCallError('malformed', 'Ollama returned an empty response')
      }
      return content.trim()
    } catch (error) {
      if (error instanceof GatewayCallError) throw error
      const message = error instanceof Error ? error.message : String(error)
      if (message.includes('ECONNREFUSED') || message.includes('fetch failed')) {
        throw new GatewayCallError('network', `Ollama server not reachable at ${this.config.host} - start with: ollama serve`)
      }
      throw error
    }
  }

  /**
   * Health check: true when the server answers a model listing.
   */
  async isAvailable(): Promise<boolean> {
    try {
      await this.client.list()
      return true
    } catch (error) {
      console.warn('[Ollama] Server not available:', error instanceof Error ? error.message : error)
      return false
    }
  }

  getConfig(): OllamaConfig {
    return { ...this.config }
  }
}
