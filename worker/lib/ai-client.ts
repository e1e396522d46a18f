/**
 * AI Client Factory
 *
 * Creates Gemini client instances for the Gemini rewrite backend.
 *
 * @module lib/ai-client
 */

import { GoogleGenAI } from '@google/genai'
import { ConfigError } from './errors.js'

/**
 * Creates a new Gemini AI client instance.
 *
 * @param timeoutMs - HTTP timeout; the guarded gateway applies its own per-call timeout on top
 * @throws ConfigError if the API key is missing
 */
export function createGeminiClient(apiKey: string | undefined, timeoutMs: number): GoogleGenAI {
  if (!apiKey) {
    throw new ConfigError('GEMINI_API_KEY is required for the gemini backend')
  }

  return new GoogleGenAI({
    apiKey,
    httpOptions: {
      timeout: timeoutMs
    }
  })
}

export type { GoogleGenAI } from '@google/genai'
