import { createGeminiClient } from '../ai-client.js'
import type { PipelineConfig } from '../config.js'
import { OllamaClient } from '../local/ollama-client.js'
import { GeminiBackend } from './backends/gemini-backend.js'
import { HfInferenceBackend } from './backends/hf-inference-backend.js'
import { OpenAiCompatibleBackend } from './backends/openai-compatible-backend.js'
import { LlmRewriteGateway } from './llm-rewrite-gateway.js'
import { RuleBasedRewriteGateway } from './rule-based-gateway.js'
import type { CompletionBackend, RewriteGateway } from './types.js'

function createBackend(config: PipelineConfig): CompletionBackend | undefined {
  const { backends, callTimeoutMs } = config

  switch (config.backend) {
    case 'gemini':
      return new GeminiBackend(
        createGeminiClient(backends.gemini.apiKey, callTimeoutMs),
        backends.gemini.model
      )
    case 'ollama':
      return new OllamaClient(backends.ollama)
    case 'hf-inference':
      return new HfInferenceBackend({ ...backends.hfInference, timeoutMs: callTimeoutMs })
    case 'openai-compatible':
      return new OpenAiCompatibleBackend({ ...backends.openaiCompatible, timeoutMs: callTimeoutMs })
    case 'rule-based':
      return undefined
  }
}

/**
 * Builds the raw gateway selected by `config.backend`.
 *
 * @throws ConfigError when the selected backend is missing credentials
 */
export function createRewriteGateway(config: PipelineConfig): RewriteGateway {
  const backend = createBackend(config)
  if (!backend) {
    return new RuleBasedRewriteGateway()
  }

  console.log(`[RewriteGateway] Using ${backend.name} backend`)
  return new LlmRewriteGateway(backend, {
    maxNewTokens: config.maxNewTokens,
    temperature: config.temperature
  })
}
