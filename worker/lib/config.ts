/**
 * Centralized pipeline configuration.
 *
 * Single source of truth for every tuning knob the pipeline uses (window sizes,
 * concurrency, timeouts, retry budget, validation thresholds, backend selection).
 * Built once from the environment by `loadPipelineConfig()` and passed into the
 * scheduler at submission time. Nothing below this module reads process.env.
 *
 * Profiles:
 * - quality (default): 350-word windows, 50-word overlap, summaries + smoothing
 * - fast: 600-word windows, 20-word overlap, no summaries, no smoothing
 *
 * Override any field via environment variables:
 *   SIMPLIFIER_PROFILE=fast MAX_WORKERS=4 REWRITE_BACKEND=ollama npm start -- book.epub --level 2
 */

import path from 'path'
import os from 'os'
import { z } from 'zod'
import { ConfigError } from './errors.js'

export const BACKENDS = ['gemini', 'ollama', 'hf-inference', 'openai-compatible', 'rule-based'] as const

export type BackendName = (typeof BACKENDS)[number]

export type Profile = 'fast' | 'quality'

export const ValidationThresholdsSchema = z.object({
  /** Minimum characters for a rewritten window */
  minChars: z.number().int().nonnegative(),
  /** Minimum distinct-token ratio; below signals degenerate repetition */
  minUniqueRatio: z.number().min(0).max(1),
  /** Token n-gram size used for loop detection */
  ngramSize: z.number().int().positive(),
  /** Any n-gram repeated this many times rejects the output */
  maxNgramRepeats: z.number().int().min(2),
  /** Absolute floor for smoothed chapters */
  smoothingMinChars: z.number().int().nonnegative(),
  /** Smoothed chapter must keep at least this share of the input length */
  smoothingMinLengthRatio: z.number().min(0).max(1),
  /** Summaries shorter than this fall back to a text excerpt */
  summaryMinChars: z.number().int().nonnegative()
})

export type ValidationThresholds = z.infer<typeof ValidationThresholdsSchema>

export const SummaryBudgetsSchema = z.object({
  /** Leading chapters sampled for the global summary */
  globalChapterSample: z.number().int().positive(),
  /** Characters taken from each sampled chapter */
  globalCharsPerChapter: z.number().int().positive(),
  /** Cap on the joined global sample */
  globalCharBudget: z.number().int().positive(),
  /** Characters of chapter text sent for the per-chapter summary */
  chapterCharBudget: z.number().int().positive(),
  /** Length of the excerpt used when summarization fails */
  fallbackChars: z.number().int().positive()
})

export type SummaryBudgets = z.infer<typeof SummaryBudgetsSchema>

export const BackendSettingsSchema = z.object({
  gemini: z.object({
    apiKey: z.string().optional(),
    model: z.string()
  }),
  ollama: z.object({
    host: z.string(),
    model: z.string()
  }),
  hfInference: z.object({
    url: z.string().url(),
    token: z.string().optional()
  }),
  openaiCompatible: z.object({
    baseUrl: z.string().url(),
    apiKey: z.string().optional(),
    model: z.string()
  })
})

export type BackendSettings = z.infer<typeof BackendSettingsSchema>

export const PipelineConfigSchema = z
  .object({
    profile: z.enum(['fast', 'quality']),
    chunkSize: z.number().int().positive(),
    overlap: z.number().int().nonnegative(),
    memoryTailChars: z.number().int().nonnegative(),
    /** Summaries on/off; off in the fast profile */
    useSummaries: z.boolean(),
    /** Transition smoothing on/off; off in the fast profile */
    smoothTransitions: z.boolean(),
    maxWorkers: z.number().int().min(1),
    callTimeoutMs: z.number().int().positive(),
    maxAttempts: z.number().int().min(1),
    retryDelayMs: z.number().int().nonnegative(),
    maxNewTokens: z.number().int().positive(),
    temperature: z.number().min(0).max(2),
    validation: ValidationThresholdsSchema,
    summaries: SummaryBudgetsSchema,
    checkpointDir: z.string().min(1),
    outputDir: z.string().min(1),
    backend: z.enum(BACKENDS),
    backends: BackendSettingsSchema
  })
  .refine(cfg => cfg.overlap < cfg.chunkSize, {
    message: 'overlap must be smaller than chunkSize',
    path: ['overlap']
  })

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>

const PROFILE_DEFAULTS: Record<Profile, Pick<
  PipelineConfig,
  'chunkSize' | 'overlap' | 'useSummaries' | 'smoothTransitions' | 'maxNewTokens'
>> = {
  quality: { chunkSize: 350, overlap: 50, useSummaries: true, smoothTransitions: true, maxNewTokens: 1200 },
  fast: { chunkSize: 600, overlap: 20, useSummaries: false, smoothTransitions: false, maxNewTokens: 600 }
}

export const DEFAULT_VALIDATION: ValidationThresholds = {
  minChars: 200,
  minUniqueRatio: 0.25,
  ngramSize: 6,
  maxNgramRepeats: 5,
  smoothingMinChars: 100,
  smoothingMinLengthRatio: 0.5,
  summaryMinChars: 50
}

export const DEFAULT_SUMMARY_BUDGETS: SummaryBudgets = {
  globalChapterSample: 8,
  globalCharsPerChapter: 2000,
  globalCharBudget: 15000,
  chapterCharBudget: 15000,
  fallbackChars: 1000
}

const BASE_DIR = path.join(os.tmpdir(), 'epub-simplifier')

/**
 * Builds a complete configuration for a profile, with every default filled in.
 * Tests and embedders use this directly; the CLI goes through loadPipelineConfig().
 */
export function createPipelineConfig(
  profile: Profile = 'quality',
  overrides: Partial<PipelineConfig> = {}
): PipelineConfig {
  return parseConfig({
    profile,
    ...PROFILE_DEFAULTS[profile],
    memoryTailChars: 400,
    maxWorkers: 2,
    callTimeoutMs: 90_000,
    maxAttempts: 3,
    retryDelayMs: 800,
    temperature: 0.3,
    validation: DEFAULT_VALIDATION,
    summaries: DEFAULT_SUMMARY_BUDGETS,
    checkpointDir: path.join(BASE_DIR, 'checkpoints'),
    outputDir: path.join(BASE_DIR, 'processed'),
    backend: 'gemini',
    backends: {
      gemini: { model: 'gemini-2.5-flash-lite' },
      ollama: { host: 'http://127.0.0.1:11434', model: 'qwen2.5:7b' },
      hfInference: {
        url: 'https://api-inference.huggingface.co/models/meta-llama/Meta-Llama-3.1-8B-Instruct'
      },
      openaiCompatible: { baseUrl: 'https://api.openai.com/v1', model: 'gpt-4o-mini' }
    },
    ...overrides
  })
}

function parseConfig(raw: unknown): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid pipeline configuration: ${issues}`)
  }
  return parsed.data
}

function numberFrom(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`)
  }
  return value
}

function flagFrom(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  return raw === '1' || raw.toLowerCase() === 'true'
}

function defined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined)
  )
}

/**
 * Reads the pipeline configuration from environment variables.
 *
 * FAST_MODE=1 is accepted as an alias for SIMPLIFIER_PROFILE=fast.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const profileRaw = env.SIMPLIFIER_PROFILE ?? (env.FAST_MODE === '1' ? 'fast' : 'quality')
  if (profileRaw !== 'fast' && profileRaw !== 'quality') {
    throw new ConfigError(`SIMPLIFIER_PROFILE must be "fast" or "quality", got "${profileRaw}"`)
  }

  const base = createPipelineConfig(profileRaw)

  const backendRaw = env.REWRITE_BACKEND ?? base.backend
  const backend = BACKENDS.find(name => name === backendRaw)
  if (!backend) {
    throw new ConfigError(`REWRITE_BACKEND must be one of ${BACKENDS.join(', ')}, got "${backendRaw}"`)
  }

  return parseConfig({
    ...base,
    ...defined({
      chunkSize: numberFrom(env, 'CHUNK_SIZE'),
      overlap: numberFrom(env, 'CHUNK_OVERLAP'),
      memoryTailChars: numberFrom(env, 'MEMORY_TAIL_CHARS'),
      maxWorkers: numberFrom(env, 'MAX_WORKERS'),
      callTimeoutMs: numberFrom(env, 'CALL_TIMEOUT_MS'),
      maxAttempts: numberFrom(env, 'MAX_ATTEMPTS'),
      retryDelayMs: numberFrom(env, 'RETRY_DELAY_MS'),
      maxNewTokens: numberFrom(env, 'MAX_NEW_TOKENS'),
      useSummaries: flagFrom(env, 'USE_SUMMARIES'),
      smoothTransitions: flagFrom(env, 'SMOOTH_TRANSITIONS'),
      checkpointDir: env.CHECKPOINT_DIR,
      outputDir: env.OUTPUT_DIR
    }),
    validation: {
      ...base.validation,
      ...defined({
        minChars: numberFrom(env, 'VALIDATION_MIN_CHARS'),
        minUniqueRatio: numberFrom(env, 'VALIDATION_MIN_UNIQUE_RATIO'),
        maxNgramRepeats: numberFrom(env, 'VALIDATION_MAX_NGRAM_REPEATS')
      })
    },
    backend,
    backends: {
      gemini: {
        apiKey: env.GEMINI_API_KEY,
        model: env.GEMINI_MODEL ?? base.backends.gemini.model
      },
      ollama: {
        host: env.OLLAMA_HOST ?? base.backends.ollama.host,
        model: env.OLLAMA_MODEL ?? base.backends.ollama.model
      },
      hfInference: {
        url: env.HF_API_URL ?? base.backends.hfInference.url,
        token: env.HF_TOKEN
      },
      openaiCompatible: {
        baseUrl: env.OPENAI_BASE_URL ?? base.backends.openaiCompatible.baseUrl,
        apiKey: env.OPENAI_API_KEY,
        model: env.OPENAI_MODEL ?? base.backends.openaiCompatible.model
      }
    }
  })
}
