import { config as loadEnv } from 'dotenv'
import { createClient } from '@supabase/supabase-js'
import { existsSync, promises as fs } from 'fs'
import path from 'path'
import { loadPipelineConfig, type PipelineConfig } from './lib/config.js'
import { describeDocument, EpubDocument } from './lib/epub/epub-document.js'
import { getUserFriendlyError } from './lib/errors.js'
import { installFileLogging } from './lib/logging.js'
import { InMemoryJobStatusStore, SupabaseJobStatusStore, type JobStatusStore } from './lib/jobs/job-status-store.js'
import { SimplificationService } from './lib/simplification-service.js'
import { failure, success, type Result } from './types/result.js'
import { LEVEL_NAMES, type JobState } from './types/simplification.js'

export { SimplificationService } from './lib/simplification-service.js'
export { createPipelineConfig, loadPipelineConfig, type PipelineConfig } from './lib/config.js'
export { EpubDocument, describeDocument } from './lib/epub/epub-document.js'
export { createRewriteGateway } from './lib/gateway/factory.js'
export { RuleBasedRewriteGateway } from './lib/gateway/rule-based-gateway.js'
export type { RewriteGateway, CompletionBackend } from './lib/gateway/types.js'
export { FileCheckpointStore, InMemoryCheckpointStore, type CheckpointStore } from './lib/checkpoint/checkpoint-store.js'
export { InMemoryJobStatusStore, SupabaseJobStatusStore, type JobStatusStore } from './lib/jobs/job-status-store.js'
export { InvalidLevelError, InvalidJobIdError, JobConflictError, DocumentReadError, ConfigError } from './lib/errors.js'
export type { JobState, SimplificationLevel, Chapter, DocumentSummary } from './types/simplification.js'

const USAGE = 'Usage: simplify-epub <input.epub> --level <1|2|3> [--job-id <id>] [--out <dir>] [--fast]'
const POLL_INTERVAL_MS = 2000

export interface CliOptions {
  input: string
  level: number
  jobId?: string
  outDir?: string
  fast: boolean
}

/**
 * Parses CLI arguments (without the node and script entries).
 * The level is only checked for being a number here; `submit` validates the range.
 */
export function parseCliArgs(argv: readonly string[]): Result<CliOptions> {
  let input: string | undefined
  let level: number | undefined
  let jobId: string | undefined
  let outDir: string | undefined
  let fast = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const takeValue = (): string | undefined => {
      const value = argv[i + 1]
      if (value === undefined || value.startsWith('--')) return undefined
      i++
      return value
    }

    switch (arg) {
      case '--level': {
        const value = takeValue()
        if (value === undefined || !/^\d+$/.test(value)) {
          return failure('validation', '--level needs a number (1, 2 or 3)')
        }
        level = Number(value)
        break
      }
      case '--job-id':
        jobId = takeValue()
        if (!jobId) return failure('validation', '--job-id needs a value')
        break
      case '--out':
        outDir = takeValue()
        if (!outDir) return failure('validation', '--out needs a directory')
        break
      case '--fast':
        fast = true
        break
      default:
        if (arg.startsWith('--')) return failure('validation', `Unknown option ${arg}`)
        if (input) return failure('validation', `Unexpected argument ${arg}`)
        input = arg
    }
  }

  if (!input) return failure('validation', 'Missing input EPUB path')
  if (level === undefined) return failure('validation', 'Missing --level')
  return success({ input, level, jobId, outDir, fast })
}

function createStatusStore(env: NodeJS.ProcessEnv): JobStatusStore {
  const url = env.SUPABASE_URL
  const key = env.SUPABASE_SERVICE_ROLE_KEY
  if (url && key) {
    console.log('[CLI] Publishing job status to Supabase background_jobs')
    return new SupabaseJobStatusStore(createClient(url, key))
  }
  return new InMemoryJobStatusStore()
}

function formatStatus(state: JobState): string {
  return `[${state.progress}%] ${state.message} (${state.processedChapters}/${state.totalChapters} chapters)`
}

/**
 * Runs one job from the command line and resolves with the process exit code.
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const parsed = parseCliArgs(argv)
  if (!parsed.ok) {
    console.error(`❌ ${parsed.detail}`)
    console.error(USAGE)
    return 2
  }
  const options = parsed.value

  const envFile = path.resolve(process.cwd(), '.env')
  if (existsSync(envFile)) {
    loadEnv({ path: envFile })
  }

  let pipelineConfig: PipelineConfig
  try {
    pipelineConfig = loadPipelineConfig({
      ...process.env,
      ...(options.fast ? { SIMPLIFIER_PROFILE: 'fast' } : {}),
      ...(options.outDir ? { OUTPUT_DIR: path.resolve(options.outDir) } : {})
    })
  } catch (error) {
    console.error(`❌ ${getUserFriendlyError(error)}`)
    return 2
  }

  installFileLogging(process.env.SIMPLIFIER_LOG_FILE ?? path.join(pipelineConfig.outputDir, 'simplifier.log'))

  let document: EpubDocument
  try {
    document = EpubDocument.fromBuffer(await fs.readFile(options.input))
  } catch (error) {
    console.error(`❌ Could not read ${options.input}: ${getUserFriendlyError(error)}`)
    return 1
  }

  const summary = describeDocument(document)
  console.log('\n📖 Document')
  console.log(`   Title:    ${summary.title}`)
  console.log(`   Chapters: ${summary.chapterCount}`)
  console.log(`   Words:    ${summary.totalWords}`)
  console.log(`   Backend:  ${pipelineConfig.backend} (${pipelineConfig.profile} profile)\n`)

  let service: SimplificationService
  let jobId: string
  try {
    service = new SimplificationService({ config: pipelineConfig, statusStore: createStatusStore(process.env) })
    jobId = service.submit(document, options.level, { jobId: options.jobId })
  } catch (error) {
    console.error(`❌ ${getUserFriendlyError(error)}`)
    return 2
  }

  const levelName = options.level === 1 || options.level === 2 || options.level === 3
    ? LEVEL_NAMES[options.level]
    : String(options.level)
  console.log(`🚀 Job ${jobId} started (level ${options.level}, ${levelName})`)
  console.log(`   Re-run with --job-id ${jobId} to resume after an interruption\n`)

  let lastLine = ''
  const poll = setInterval(() => {
    service.status(jobId).then(
      state => {
        if (!state) return
        const line = formatStatus(state)
        if (line !== lastLine) {
          lastLine = line
          console.log(line)
        }
      },
      (error: unknown) => {
        console.warn('[CLI] Status poll failed:', error instanceof Error ? error.message : error)
      }
    )
  }, POLL_INTERVAL_MS)

  const stop = (signal: string) => {
    console.log(`\n🛑 ${signal} received, stopping. Re-run with --job-id ${jobId} to resume.`)
    clearInterval(poll)
    process.exit(130)
  }
  process.once('SIGINT', () => stop('SIGINT'))
  process.once('SIGTERM', () => stop('SIGTERM'))

  const final = await service.waitFor(jobId)
  clearInterval(poll)

  if (!final || final.status !== 'completed') {
    console.error(`\n❌ Job ${jobId} failed: ${final?.message ?? 'no status recorded'}`)
    return 1
  }

  console.log(`\n✅ ${final.message}`)
  console.log(`   Output: ${final.outputRef}`)
  return 0
}

if (require.main === module) {
  main().then(
    code => process.exit(code),
    (error: unknown) => {
      console.error('❌ Fatal error:', error)
      process.exit(1)
    }
  )
}
