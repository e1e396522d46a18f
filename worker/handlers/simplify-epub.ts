import { promises as fs } from 'fs'
import path from 'path'
import type { PipelineConfig } from '../lib/config.js'
import type { CheckpointStore } from '../lib/checkpoint/checkpoint-store.js'
import { JobCheckpoints } from '../lib/checkpoint/job-checkpoints.js'
import { ContextTracker } from '../lib/context/context-tracker.js'
import { outputFileName, type EpubDocument } from '../lib/epub/epub-document.js'
import { reconstructDocument } from '../lib/epub/reconstructor.js'
import { GuardedRewriteGateway } from '../lib/gateway/guarded-gateway.js'
import type { RewriteGateway } from '../lib/gateway/types.js'
import type { JobStatusPublisher } from '../lib/jobs/job-status-publisher.js'
import { ChapterScheduler } from '../lib/pipeline/chapter-scheduler.js'
import type { SimplificationLevel } from '../types/simplification.js'

/** Progress share reserved before and after chapter processing. */
const READ_PROGRESS = 5
const WRITE_PROGRESS = 95

export interface SimplifyEpubJob {
  jobId: string
  document: EpubDocument
  level: SimplificationLevel
}

export interface SimplifyEpubDeps {
  config: PipelineConfig
  gateway: RewriteGateway
  checkpointStore: CheckpointStore
  status: JobStatusPublisher
}

export interface SimplifyEpubResult {
  document: EpubDocument
  outputRef: string
  failedChapters: number
}

/**
 * Runs one simplification job end to end: context setup, concurrent chapter
 * rewriting, reconstruction and output write.
 *
 * Chapter-level problems never reach this function; anything it throws is an
 * infrastructure failure and the caller marks the job failed.
 */
export async function simplifyEpubHandler(
  job: SimplifyEpubJob,
  deps: SimplifyEpubDeps
): Promise<SimplifyEpubResult> {
  const { jobId, document, level } = job
  const { config, status } = deps
  const chapters = document.chapters

  status.updateProgress(0, 'Reading chapters...')
  status.setTotalChapters(chapters.length)
  console.log(`[SimplifyEpub] Job ${jobId}: "${document.title}", ${chapters.length} unit(s), level ${level}, ${config.profile} profile`)

  const checkpoints = new JobCheckpoints(deps.checkpointStore, jobId)
  const previous = await checkpoints.loadMetadata()
  if (previous) {
    console.log(`[SimplifyEpub] Job ${jobId}: resuming from checkpoints (previous level ${previous.simplificationLevel})`)
  }
  await checkpoints.saveMetadata({
    simplificationLevel: level,
    totalChapters: chapters.length,
    globalSummary: previous?.globalSummary
  })

  const gateway = new GuardedRewriteGateway(deps.gateway, config)
  const context = new ContextTracker(
    gateway,
    checkpoints,
    config,
    { level, totalChapters: chapters.length },
    previous?.globalSummary
  )
  const scheduler = new ChapterScheduler({ gateway, checkpoints, context, settings: config, level }, config.maxWorkers)

  status.updateProgress(READ_PROGRESS, `Processing ${chapters.length} chapter(s)...`)
  const outcomes = await scheduler.run(chapters, progress => {
    status.updateProgress(
      Math.floor(READ_PROGRESS + progress.fraction * (WRITE_PROGRESS - READ_PROGRESS)),
      progress.message,
      progress.processedChapters
    )
  })

  const failedChapters = outcomes.filter(outcome => outcome.finalState === 'failed').length
  if (failedChapters > 0) {
    console.warn(`[SimplifyEpub] Job ${jobId}: ${failedChapters} chapter(s) kept their original text`)
  }

  status.updateProgress(WRITE_PROGRESS, 'Writing final EPUB...', chapters.length)
  const { document: output } = reconstructDocument(
    document,
    outcomes.map(outcome => outcome.chapter),
    level
  )

  await fs.mkdir(config.outputDir, { recursive: true })
  const outputRef = path.join(config.outputDir, outputFileName(jobId, level))
  await fs.writeFile(outputRef, output.toBuffer())
  console.log(`[SimplifyEpub] Job ${jobId}: wrote ${outputRef}`)

  return { document: output, outputRef, failedChapters }
}
