/**
 * Job submission and query boundary.
 *
 * `submit` validates the level, registers the job and starts it in the
 * background; `status` and `result` read what the job has published so far.
 * Resubmitting a finished or interrupted job id resumes from its checkpoints.
 */

import { randomUUID } from 'crypto'
import type { PipelineConfig } from './config.js'
import { FileCheckpointStore, type CheckpointStore } from './checkpoint/checkpoint-store.js'
import { EpubDocument } from './epub/epub-document.js'
import { InvalidJobIdError, InvalidLevelError, JobConflictError, getUserFriendlyError } from './errors.js'
import { createRewriteGateway } from './gateway/factory.js'
import type { RewriteGateway } from './gateway/types.js'
import { JobStatusPublisher } from './jobs/job-status-publisher.js'
import { InMemoryJobStatusStore, type JobStatusStore } from './jobs/job-status-store.js'
import { simplifyEpubHandler } from '../handlers/simplify-epub.js'
import {
  isSimplificationLevel,
  type JobState,
  type SimplificationLevel
} from '../types/simplification.js'

/** Job ids become directory and file names. */
const JOB_ID_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/

export interface SimplificationServiceDeps {
  config: PipelineConfig
  /** Defaults to the backend selected by `config.backend` */
  gateway?: RewriteGateway
  /** Defaults to JSON files under `config.checkpointDir` */
  checkpointStore?: CheckpointStore
  /** Defaults to an in-memory store */
  statusStore?: JobStatusStore
}

export interface SubmitOptions {
  /** Reuse an id to resume that job from its checkpoints */
  jobId?: string
}

export class SimplificationService {
  private readonly config: PipelineConfig
  private readonly gateway: RewriteGateway
  private readonly checkpointStore: CheckpointStore
  private readonly statusStore: JobStatusStore
  private readonly running = new Map<string, Promise<void>>()
  private readonly results = new Map<string, EpubDocument>()

  constructor(deps: SimplificationServiceDeps) {
    this.config = deps.config
    this.gateway = deps.gateway ?? createRewriteGateway(deps.config)
    this.checkpointStore = deps.checkpointStore ?? new FileCheckpointStore(deps.config.checkpointDir)
    this.statusStore = deps.statusStore ?? new InMemoryJobStatusStore()
  }

  /**
   * Accepts a job and starts it in the background.
   *
   * @param source - Parsed document, or raw EPUB bytes (parsed inside the job)
   * @throws InvalidLevelError for a level outside 1..3
   * @throws InvalidJobIdError when the job id is not a plain file name
   * @throws JobConflictError when the job id is already processing
   */
  submit(source: EpubDocument | Buffer, level: unknown, options: SubmitOptions = {}): string {
    if (!isSimplificationLevel(level)) {
      throw new InvalidLevelError(level)
    }

    const jobId = options.jobId ?? randomUUID()
    if (!JOB_ID_PATTERN.test(jobId)) {
      throw new InvalidJobIdError(jobId)
    }
    if (this.running.has(jobId)) {
      throw new JobConflictError(jobId)
    }

    this.results.delete(jobId)
    const status = new JobStatusPublisher(this.statusStore, {
      jobId,
      status: 'queued',
      progress: 0,
      totalChapters: source instanceof EpubDocument ? source.units.length : 0,
      processedChapters: 0,
      message: 'Queued',
      level,
      updatedAt: new Date().toISOString()
    })

    const run = this.execute(jobId, source, level, status).finally(() => {
      this.running.delete(jobId)
    })
    this.running.set(jobId, run)
    return jobId
  }

  async status(jobId: string): Promise<JobState | undefined> {
    return this.statusStore.get(jobId)
  }

  /** Output document of a completed job, or undefined. */
  result(jobId: string): EpubDocument | undefined {
    return this.results.get(jobId)
  }

  /**
   * Waits for a running job to finish and returns its final state.
   */
  async waitFor(jobId: string): Promise<JobState | undefined> {
    await this.running.get(jobId)
    return this.status(jobId)
  }

  isRunning(jobId: string): boolean {
    return this.running.has(jobId)
  }

  private async execute(
    jobId: string,
    source: EpubDocument | Buffer,
    level: SimplificationLevel,
    status: JobStatusPublisher
  ): Promise<void> {
    try {
      const document = source instanceof EpubDocument ? source : EpubDocument.fromBuffer(source)
      const outcome = await simplifyEpubHandler(
        { jobId, document, level },
        {
          config: this.config,
          gateway: this.gateway,
          checkpointStore: this.checkpointStore,
          status
        }
      )

      this.results.set(jobId, outcome.document)
      status.markCompleted(outcome.outputRef)
    } catch (error) {
      console.error(`[SimplificationService] Job ${jobId} failed:`, getUserFriendlyError(error))
      status.markFailed(error)
    } finally {
      await status.flush()
    }
  }
}
