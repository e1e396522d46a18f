/**
 * JobStatusPublisher - single writer of one job's status record
 *
 * Every update produces a complete snapshot, and snapshots are written to the
 * store strictly in order, so the last snapshot published is the last one
 * stored. Progress never goes backwards while the job is processing, and
 * terminal states are final.
 *
 * @example
 * ```typescript
 * const status = new JobStatusPublisher(store, initialState)
 * status.updateProgress(40, 'Chapter 3/12: rewriting window 2/5', 2)
 * status.markCompleted('/out/job_simplified_level_2.epub')
 * await status.flush()
 * ```
 */

import { getUserFriendlyError } from '../errors.js'
import type { JobStatusStore } from './job-status-store.js'
import type { JobState } from '../../types/simplification.js'

type JobStatePatch = Partial<Omit<JobState, 'jobId' | 'level' | 'updatedAt'>>

export class JobStatusPublisher {
  private current: JobState
  private pending: Promise<void> = Promise.resolve()

  constructor(
    private readonly store: JobStatusStore,
    initial: JobState
  ) {
    this.current = { ...initial }
    this.publish({})
  }

  get snapshot(): JobState {
    return { ...this.current }
  }

  get isTerminal(): boolean {
    return this.current.status === 'completed' || this.current.status === 'failed'
  }

  /**
   * @param percent - 0..100; lower values than the last published one are ignored
   */
  updateProgress(percent: number, message: string, processedChapters?: number): void {
    this.publish({
      status: 'processing',
      progress: Math.max(this.current.progress, Math.min(100, percent)),
      message,
      processedChapters: processedChapters ?? this.current.processedChapters
    })
  }

  /** Records the chapter count once the document has been read. */
  setTotalChapters(totalChapters: number): void {
    this.publish({ totalChapters })
  }

  markCompleted(outputRef: string, message: string = 'Done'): void {
    this.publish({
      status: 'completed',
      progress: 100,
      processedChapters: this.current.totalChapters,
      message,
      outputRef
    })
  }

  markFailed(error: unknown): void {
    const friendly = getUserFriendlyError(error)
    this.publish({
      status: 'failed',
      message: friendly,
      error: error instanceof Error ? error.message : String(error)
    })
  }

  /** Resolves once every published snapshot has been handed to the store. */
  flush(): Promise<void> {
    return this.pending
  }

  private publish(patch: JobStatePatch): void {
    if (this.isTerminal) {
      return
    }

    this.current = { ...this.current, ...patch, updatedAt: new Date().toISOString() }
    const snapshot = { ...this.current }
    this.pending = this.pending.then(() => this.write(snapshot))
  }

  private async write(snapshot: JobState): Promise<void> {
    try {
      await this.store.set(snapshot)
    } catch (error) {
      console.warn(
        `[JobStatus] Failed to store status for ${snapshot.jobId}:`,
        error instanceof Error ? error.message : error
      )
    }
  }
}
