/**
 * Chapter Scheduler
 *
 * Runs up to `maxWorkers` chapter workers at once over a shared queue of
 * chapter indices. Outcomes are placed by chapter index, never by completion
 * order. Reported progress is completed chapters plus the in-flight fractions,
 * and never decreases.
 */

import { runChapterWorker, type ChapterWorkerDeps } from './chapter-worker.js'
import type { Chapter, ChapterOutcome } from '../../types/simplification.js'

export interface SchedulerProgress {
  /** Share of the job's chapters finished, 0..1 */
  fraction: number
  processedChapters: number
  message: string
}

export type SchedulerProgressListener = (progress: SchedulerProgress) => void

export class ChapterScheduler {
  constructor(
    private readonly deps: ChapterWorkerDeps,
    private readonly maxWorkers: number
  ) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`)
    }
  }

  /**
   * @returns One outcome per input chapter, at the chapter's index
   */
  async run(
    chapters: readonly Chapter[],
    onProgress: SchedulerProgressListener = () => {}
  ): Promise<ChapterOutcome[]> {
    const total = chapters.length
    const outcomes: Array<ChapterOutcome | undefined> = Array.from({ length: total }, () => undefined)
    const inFlight = new Map<number, number>()
    let completed = 0
    let nextIndex = 0
    let lastFraction = 0

    const report = (message: string): void => {
      let partial = 0
      for (const fraction of inFlight.values()) partial += fraction

      const raw = total === 0 ? 1 : (completed + partial) / total
      lastFraction = Math.max(lastFraction, Math.min(1, raw))
      onProgress({ fraction: lastFraction, processedChapters: completed, message })
    }

    const workerLoop = async (): Promise<void> => {
      while (nextIndex < total) {
        const index = nextIndex++
        inFlight.set(index, 0)

        const outcome = await runChapterWorker(
          { index, chapter: chapters[index], chapters },
          this.deps,
          event => {
            if (inFlight.has(index)) inFlight.set(index, event.fraction)
            report(event.message)
          }
        )

        inFlight.delete(index)
        outcomes[index] = outcome
        completed++
        report(`${completed}/${total} chapters processed`)
      }
    }

    const poolSize = Math.min(this.maxWorkers, total)
    console.log(`[Scheduler] Processing ${total} chapter(s) with ${poolSize} worker(s)`)
    await Promise.all(Array.from({ length: poolSize }, () => workerLoop()))

    return outcomes.map((outcome, index) => {
      if (!outcome) {
        throw new Error(`Chapter ${index + 1} produced no outcome`)
      }
      return outcome
    })
  }
}
