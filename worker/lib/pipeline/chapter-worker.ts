/**
 * Chapter Worker
 *
 * Sequential pipeline for one chapter:
 *   pending → fetching_summary → rewriting_windows → smoothing_transitions → done
 *
 * Any error inside the chapter ends in `failed` with the original content; the
 * worker never rejects. Resume starts at the checkpointed window index, and a
 * complete checkpoint skips straight to smoothing.
 */

import type { PipelineConfig } from '../config.js'
import { splitIntoWindows, isProse } from '../chunking/word-windows.js'
import { windowFingerprint, type JobCheckpoints } from '../checkpoint/job-checkpoints.js'
import type { ContextTracker } from '../context/context-tracker.js'
import type { GuardedRewriteGateway } from '../gateway/guarded-gateway.js'
import type {
  Chapter,
  ChapterOutcome,
  ChapterWorkerState,
  SimplificationLevel,
  TextWindow
} from '../../types/simplification.js'

export type ChapterWorkerSettings = Pick<PipelineConfig, 'chunkSize' | 'overlap' | 'smoothTransitions'>

export interface ChapterWorkerDeps {
  gateway: GuardedRewriteGateway
  checkpoints: JobCheckpoints
  context: ContextTracker
  settings: ChapterWorkerSettings
  level: SimplificationLevel
}

export interface ChapterTask {
  index: number
  chapter: Chapter
  /** Every chapter of the document, for the global summary */
  chapters: readonly Chapter[]
}

export interface ChapterProgressEvent {
  index: number
  state: ChapterWorkerState
  /** Share of this chapter finished, 0..1 */
  fraction: number
  message: string
}

export type ChapterProgressListener = (event: ChapterProgressEvent) => void

export const PARAGRAPH_SEPARATOR = '\n\n'

/**
 * Joins the window outputs of a chapter. Rewritten windows are separated by
 * blank lines. A window that kept its original text holds only the words after
 * its overlap and is attached with the separator the original had there.
 */
export function stitchWindows(windows: readonly TextWindow[], outputs: readonly string[]): string {
  return outputs.reduce((content, output, i) => {
    if (i === 0) return output
    const window = windows[i]
    const separator = output === window.freshText && !window.breakBefore ? ' ' : PARAGRAPH_SEPARATOR
    return `${content}${separator}${output}`
  }, '')
}

function keptOriginal(windows: readonly TextWindow[], outputs: readonly string[]): boolean {
  return outputs.length === windows.length && outputs.every((output, i) => output === windows[i].freshText)
}

export async function runChapterWorker(
  task: ChapterTask,
  deps: ChapterWorkerDeps,
  onProgress: ChapterProgressListener = () => {}
): Promise<ChapterOutcome> {
  const { index, chapter } = task
  const label = `Chapter ${index + 1}/${task.chapters.length}`
  let state: ChapterWorkerState = 'pending'

  const enter = (next: ChapterWorkerState, fraction: number, message: string): void => {
    state = next
    onProgress({ index, state, fraction, message: `${label}: ${message}` })
  }

  const outcome = (
    content: string,
    details: Omit<ChapterOutcome, 'index' | 'chapter' | 'finalState' | 'skipped'> & { skipped?: boolean }
  ): ChapterOutcome => ({
    index,
    chapter: { id: chapter.id, title: chapter.title, content },
    finalState: 'done',
    skipped: details.skipped ?? false,
    totalWindows: details.totalWindows,
    resumedFrom: details.resumedFrom,
    fallbackWindows: details.fallbackWindows
  })

  enter('pending', 0, 'queued')

  if (!isProse(chapter.content)) {
    enter('done', 1, 'no prose, kept as is')
    return outcome(chapter.content, { skipped: true, totalWindows: 0, resumedFrom: 0, fallbackWindows: 0 })
  }

  let totalWindows = 0
  let resumedFrom = 0

  try {
    const { settings, level, gateway, checkpoints, context } = deps
    const windows = splitIntoWindows(chapter.content, settings)
    totalWindows = windows.length

    const fingerprint = windowFingerprint(chapter.content, settings.chunkSize, settings.overlap)
    const layout = { totalWindows, level, fingerprint }
    const resume = await checkpoints.loadChapter(index, layout)
    resumedFrom = resume.processedWindows

    let rewritten = resume.windows
    let fallbackWindows = 0

    if (resume.complete && rewritten.length > 0) {
      console.log(`[ChapterWorker] ${label}: checkpoint complete, skipping rewrite`)
    } else {
      enter('fetching_summary', 0, 'preparing context')
      const globalSummary = await context.getGlobalSummary(task.chapters)
      const chapterSummary = await context.getChapterSummary(chapter, resume.chapterSummary)

      if (resume.chapterSummary === undefined && chapterSummary) {
        await checkpoints.saveChapter(index, {
          ...layout,
          windows: rewritten,
          complete: false,
          chapterSummary
        })
      }

      if (resume.processedWindows > 0) {
        console.log(`[ChapterWorker] ${label}: resuming at window ${resume.processedWindows + 1}/${totalWindows}`)
      }

      for (let j = resume.processedWindows; j < totalWindows; j++) {
        enter('rewriting_windows', j / totalWindows, `rewriting window ${j + 1}/${totalWindows}`)

        const result = await gateway.rewrite({
          windowText: windows[j].text,
          globalSummary,
          chapterSummary,
          memoryTail: context.memoryTail(rewritten),
          level
        })
        if (result.fellBack) fallbackWindows++

        rewritten = [...rewritten, result.fellBack ? windows[j].freshText : result.text]
        await checkpoints.saveChapter(index, {
          ...layout,
          windows: rewritten,
          complete: rewritten.length === totalWindows,
          chapterSummary: chapterSummary || undefined
        })
      }
    }

    if (keptOriginal(windows, rewritten)) {
      enter('done', 1, 'no window rewritten, kept original text')
      console.warn(`[ChapterWorker] ${label}: every window kept its original text`)
      return outcome(chapter.content, { totalWindows, resumedFrom, fallbackWindows })
    }

    let content = stitchWindows(windows, rewritten)

    if (settings.smoothTransitions) {
      enter('smoothing_transitions', 1, 'smoothing transitions')
      const smoothed = await gateway.smoothTransitions(content)
      content = smoothed.text
    }

    enter('done', 1, 'done')
    if (fallbackWindows > 0) {
      console.warn(`[ChapterWorker] ${label}: ${fallbackWindows}/${totalWindows} window(s) kept original text`)
    }
    return outcome(content, { totalWindows, resumedFrom, fallbackWindows })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`[ChapterWorker] ${label} failed in ${state}, keeping original text:`, message)
    enter('failed', 1, 'failed, kept original text')

    return {
      ...outcome(chapter.content, { totalWindows, resumedFrom, fallbackWindows: totalWindows }),
      finalState: 'failed',
      error: message
    }
  }
}
