/**
 * Rolling context for window rewrites: a whole-book summary, a per-chapter
 * summary and the memory tail of the previous window.
 *
 * Summaries are computed at most once per job (global) or per chapter and are
 * persisted in checkpoint metadata, so resumed jobs never summarize again.
 * With summaries disabled (fast profile) both are empty strings.
 */

import type { PipelineConfig } from '../config.js'
import type { JobCheckpoints } from '../checkpoint/job-checkpoints.js'
import type { GuardedRewriteGateway } from '../gateway/guarded-gateway.js'
import type { Chapter, SimplificationLevel } from '../../types/simplification.js'

export type ContextSettings = Pick<PipelineConfig, 'useSummaries' | 'summaries' | 'memoryTailChars'>

/**
 * Trailing `maxChars` characters of the most recent rewritten window.
 */
export function memoryTail(windows: readonly string[], maxChars: number): string {
  if (windows.length === 0 || maxChars <= 0) return ''
  const last = windows[windows.length - 1]
  return last.length > maxChars ? last.slice(-maxChars) : last
}

/**
 * Text sampled for the global summary: the head of each leading chapter,
 * joined and capped.
 */
export function globalSample(chapters: readonly Chapter[], settings: ContextSettings['summaries']): string {
  return chapters
    .slice(0, settings.globalChapterSample)
    .map(chapter => chapter.content.slice(0, settings.globalCharsPerChapter))
    .filter(text => text.trim().length > 0)
    .join('\n\n')
    .slice(0, settings.globalCharBudget)
}

export class ContextTracker {
  private globalSummary?: Promise<string>

  constructor(
    private readonly gateway: GuardedRewriteGateway,
    private readonly checkpoints: JobCheckpoints,
    private readonly settings: ContextSettings,
    private readonly job: { level: SimplificationLevel; totalChapters: number },
    private cachedGlobalSummary?: string
  ) {}

  /**
   * Summary of the opening chapters, shared by every chapter of the job.
   * Concurrent callers share one summarize call.
   */
  getGlobalSummary(chapters: readonly Chapter[]): Promise<string> {
    if (!this.settings.useSummaries) return Promise.resolve('')
    if (this.cachedGlobalSummary !== undefined) return Promise.resolve(this.cachedGlobalSummary)

    if (!this.globalSummary) {
      this.globalSummary = this.computeGlobalSummary(chapters)
    }
    return this.globalSummary
  }

  private async computeGlobalSummary(chapters: readonly Chapter[]): Promise<string> {
    const sample = globalSample(chapters, this.settings.summaries)
    if (!sample) return ''

    console.log(`[ContextTracker] Summarizing opening chapters (${sample.length} chars)`)
    const summary = await this.gateway.summarize(sample, 'document')

    this.cachedGlobalSummary = summary.text
    await this.checkpoints.saveMetadata({
      simplificationLevel: this.job.level,
      totalChapters: this.job.totalChapters,
      globalSummary: summary.text
    })
    return summary.text
  }

  /**
   * @param cached - Summary from the chapter checkpoint, reused as-is when present
   */
  async getChapterSummary(chapter: Chapter, cached?: string): Promise<string> {
    if (!this.settings.useSummaries) return ''
    if (cached !== undefined) return cached

    const text = chapter.content.slice(0, this.settings.summaries.chapterCharBudget)
    const summary = await this.gateway.summarize(text, 'chapter')
    return summary.text
  }

  memoryTail(windows: readonly string[]): string {
    return memoryTail(windows, this.settings.memoryTailChars)
  }
}
