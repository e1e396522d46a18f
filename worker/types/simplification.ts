/**
 * Core domain types for the EPUB simplification pipeline.
 *
 * NAMING CONVENTION:
 * - Persisted checkpoint records: camelCase JSON (see types/checkpoint.ts)
 * - Job state snapshots: camelCase, whole-record replace on every write
 */

/**
 * Simplification intensity. Closed enum: anything else is a caller error.
 */
export type SimplificationLevel = 1 | 2 | 3

export type LevelName = 'light' | 'moderate' | 'aggressive'

export const LEVEL_NAMES: Record<SimplificationLevel, LevelName> = {
  1: 'light',
  2: 'moderate',
  3: 'aggressive'
}

/**
 * Suffix appended to the output book title per level.
 */
export const LEVEL_TITLE_SUFFIXES: Record<SimplificationLevel, string> = {
  1: ' - Light',
  2: ' - Moderate',
  3: ' - Aggressive'
}

export function isSimplificationLevel(value: unknown): value is SimplificationLevel {
  return value === 1 || value === 2 || value === 3
}

/**
 * One structural text unit of the source document.
 * `id` is the stable join key back into the container; never regenerated mid-job.
 */
export interface Chapter {
  id: string
  title: string
  content: string
}

/**
 * Word-bounded slice of a chapter, indexed left to right.
 */
export interface TextWindow {
  index: number
  /** First word offset (inclusive) */
  startWord: number
  /** Last word offset (exclusive) */
  endWord: number
  /** Words shared with the previous window */
  overlapWords: number
  text: string
  /** Original text of the words after the overlap */
  freshText: string
  /** True when the original has a paragraph break right before `freshText` */
  breakBefore: boolean
}

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed'

/**
 * Process-wide job record. Terminal on 'completed' or 'failed'.
 */
export interface JobState {
  jobId: string
  status: JobStatus
  /** 0..100, monotonically non-decreasing while processing */
  progress: number
  totalChapters: number
  processedChapters: number
  message: string
  level: SimplificationLevel
  outputRef?: string
  error?: string
  updatedAt: string
}

/**
 * Lifecycle states of a single chapter worker.
 */
export type ChapterWorkerState =
  | 'pending'
  | 'fetching_summary'
  | 'rewriting_windows'
  | 'smoothing_transitions'
  | 'done'
  | 'failed'

/**
 * Result of one chapter worker run. Order-independent; the scheduler
 * restores order by `index`.
 */
export interface ChapterOutcome {
  index: number
  chapter: Chapter
  finalState: 'done' | 'failed'
  /** True when the chapter passed through untouched (below the prose threshold) */
  skipped: boolean
  totalWindows: number
  /** Window index the run started from (0 unless resumed) */
  resumedFrom: number
  /** Windows whose rewrite fell back to the original text */
  fallbackWindows: number
  error?: string
}

/**
 * Summary shown after a document is loaded, before a job is submitted.
 */
export interface DocumentSummary {
  title: string
  chapterCount: number
  totalWords: number
}
