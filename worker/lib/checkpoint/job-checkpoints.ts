/**
 * Typed checkpoint records for one job.
 *
 * Layout under the store's job scope:
 * - meta.json                  job metadata (level, chapter count, global summary)
 * - chapter_<i>_meta.json      progress of chapter i
 * - chapter_<i>_windows.json   rewritten window texts of chapter i, in order
 *
 * Every record is validated on load. Unreadable, invalid or foreign-version
 * records are treated as absent. Failed writes are logged and never thrown.
 */

import { createHash } from 'crypto'
import type { ZodType } from 'zod'
import type { CheckpointStore } from './checkpoint-store.js'
import {
  CHECKPOINT_SCHEMA_VERSION,
  ChapterCheckpointSchema,
  ChapterWindowsSchema,
  DocumentMetadataSchema,
  type ChapterCheckpoint,
  type DocumentMetadata
} from '../../types/checkpoint.js'
import type { SimplificationLevel } from '../../types/simplification.js'

const METADATA_KEY = 'meta.json'

const chapterMetaKey = (index: number): string => `chapter_${index}_meta.json`
const chapterWindowsKey = (index: number): string => `chapter_${index}_windows.json`

/**
 * Identifies the window layout of a chapter. Rewritten windows are only reusable
 * when content, chunkSize and overlap are unchanged.
 */
export function windowFingerprint(content: string, chunkSize: number, overlap: number): string {
  return createHash('sha256')
    .update(content)
    .update(`\u0000${chunkSize}:${overlap}`)
    .digest('hex')
}

/**
 * Where a chapter picks up. `windows.length === processedWindows` always holds.
 */
export interface ChapterResumeState {
  processedWindows: number
  windows: string[]
  complete: boolean
  chapterSummary?: string
}

export interface ChapterLayout {
  totalWindows: number
  level: SimplificationLevel
  fingerprint: string
}

export interface ChapterProgress extends ChapterLayout {
  windows: string[]
  complete: boolean
  chapterSummary?: string
}

export type JobMetadataInput = Omit<DocumentMetadata, 'schemaVersion'>

export class JobCheckpoints {
  constructor(
    private readonly store: CheckpointStore,
    readonly jobId: string
  ) {}

  private async loadRecord<T>(key: string, schema: ZodType<T>): Promise<T | undefined> {
    const loaded = await this.store.load(this.jobId, key)
    if (!loaded.ok) {
      console.warn(`[CheckpointStore] Ignoring unreadable ${this.jobId}/${key}: ${loaded.detail}`)
      return undefined
    }
    if (loaded.value === undefined) return undefined

    const parsed = schema.safeParse(loaded.value)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      console.warn(
        `[CheckpointStore] Ignoring invalid ${this.jobId}/${key}: ${issue ? issue.message : 'schema mismatch'}`
      )
      return undefined
    }
    return parsed.data
  }

  private async saveRecord(key: string, value: unknown): Promise<boolean> {
    const saved = await this.store.save(this.jobId, key, value)
    if (!saved.ok) {
      console.warn(`[CheckpointStore] Failed to save ${this.jobId}/${key} (${saved.kind}): ${saved.detail}`)
      return false
    }
    return true
  }

  async loadMetadata(): Promise<DocumentMetadata | undefined> {
    return this.loadRecord(METADATA_KEY, DocumentMetadataSchema)
  }

  async saveMetadata(metadata: JobMetadataInput): Promise<void> {
    const record: DocumentMetadata = { schemaVersion: CHECKPOINT_SCHEMA_VERSION, ...metadata }
    await this.saveRecord(METADATA_KEY, record)
  }

  /**
   * Loads the resume point for a chapter.
   *
   * The cached summary survives a layout or level change; rewritten windows do not.
   */
  async loadChapter(index: number, layout: ChapterLayout): Promise<ChapterResumeState> {
    const meta = await this.loadRecord(chapterMetaKey(index), ChapterCheckpointSchema)
    if (!meta) {
      return { processedWindows: 0, windows: [], complete: false }
    }

    const fresh: ChapterResumeState = {
      processedWindows: 0,
      windows: [],
      complete: false,
      chapterSummary: meta.chapterSummary
    }

    if (meta.totalWindows !== layout.totalWindows) {
      console.warn(
        `[CheckpointStore] Chapter ${index}: window count changed (${meta.totalWindows} -> ${layout.totalWindows}), restarting windows`
      )
      return fresh
    }
    if (meta.level !== undefined && meta.level !== layout.level) {
      console.log(`[CheckpointStore] Chapter ${index}: level changed (${meta.level} -> ${layout.level}), restarting windows`)
      return fresh
    }
    if (meta.windowFingerprint !== undefined && meta.windowFingerprint !== layout.fingerprint) {
      console.warn(`[CheckpointStore] Chapter ${index}: content or window settings changed, restarting windows`)
      return fresh
    }

    const stored = await this.loadRecord(chapterWindowsKey(index), ChapterWindowsSchema)
    const storedWindows = stored ? stored.windows : []

    // The windows record is written before the meta record, so it may run ahead by one.
    const processedWindows = Math.min(meta.processedWindows, storedWindows.length, layout.totalWindows)

    return {
      processedWindows,
      windows: storedWindows.slice(0, processedWindows),
      complete: meta.complete && processedWindows === layout.totalWindows,
      chapterSummary: meta.chapterSummary
    }
  }

  /**
   * Persists chapter progress: the window list first, then the progress record.
   * A failed window write leaves the progress record untouched.
   */
  async saveChapter(index: number, progress: ChapterProgress): Promise<void> {
    const windowsSaved = await this.saveRecord(chapterWindowsKey(index), {
      schemaVersion: CHECKPOINT_SCHEMA_VERSION,
      windows: progress.windows
    })
    if (!windowsSaved) return

    const record: ChapterCheckpoint = {
      schemaVersion: CHECKPOINT_SCHEMA_VERSION,
      processedWindows: progress.windows.length,
      totalWindows: progress.totalWindows,
      complete: progress.complete,
      chapterSummary: progress.chapterSummary,
      level: progress.level,
      windowFingerprint: progress.fingerprint
    }
    await this.saveRecord(chapterMetaKey(index), record)
  }
}
