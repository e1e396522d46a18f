/**
 * Checkpoint Record Schemas with Zod Validation
 *
 * Layout under `<checkpointDir>/<jobId>/`:
 * - meta.json                    DocumentMetadata (one per job)
 * - chapter_<i>_meta.json        ChapterCheckpoint
 * - chapter_<i>_windows.json     ChapterWindows (rewritten window texts, in order)
 *
 * Every record carries `schemaVersion`. Records with another version, or that fail
 * validation, are treated as absent and the affected chapter restarts.
 */

import { z } from 'zod'

export const CHECKPOINT_SCHEMA_VERSION = 1

const levelSchema = z.union([z.literal(1), z.literal(2), z.literal(3)])

export const DocumentMetadataSchema = z.object({
  schemaVersion: z.literal(CHECKPOINT_SCHEMA_VERSION),
  simplificationLevel: levelSchema,
  totalChapters: z.number().int().nonnegative(),
  globalSummary: z.string().optional()
})

export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>

export const ChapterCheckpointSchema = z
  .object({
    schemaVersion: z.literal(CHECKPOINT_SCHEMA_VERSION),
    processedWindows: z.number().int().nonnegative(),
    totalWindows: z.number().int().nonnegative(),
    complete: z.boolean(),
    chapterSummary: z.string().optional(),
    level: levelSchema.optional(),
    /** sha256 of content + chunkSize + overlap; guards against re-chunked resumes */
    windowFingerprint: z.string().optional()
  })
  .refine(cp => cp.processedWindows <= cp.totalWindows, {
    message: 'processedWindows exceeds totalWindows'
  })
  .refine(cp => !cp.complete || cp.processedWindows === cp.totalWindows, {
    message: 'complete checkpoint must cover every window'
  })

export type ChapterCheckpoint = z.infer<typeof ChapterCheckpointSchema>

export const ChapterWindowsSchema = z.object({
  schemaVersion: z.literal(CHECKPOINT_SCHEMA_VERSION),
  windows: z.array(z.string())
})

export type ChapterWindows = z.infer<typeof ChapterWindowsSchema>
