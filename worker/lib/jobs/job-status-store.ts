/**
 * Job status storage.
 *
 * Narrow get/set capability with whole-record replace: `set` always receives a
 * complete JobState snapshot, so concurrent writers can never clobber each
 * other's fields. The last snapshot written wins.
 */

import type { SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import type { JobState } from '../../types/simplification.js'

export interface JobStatusStore {
  get(jobId: string): Promise<JobState | undefined>
  set(state: JobState): Promise<void>
}

export class InMemoryJobStatusStore implements JobStatusStore {
  private readonly states = new Map<string, JobState>()

  async get(jobId: string): Promise<JobState | undefined> {
    const state = this.states.get(jobId)
    return state ? { ...state } : undefined
  }

  async set(state: JobState): Promise<void> {
    this.states.set(state.jobId, { ...state })
  }
}

export const SIMPLIFY_JOB_TYPE = 'simplify_epub'

const BackgroundJobRowSchema = z.object({
  id: z.string(),
  status: z.enum(['queued', 'processing', 'completed', 'failed']),
  progress: z.object({
    percent: z.number(),
    stage: z.string(),
    details: z.string()
  }),
  input_data: z.object({
    level: z.union([z.literal(1), z.literal(2), z.literal(3)]),
    totalChapters: z.number().int().nonnegative()
  }),
  output_data: z
    .object({
      processedChapters: z.number().int().nonnegative(),
      outputRef: z.string().optional()
    })
    .nullable(),
  last_error: z.string().nullable(),
  updated_at: z.string()
})

export type BackgroundJobRow = z.infer<typeof BackgroundJobRowSchema>

export function toBackgroundJobRow(state: JobState): BackgroundJobRow & { job_type: string } {
  return {
    id: state.jobId,
    job_type: SIMPLIFY_JOB_TYPE,
    status: state.status,
    progress: { percent: state.progress, stage: state.status, details: state.message },
    input_data: { level: state.level, totalChapters: state.totalChapters },
    output_data: { processedChapters: state.processedChapters, outputRef: state.outputRef },
    last_error: state.error ?? null,
    updated_at: state.updatedAt
  }
}

export function fromBackgroundJobRow(row: BackgroundJobRow): JobState {
  return {
    jobId: row.id,
    status: row.status,
    progress: row.progress.percent,
    totalChapters: row.input_data.totalChapters,
    processedChapters: row.output_data?.processedChapters ?? 0,
    message: row.progress.details,
    level: row.input_data.level,
    outputRef: row.output_data?.outputRef,
    error: row.last_error ?? undefined,
    updatedAt: row.updated_at
  }
}

/**
 * Status records in the `background_jobs` table, one row per job.
 */
export class SupabaseJobStatusStore implements JobStatusStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async get(jobId: string): Promise<JobState | undefined> {
    const { data, error } = await this.supabase
      .from('background_jobs')
      .select('id, status, progress, input_data, output_data, last_error, updated_at')
      .eq('id', jobId)
      .maybeSingle()

    if (error) {
      throw new Error(`Failed to read job ${jobId}: ${error.message}`)
    }
    if (!data) return undefined

    const row = BackgroundJobRowSchema.safeParse(data)
    if (!row.success) {
      console.warn(`[JobStatus] Ignoring malformed background_jobs row ${jobId}`)
      return undefined
    }
    return fromBackgroundJobRow(row.data)
  }

  async set(state: JobState): Promise<void> {
    const { error } = await this.supabase
      .from('background_jobs')
      .upsert(toBackgroundJobRow(state), { onConflict: 'id' })

    if (error) {
      throw new Error(`Failed to write job ${state.jobId}: ${error.message}`)
    }
  }
}
