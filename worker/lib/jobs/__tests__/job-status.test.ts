import type { SupabaseClient } from '@supabase/supabase-js'
import { DocumentReadError } from '../../errors.js'
import { JobStatusPublisher } from '../job-status-publisher.js'
import {
  fromBackgroundJobRow,
  InMemoryJobStatusStore,
  SupabaseJobStatusStore,
  toBackgroundJobRow,
  type JobStatusStore
} from '../job-status-store.js'
import type { JobState } from '../../../types/simplification.js'

const initial: JobState = {
  jobId: 'job-1',
  status: 'queued',
  progress: 0,
  totalChapters: 4,
  processedChapters: 0,
  message: 'Queued',
  level: 2,
  updatedAt: '2026-01-01T00:00:00.000Z'
}

describe('JobStatusPublisher', () => {
  it('publishes the initial snapshot', async () => {
    const store = new InMemoryJobStatusStore()
    const publisher = new JobStatusPublisher(store, initial)
    await publisher.flush()

    expect(await store.get('job-1')).toMatchObject({ status: 'queued', message: 'Queued', progress: 0 })
  })

  it('never lets progress go backwards', async () => {
    const store = new InMemoryJobStatusStore()
    const publisher = new JobStatusPublisher(store, initial)

    publisher.updateProgress(40, 'Chapter 2/4: rewriting window 1/3', 1)
    publisher.updateProgress(30, 'Chapter 3/4: rewriting window 1/2')
    await publisher.flush()

    expect(await store.get('job-1')).toMatchObject({
      status: 'processing',
      progress: 40,
      message: 'Chapter 3/4: rewriting window 1/2',
      processedChapters: 1
    })
  })

  it('completes with full progress and the output reference', async () => {
    const store = new InMemoryJobStatusStore()
    const publisher = new JobStatusPublisher(store, initial)

    publisher.updateProgress(95, 'Writing final EPUB...')
    publisher.markCompleted('/out/job-1_simplified_level_2.epub')
    await publisher.flush()

    expect(await store.get('job-1')).toMatchObject({
      status: 'completed',
      progress: 100,
      processedChapters: 4,
      message: 'Done',
      outputRef: '/out/job-1_simplified_level_2.epub'
    })
  })

  it('ignores updates after a terminal state', async () => {
    const store = new InMemoryJobStatusStore()
    const publisher = new JobStatusPublisher(store, initial)

    publisher.markFailed(new DocumentReadError('EPUB is corrupted: No OPF package file found'))
    publisher.updateProgress(50, 'late update')
    await publisher.flush()

    expect(publisher.isTerminal).toBe(true)
    expect(await store.get('job-1')).toMatchObject({
      status: 'failed',
      progress: 0,
      message: 'EPUB is corrupted: No OPF package file found. The file may not be a valid EPUB.',
      error: 'EPUB is corrupted: No OPF package file found'
    })
  })

  it('writes snapshots in publish order', async () => {
    const written: string[] = []
    const store: JobStatusStore = {
      get: async () => undefined,
      set: async state => {
        await new Promise(resolve => setTimeout(resolve, state.message === 'first' ? 20 : 0))
        written.push(state.message)
      }
    }
    const publisher = new JobStatusPublisher(store, { ...initial, message: 'first' })

    publisher.updateProgress(10, 'second')
    publisher.updateProgress(20, 'third')
    await publisher.flush()

    expect(written).toEqual(['first', 'second', 'third'])
  })

  it('logs a failed status write instead of failing', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {})
    const store: JobStatusStore = {
      get: async () => undefined,
      set: async () => {
        throw new Error('connection reset')
      }
    }

    const publisher = new JobStatusPublisher(store, initial)
    await expect(publisher.flush()).resolves.toBeUndefined()
    expect(warn).toHaveBeenCalledWith('[JobStatus] Failed to store status for job-1:', 'connection reset')

    warn.mockRestore()
  })
})

describe('background_jobs rows', () => {
  it('maps a job state to a row and back', () => {
    const state: JobState = { ...initial, status: 'completed', progress: 100, outputRef: '/out/a.epub', processedChapters: 4 }
    const row = toBackgroundJobRow(state)

    expect(row).toEqual({
      id: 'job-1',
      job_type: 'simplify_epub',
      status: 'completed',
      progress: { percent: 100, stage: 'completed', details: 'Queued' },
      input_data: { level: 2, totalChapters: 4 },
      output_data: { processedChapters: 4, outputRef: '/out/a.epub' },
      last_error: null,
      updated_at: '2026-01-01T00:00:00.000Z'
    })
    expect(fromBackgroundJobRow(row)).toEqual(state)
  })
})

describe('SupabaseJobStatusStore', () => {
  function createMockSupabase(result: { data: unknown; error: { message: string } | null }) {
    const query = {
      select: jest.fn(),
      eq: jest.fn(),
      maybeSingle: jest.fn().mockResolvedValue(result),
      upsert: jest.fn().mockResolvedValue({ error: result.error })
    }
    query.select.mockReturnValue(query)
    query.eq.mockReturnValue(query)
    const from = jest.fn().mockReturnValue(query)
    const supabase = { from } as unknown as SupabaseClient
    return { supabase, from, query }
  }

  it('upserts the full snapshot by id', async () => {
    const { supabase, from, query } = createMockSupabase({ data: null, error: null })

    await new SupabaseJobStatusStore(supabase).set(initial)

    expect(from).toHaveBeenCalledWith('background_jobs')
    expect(query.upsert).toHaveBeenCalledWith(toBackgroundJobRow(initial), { onConflict: 'id' })
  })

  it('reads a row back into a job state', async () => {
    const { supabase, query } = createMockSupabase({ data: toBackgroundJobRow(initial), error: null })

    await expect(new SupabaseJobStatusStore(supabase).get('job-1')).resolves.toEqual(initial)
    expect(query.eq).toHaveBeenCalledWith('id', 'job-1')
  })

  it('returns undefined for a missing or malformed row', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {})

    const missing = createMockSupabase({ data: null, error: null })
    await expect(new SupabaseJobStatusStore(missing.supabase).get('job-1')).resolves.toBeUndefined()

    const malformed = createMockSupabase({ data: { id: 'job-1', status: 'exploded' }, error: null })
    await expect(new SupabaseJobStatusStore(malformed.supabase).get('job-1')).resolves.toBeUndefined()

    warn.mockRestore()
  })

  it('raises database errors', async () => {
    const { supabase } = createMockSupabase({ data: null, error: { message: 'permission denied' } })

    await expect(new SupabaseJobStatusStore(supabase).set(initial)).rejects.toThrow(
      'Failed to write job job-1: permission denied'
    )
    await expect(new SupabaseJobStatusStore(supabase).get('job-1')).rejects.toThrow(
      'Failed to read job job-1: permission denied'
    )
  })
})
