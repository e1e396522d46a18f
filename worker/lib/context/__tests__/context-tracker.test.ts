import { createPipelineConfig, DEFAULT_SUMMARY_BUDGETS, type PipelineConfig } from '../../config.js'
import { InMemoryCheckpointStore } from '../../checkpoint/checkpoint-store.js'
import { JobCheckpoints } from '../../checkpoint/job-checkpoints.js'
import { GuardedRewriteGateway } from '../../gateway/guarded-gateway.js'
import { ContextTracker, globalSample, memoryTail } from '../context-tracker.js'
import type { Chapter } from '../../../types/simplification.js'
import { createStubGateway, type StubGateway } from '../../../tests/helpers'

const chapters: Chapter[] = [
  { id: 'c1', title: 'One', content: 'The first chapter opens at the harbour.' },
  { id: 'c2', title: 'Two', content: 'The second chapter follows the boats out.' }
]

describe('memoryTail', () => {
  it('returns the end of the last window', () => {
    expect(memoryTail(['first window', 'abcdefghij'], 4)).toBe('ghij')
    expect(memoryTail(['short'], 400)).toBe('short')
  })

  it('is empty before the first window', () => {
    expect(memoryTail([], 400)).toBe('')
    expect(memoryTail(['text'], 0)).toBe('')
  })
})

describe('globalSample', () => {
  const budgets = { ...DEFAULT_SUMMARY_BUDGETS, globalChapterSample: 3, globalCharsPerChapter: 5, globalCharBudget: 9 }

  it('joins the head of each leading chapter and caps the total', () => {
    const sample = globalSample(
      [
        { id: 'a', title: 'A', content: 'abcdefgh' },
        { id: 'b', title: 'B', content: '123456' },
        { id: 'c', title: 'C', content: 'zzz' }
      ],
      budgets
    )

    expect(sample).toBe('abcde\n\n12')
  })

  it('skips chapters without text', () => {
    const sample = globalSample(
      [
        { id: 'a', title: 'A', content: '   ' },
        { id: 'b', title: 'B', content: 'xyz' }
      ],
      budgets
    )

    expect(sample).toBe('xyz')
  })
})

describe('ContextTracker', () => {
  let inner: StubGateway
  let store: InMemoryCheckpointStore
  let checkpoints: JobCheckpoints
  let log: jest.SpyInstance

  const tracker = (config: PipelineConfig, cachedGlobalSummary?: string): ContextTracker =>
    new ContextTracker(
      new GuardedRewriteGateway(inner, config),
      checkpoints,
      config,
      { level: 2, totalChapters: chapters.length },
      cachedGlobalSummary
    )

  beforeEach(() => {
    inner = createStubGateway()
    store = new InMemoryCheckpointStore()
    checkpoints = new JobCheckpoints(store, 'job-1')
    log = jest.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    log.mockRestore()
  })

  it('computes the global summary once for concurrent callers and persists it', async () => {
    const context = tracker(createPipelineConfig('quality'))

    const summaries = await Promise.all([context.getGlobalSummary(chapters), context.getGlobalSummary(chapters)])

    expect(summaries).toEqual([
      'A document summary that is long enough to pass the minimum length check.',
      'A document summary that is long enough to pass the minimum length check.'
    ])
    expect(inner.summarize).toHaveBeenCalledTimes(1)
    expect(inner.summarize.mock.calls[0][0]).toBe(`${chapters[0].content}\n\n${chapters[1].content}`)
    await expect(checkpoints.loadMetadata()).resolves.toEqual({
      schemaVersion: 1,
      simplificationLevel: 2,
      totalChapters: 2,
      globalSummary: 'A document summary that is long enough to pass the minimum length check.'
    })
  })

  it('reuses a checkpointed global summary', async () => {
    const context = tracker(createPipelineConfig('quality'), 'Cached book summary.')

    await expect(context.getGlobalSummary(chapters)).resolves.toBe('Cached book summary.')
    expect(inner.summarize).not.toHaveBeenCalled()
  })

  it('summarizes a chapter unless a cached summary exists', async () => {
    const context = tracker(createPipelineConfig('quality'))

    await expect(context.getChapterSummary(chapters[0], 'From checkpoint.')).resolves.toBe('From checkpoint.')
    expect(inner.summarize).not.toHaveBeenCalled()

    await expect(context.getChapterSummary(chapters[0])).resolves.toBe(
      'A chapter summary that is long enough to pass the minimum length check.'
    )
    expect(inner.summarize).toHaveBeenCalledWith(chapters[0].content, 'chapter', expect.any(AbortSignal))
  })

  it('returns empty summaries when summaries are off', async () => {
    const context = tracker(createPipelineConfig('fast'))

    await expect(context.getGlobalSummary(chapters)).resolves.toBe('')
    await expect(context.getChapterSummary(chapters[0])).resolves.toBe('')
    expect(inner.summarize).not.toHaveBeenCalled()
  })

  it('cuts the memory tail to the configured length', () => {
    const context = tracker(createPipelineConfig('quality', { memoryTailChars: 3 }))

    expect(context.memoryTail(['abc', 'defgh'])).toBe('fgh')
  })
})
