import { createPipelineConfig, DEFAULT_VALIDATION } from '../../config.js'
import { InMemoryCheckpointStore } from '../../checkpoint/checkpoint-store.js'
import { JobCheckpoints } from '../../checkpoint/job-checkpoints.js'
import { ContextTracker } from '../../context/context-tracker.js'
import { GuardedRewriteGateway } from '../../gateway/guarded-gateway.js'
import { ChapterScheduler, type SchedulerProgress } from '../chapter-scheduler.js'
import type { ChapterWorkerDeps } from '../chapter-worker.js'
import type { Chapter } from '../../../types/simplification.js'
import { createStubGateway, variedText, type StubGateway } from '../../../tests/helpers'

const config = createPipelineConfig('fast', {
  chunkSize: 10,
  overlap: 2,
  retryDelayMs: 0,
  maxAttempts: 1,
  validation: { ...DEFAULT_VALIDATION, minChars: 1 }
})

const chapters: Chapter[] = Array.from({ length: 6 }, (_, i) => ({
  id: `ch${i}`,
  title: `Chapter ${i}`,
  content: variedText(8, `c${i}w`)
}))

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

describe('ChapterScheduler', () => {
  let inner: StubGateway
  let deps: ChapterWorkerDeps
  const spies: jest.SpyInstance[] = []

  beforeEach(() => {
    inner = createStubGateway()
    const checkpoints = new JobCheckpoints(new InMemoryCheckpointStore(), 'job-1')
    const gateway = new GuardedRewriteGateway(inner, config)
    deps = {
      gateway,
      checkpoints,
      context: new ContextTracker(gateway, checkpoints, config, { level: 1, totalChapters: chapters.length }),
      settings: config,
      level: 1
    }
    for (const method of ['log', 'warn', 'error'] as const) {
      spies.push(jest.spyOn(console, method).mockImplementation(() => {}))
    }
  })

  afterEach(() => {
    spies.splice(0).forEach(spy => spy.mockRestore())
  })

  it('returns outcomes in chapter order whatever the completion order', async () => {
    let active = 0
    let maxActive = 0
    inner.rewrite.mockImplementation(async request => {
      active++
      maxActive = Math.max(maxActive, active)
      await delay(1 + Math.floor(Math.random() * 15))
      active--
      return request.windowText.toUpperCase()
    })

    const outcomes = await new ChapterScheduler(deps, 2).run(chapters)

    expect(outcomes.map(o => o.index)).toEqual([0, 1, 2, 3, 4, 5])
    expect(outcomes.map(o => o.chapter.id)).toEqual(chapters.map(c => c.id))
    expect(outcomes.map(o => o.chapter.content)).toEqual(chapters.map(c => c.content.toUpperCase()))
    expect(maxActive).toBeLessThanOrEqual(2)
  })

  it('reports progress that never decreases and ends at 1', async () => {
    const progress: SchedulerProgress[] = []

    await new ChapterScheduler(deps, 3).run(chapters, p => progress.push(p))

    const fractions = progress.map(p => p.fraction)
    for (let i = 1; i < fractions.length; i++) {
      expect(fractions[i]).toBeGreaterThanOrEqual(fractions[i - 1])
    }
    expect(progress[progress.length - 1]).toEqual({
      fraction: 1,
      processedChapters: 6,
      message: '6/6 chapters processed'
    })
  })

  it('keeps going when one chapter falls back', async () => {
    inner.rewrite.mockImplementation(async request => {
      if (request.windowText.startsWith('c2w')) throw new Error('socket hang up')
      return request.windowText.toUpperCase()
    })

    const outcomes = await new ChapterScheduler(deps, 2).run(chapters)

    expect(outcomes.map(o => o.finalState)).toEqual(['done', 'done', 'done', 'done', 'done', 'done'])
    expect(outcomes[2].chapter.content).toBe(chapters[2].content)
    expect(outcomes[2].fallbackWindows).toBe(1)
    expect(outcomes[3].chapter.content).toBe(chapters[3].content.toUpperCase())
  })

  it('handles an empty chapter list', async () => {
    await expect(new ChapterScheduler(deps, 2).run([])).resolves.toEqual([])
  })

  it('requires at least one worker', () => {
    expect(() => new ChapterScheduler(deps, 0)).toThrow(RangeError)
  })
})
