import { describe, it, expect, vi } from 'vitest'
import { createMemoryLogger } from '@mangaku/logger'
import { SourceAggregator, expectedLabels, type SourceTask } from '../source-aggregator.js'
import { extractSourceImages } from '../reader-source.js'

const pending = (): Promise<string[]> => new Promise<string[]>(() => {})

function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

describe('expectedLabels', () => {
  it('labels each source up to the cap', () => {
    expect(expectedLabels(2)).toEqual(['Server 1', 'Server 2'])
    expect(expectedLabels(7)).toEqual(['Server 1', 'Server 2', 'Server 3'])
  })

  it('falls back to every label when there is no source', () => {
    expect(expectedLabels(0)).toEqual(['Server 1', 'Server 2', 'Server 3'])
  })
})

describe('extractSourceImages', () => {
  it('trims and drops blank entries', () => {
    expect(extractSourceImages({ images: [' https://cdn.test/1.jpg ', '', 'https://cdn.test/2.jpg'], extra: 1 })).toEqual([
      'https://cdn.test/1.jpg',
      'https://cdn.test/2.jpg',
    ])
  })

  it('rejects descriptors without images', () => {
    expect(() => extractSourceImages({ images: ['  '] })).toThrow('source has no images')
    expect(() => extractSourceImages({ pages: [] })).toThrow()
    expect(() => extractSourceImages(null)).toThrow()
  })
})

describe('SourceAggregator', () => {
  it('maps each source to its label in order', async () => {
    const aggregator = new SourceAggregator()

    const images = await aggregator.aggregate([
      { images: ['https://cdn.test/a1.jpg', 'https://cdn.test/a2.jpg'] },
      { images: ['https://cdn.test/b1.jpg'] },
    ])

    expect(images).toEqual({
      'Server 1': ['https://cdn.test/a1.jpg', 'https://cdn.test/a2.jpg'],
      'Server 2': ['https://cdn.test/b1.jpg'],
    })
  })

  it('considers only the first three sources', async () => {
    const task = vi.fn<SourceTask>((_descriptor, index) => [`https://cdn.test/${index}.jpg`])
    const aggregator = new SourceAggregator()

    const images = await aggregator.aggregate([{}, {}, {}, {}, {}], task)

    expect(Object.keys(images)).toEqual(['Server 1', 'Server 2', 'Server 3'])
    expect(images['Server 3']).toEqual(['https://cdn.test/2.jpg'])
    expect(task).toHaveBeenCalledTimes(3)
  })

  it('returns three empty labels when the page has no source', async () => {
    const aggregator = new SourceAggregator()

    const report = await aggregator.run([])

    expect(report.images).toEqual({ 'Server 1': [], 'Server 2': [], 'Server 3': [] })
    expect(report.failures).toEqual([])
  })

  it('isolates an invalid descriptor to its own label', async () => {
    const { logger, entries } = createMemoryLogger('test')
    const aggregator = new SourceAggregator({ logger })

    const report = await aggregator.run([
      { images: ['https://cdn.test/a.jpg'] },
      { images: 'not-a-list' },
      { images: ['https://cdn.test/c.jpg'] },
    ])

    expect(report.images).toEqual({
      'Server 1': ['https://cdn.test/a.jpg'],
      'Server 2': [],
      'Server 3': ['https://cdn.test/c.jpg'],
    })
    expect(report.failures).toHaveLength(1)
    expect(report.failures[0]?.label).toBe('Server 2')
    expect(report.failures[0]?.reason).toBe('error')
    expect(entries.map(entry => entry.message)).toEqual(['AGGREGATE_SOURCE_FAILED'])
  })

  it('keeps every label when all tasks fail', async () => {
    const aggregator = new SourceAggregator()
    const task: SourceTask = () => {
      throw new Error('boom')
    }

    const report = await aggregator.run([{}, {}], task)

    expect(report.images).toEqual({ 'Server 1': [], 'Server 2': [] })
    expect(report.failures).toEqual([
      { label: 'Server 1', reason: 'error', error: 'boom' },
      { label: 'Server 2', reason: 'error', error: 'boom' },
    ])
  })

  it('gives up on a single slow task after the per-task timeout', async () => {
    const aggregator = new SourceAggregator({ taskTimeoutMs: 20, overallTimeoutMs: 1_000 })
    const task: SourceTask = (_descriptor, index) => (index === 1 ? pending() : ['https://cdn.test/ok.jpg'])

    const report = await aggregator.run([{}, {}, {}], task)

    expect(report.images).toEqual({
      'Server 1': ['https://cdn.test/ok.jpg'],
      'Server 2': [],
      'Server 3': ['https://cdn.test/ok.jpg'],
    })
    expect(report.failures).toEqual([{ label: 'Server 2', reason: 'timeout' }])
  })

  it('stops waiting once the overall timeout elapses', async () => {
    const aggregator = new SourceAggregator({ taskTimeoutMs: 5_000, overallTimeoutMs: 30 })
    const task: SourceTask = (_descriptor, index) => (index === 0 ? ['https://cdn.test/fast.jpg'] : pending())

    const report = await aggregator.run([{}, {}, {}], task)

    expect(report.images).toEqual({
      'Server 1': ['https://cdn.test/fast.jpg'],
      'Server 2': [],
      'Server 3': [],
    })
    expect(report.failures).toEqual([
      { label: 'Server 2', reason: 'timeout' },
      { label: 'Server 3', reason: 'timeout' },
    ])
    expect(report.durationMs).toBeLessThan(5_000)
  })

  it('runs no more tasks at once than the concurrency limit', async () => {
    let inFlight = 0
    let peak = 0
    const task: SourceTask = async () => {
      inFlight++
      peak = Math.max(peak, inFlight)
      await wait(5)
      inFlight--
      return ['https://cdn.test/x.jpg']
    }
    const aggregator = new SourceAggregator({ concurrency: 1 })

    const images = await aggregator.aggregate([{}, {}, {}], task)

    expect(peak).toBe(1)
    expect(images['Server 3']).toEqual(['https://cdn.test/x.jpg'])
  })
})
