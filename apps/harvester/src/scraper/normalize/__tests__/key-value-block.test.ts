import { describe, it, expect } from 'vitest'
import { KeyValueBlockParser, parseKeyValueBlock } from '../key-value-block.js'
import { LruCache } from '../lru-cache.js'
import { ScraperMetrics } from '../../metrics.js'

const INFO_BLOCK =
  'Status Ongoing Type Manhwa Author Chugong Posted By admin Posted On March 4, 2021 Updated On June 10, 2024 Views 3.5K'

describe('parseKeyValueBlock', () => {
  it('recovers every known label', () => {
    expect(parseKeyValueBlock(INFO_BLOCK)).toEqual({
      status: 'Ongoing',
      type: 'Manhwa',
      author: 'Chugong',
      postedBy: 'admin',
      postedOn: 'March 4, 2021',
      updatedOn: 'June 10, 2024',
      views: '3.5K',
    })
  })

  it('keeps multi-word authors, including ones containing a capital P', () => {
    const block = parseKeyValueBlock('Author Park Tae Joon Posted By editor Views 120')
    expect(block.author).toBe('Park Tae Joon')
    expect(block.postedBy).toBe('editor')
  })

  it('leaves absent labels out', () => {
    const block = parseKeyValueBlock('Status Completed Views 2M')
    expect(block).toEqual({ status: 'Completed', views: '2M' })
    expect('author' in block).toBe(false)
  })

  it('returns an empty object for unrelated text', () => {
    expect(parseKeyValueBlock('')).toEqual({})
    expect(parseKeyValueBlock('Nothing to see here')).toEqual({})
  })
})

describe('KeyValueBlockParser', () => {
  it('memoizes identical text and counts the hit', () => {
    const metrics = new ScraperMetrics()
    const parser = new KeyValueBlockParser(8, metrics)

    const first = parser.parse(INFO_BLOCK)
    const second = parser.parse(INFO_BLOCK)

    expect(second).toEqual(first)
    expect(parser.info()).toEqual({ hits: 1, misses: 1, size: 1, maxSize: 8 })
    expect(metrics.snapshot(parser.info()).cacheHitCount).toBe(1)
  })

  it('hands out copies so callers cannot change the cached parse', () => {
    const parser = new KeyValueBlockParser(8)

    const first = parser.parse(INFO_BLOCK)
    first.status = 'Hiatus'

    expect(parser.parse(INFO_BLOCK).status).toBe('Ongoing')
  })

  it('parses again after clear', () => {
    const parser = new KeyValueBlockParser(8)
    parser.parse(INFO_BLOCK)
    parser.clear()
    parser.parse(INFO_BLOCK)

    expect(parser.info()).toEqual({ hits: 0, misses: 2, size: 1, maxSize: 8 })
  })
})

describe('LruCache', () => {
  it('evicts the least recently used entry at capacity', () => {
    const cache = new LruCache<string, { n: number }>(2)
    cache.set('a', { n: 1 })
    cache.set('b', { n: 2 })
    cache.get('a')
    cache.set('c', { n: 3 })

    expect(cache.has('a')).toBe(true)
    expect(cache.has('b')).toBe(false)
    expect(cache.has('c')).toBe(true)
    expect(cache.size).toBe(2)
  })

  it('rejects a non-positive capacity', () => {
    expect(() => new LruCache(0)).toThrow(RangeError)
  })
})
