import { describe, expect, it, vi } from 'vitest'
import { runDetailCommand } from '../commands/detail.js'
import { runListCommand } from '../commands/list.js'
import { runReadCommand } from '../commands/read.js'
import { runSearchCommand } from '../commands/search.js'
import { runStatsCommand } from '../commands/stats.js'
import { exitCodeFor, type CommandIo } from '../output.js'
import { mandatoryFieldMissing, type ScrapeOutcome } from '../../scraper/errors.js'
import type { ScraperEngine } from '../../scraper/engine.js'
import type { ChapterReadResult, MangaDetail, MangaSummary } from '../../scraper/types.js'

function recordingIo() {
  const out: string[] = []
  const err: string[] = []
  const io: CommandIo = {
    out: text => out.push(text),
    err: text => err.push(text),
  }
  return { io, out, err }
}

const summary: MangaSummary = {
  id: 'manga/solo-leveling',
  title: 'Solo Leveling',
  image: 'https://cdn.test/covers/solo.jpg',
  totalChapters: 179,
  rating: 8.9,
}

describe('scraper cli commands', () => {
  describe('list', () => {
    it('prints the listing as JSON', async () => {
      const getMangaList = vi.fn<ScraperEngine['getMangaList']>().mockResolvedValue({ ok: true, value: [summary] })
      const { io, out } = recordingIo()

      const exitCode = await runListCommand({ getMangaList }, { page: '2', limit: '' }, io)

      expect(exitCode).toBe(0)
      expect(getMangaList).toHaveBeenCalledWith(2, undefined)
      expect(JSON.parse(out[0] ?? '')).toEqual([summary])
    })

    it('rejects a non-numeric page', async () => {
      const getMangaList = vi.fn<ScraperEngine['getMangaList']>()
      const { io, err } = recordingIo()

      const exitCode = await runListCommand({ getMangaList }, { page: 'two', limit: '' }, io)

      expect(exitCode).toBe(2)
      expect(getMangaList).not.toHaveBeenCalled()
      expect(err[0]?.startsWith('Invalid --page: ')).toBe(true)
    })

    it('rejects a page below 1', async () => {
      const getMangaList = vi.fn<ScraperEngine['getMangaList']>()
      const { io } = recordingIo()

      expect(await runListCommand({ getMangaList }, { page: '0', limit: '' }, io)).toBe(2)
    })
  })

  describe('search', () => {
    it('requires a query', async () => {
      const searchManga = vi.fn<ScraperEngine['searchManga']>()
      const { io, err } = recordingIo()

      const exitCode = await runSearchCommand({ searchManga }, { query: '  ', page: '', limit: '' }, io)

      expect(exitCode).toBe(2)
      expect(err).toEqual(['Invalid --query: a search term is required'])
    })

    it('passes the trimmed query through', async () => {
      const searchManga = vi.fn<ScraperEngine['searchManga']>().mockResolvedValue({ ok: true, value: [] })
      const { io, out } = recordingIo()

      const exitCode = await runSearchCommand({ searchManga }, { query: ' solo ', page: '', limit: '10' }, io)

      expect(exitCode).toBe(0)
      expect(searchManga).toHaveBeenCalledWith('solo', undefined, 10)
      expect(out).toEqual(['[]'])
    })
  })

  describe('detail', () => {
    it('exits with 3 when the page lacks its title', async () => {
      const outcome: ScrapeOutcome<MangaDetail> = {
        ok: false,
        failure: mandatoryFieldMissing('title', 'https://mangaaku.com/manga/gone'),
      }
      const getMangaDetail = vi.fn<ScraperEngine['getMangaDetail']>().mockResolvedValue(outcome)
      const { io, out, err } = recordingIo()

      const exitCode = await runDetailCommand({ getMangaDetail }, { slug: 'gone' }, io)

      expect(exitCode).toBe(3)
      expect(out).toEqual([])
      expect(JSON.parse(err[0] ?? '')).toMatchObject({ category: 'not_found', code: 'MANDATORY_FIELD_MISSING' })
    })

    it('rejects slugs with spaces', async () => {
      const getMangaDetail = vi.fn<ScraperEngine['getMangaDetail']>()
      const { io, err } = recordingIo()

      expect(await runDetailCommand({ getMangaDetail }, { slug: 'solo leveling' }, io)).toBe(2)
      expect(err).toEqual(['Invalid --slug: not a valid slug'])
    })
  })

  describe('read', () => {
    it('prints the per-server image lists', async () => {
      const result: ChapterReadResult = {
        title: 'Solo Leveling Chapter 179',
        chapter: { 'Server 1': ['https://cdn.test/179/01.jpg'], 'Server 2': [], 'Server 3': [] },
      }
      const readManga = vi.fn<ScraperEngine['readManga']>().mockResolvedValue({ ok: true, value: result })
      const { io, out } = recordingIo()

      const exitCode = await runReadCommand({ readManga }, { path: '/solo-leveling-chapter-179/' }, io)

      expect(exitCode).toBe(0)
      expect(JSON.parse(out[0] ?? '')).toEqual(result)
    })

    it('refuses full URLs', async () => {
      const readManga = vi.fn<ScraperEngine['readManga']>()
      const { io } = recordingIo()

      expect(await runReadCommand({ readManga }, { path: 'https://mangaaku.com/x/' }, io)).toBe(2)
      expect(readManga).not.toHaveBeenCalled()
    })
  })

  it('prints performance stats', async () => {
    const stats = { requestCount: 4, cacheHitCount: 1, cacheInfo: { hits: 1, misses: 2, size: 2, maxSize: 512 } }
    const { io, out } = recordingIo()

    expect(await runStatsCommand({ getPerformanceStats: () => stats }, io)).toBe(0)
    expect(JSON.parse(out[0] ?? '')).toEqual(stats)
  })

  describe('exitCodeFor', () => {
    it('maps failures to exit codes', () => {
      expect(
        exitCodeFor({ category: 'not_found', code: 'NOT_FOUND', message: 'gone', statusCode: 404, isRetryable: false })
      ).toBe(1)
      expect(
        exitCodeFor({ category: 'server_failure', code: 'UPSTREAM_TIMEOUT', message: 'slow', isRetryable: true })
      ).toBe(1)
      expect(exitCodeFor(mandatoryFieldMissing('title', 'https://mangaaku.com/x'))).toBe(3)
    })
  })
})
