/**
 * Scraper Engine
 *
 * Entry point for callers: fetches a page, runs the site adapter's rules and
 * reports a ScrapeOutcome. One engine owns one fetcher (and its connection
 * pools), one key/value memo and one set of counters.
 *
 * Operations never throw. Transport failures, missing mandatory anchors and
 * unexpected errors all come back as typed failures.
 */

import type { ILogger } from '@mangaku/logger'
import { componentLoggers, loggers } from '../config/logger.js'
import { mangaakuAdapter } from './adapters/mangaaku/index.js'
import { SourceAggregator, type SourceAggregatorOptions } from './aggregate/source-aggregator.js'
import {
  classifyFetchFailure,
  classifyUnexpectedError,
  fail,
  mandatoryFieldMissing,
  succeed,
  type ScrapeOutcome,
} from './errors.js'
import { HttpFetcher, type FetchImpl } from './fetch/http-fetcher.js'
import { ScraperMetrics } from './metrics.js'
import { KeyValueBlockParser } from './normalize/key-value-block.js'
import type {
  CatalogAdapter,
  ChapterReadResult,
  ExtractContext,
  Fetcher,
  MangaDetail,
  MangaSummary,
  PerformanceStats,
  ScraperSettings,
} from './types.js'
import { DEFAULT_SCRAPER_SETTINGS } from './types.js'

export interface ScraperEngineOptions {
  settings?: Partial<ScraperSettings>

  /** Root logger; components log under fetch, extract, aggregate and engine */
  logger?: ILogger

  adapter?: CatalogAdapter

  /** Replaces the HTTP fetcher entirely. Requests it makes are not counted. */
  fetcher?: Fetcher

  /** Replaces undici's fetch inside the default HTTP fetcher (tests) */
  fetchImpl?: FetchImpl

  /** Replaces the retry backoff sleep inside the default HTTP fetcher (tests) */
  sleep?: (ms: number) => Promise<void>

  aggregator?: Omit<SourceAggregatorOptions, 'logger'>
}

export class ScraperEngine {
  readonly settings: ScraperSettings

  private readonly adapter: CatalogAdapter
  private readonly fetcher: Fetcher
  private readonly metrics: ScraperMetrics
  private readonly keyValues: KeyValueBlockParser
  private readonly aggregator: SourceAggregator
  private readonly context: ExtractContext
  private readonly log: ILogger

  constructor(options: ScraperEngineOptions = {}) {
    this.settings = { ...DEFAULT_SCRAPER_SETTINGS, ...options.settings }
    this.adapter = options.adapter ?? mangaakuAdapter

    const log = options.logger ? componentLoggers(options.logger) : loggers
    this.log = log.engine
    this.metrics = new ScraperMetrics(this.log)
    this.keyValues = new KeyValueBlockParser(this.settings.cacheSize, this.metrics)
    this.aggregator = new SourceAggregator({ ...options.aggregator, logger: log.aggregate })

    this.fetcher =
      options.fetcher ??
      new HttpFetcher({
        timeoutMs: this.settings.timeoutMs,
        retryPolicy: { maxRetries: this.settings.maxRetries },
        poolSize: this.settings.poolSize,
        poolMaxSize: this.settings.poolMaxSize,
        insecureTls: this.settings.insecureTls,
        requestCounter: this.metrics,
        logger: log.fetch,
        fetchImpl: options.fetchImpl,
        sleep: options.sleep,
      })

    this.context = {
      baseUrl: this.settings.baseUrl,
      defaultYear: this.settings.defaultYear,
      logger: log.extract,
      parseKeyValues: text => this.keyValues.parse(text),
    }
  }

  /**
   * Latest-updated catalog page.
   */
  async getMangaList(page = 1, limit?: number): Promise<ScrapeOutcome<MangaSummary[]>> {
    const url = this.adapter.listingUrl(this.settings.baseUrl, normalizePage(page))
    return this.guard<MangaSummary[]>('getMangaList', () => this.listing(url, limit))
  }

  /**
   * Search result page. Results share the listing markup.
   */
  async searchManga(query: string, page = 1, limit?: number): Promise<ScrapeOutcome<MangaSummary[]>> {
    const url = this.adapter.searchUrl(this.settings.baseUrl, query, normalizePage(page))
    return this.guard<MangaSummary[]>('searchManga', () => this.listing(url, limit))
  }

  async getMangaDetail(slug: string): Promise<ScrapeOutcome<MangaDetail>> {
    const url = this.adapter.detailUrl(this.settings.baseUrl, slug)
    return this.guard<MangaDetail>('getMangaDetail', async () => {
      const body = await this.load(url)
      if (!body.ok) return body

      const extracted = this.adapter.extractDetail(body.value, slug, this.context)
      if (!extracted.ok) {
        return this.missing(extracted.missingField, url)
      }
      return succeed(extracted.value)
    })
  }

  /**
   * Chapter title plus one image list per mirror, labelled Server 1..N.
   */
  async readManga(readerPath: string): Promise<ScrapeOutcome<ChapterReadResult>> {
    const url = this.adapter.readerUrl(this.settings.baseUrl, readerPath)
    return this.guard<ChapterReadResult>('readManga', async () => {
      const body = await this.load(url)
      if (!body.ok) return body

      const extracted = this.adapter.extractReader(body.value, url, this.context)
      if (!extracted.ok) {
        return this.missing(extracted.missingField, url)
      }

      const { title, sources } = extracted.value
      const report = await this.aggregator.run(sources)
      this.metrics.recordAggregation({
        readerPath,
        sources: Math.min(sources.length, this.aggregator.maxSources),
        failed: report.failures.length,
        durationMs: report.durationMs,
      })

      return succeed({ title, chapter: report.images })
    })
  }

  getPerformanceStats(): PerformanceStats {
    return this.metrics.snapshot(this.keyValues.info())
  }

  /**
   * Empties the key/value memo. Counters keep their values.
   */
  clearCache(): void {
    this.keyValues.clear()
    this.log.info('ENGINE_CACHE_CLEARED')
  }

  async close(): Promise<void> {
    await this.fetcher.close?.()
  }

  private async listing(url: string, limit: number | undefined): Promise<ScrapeOutcome<MangaSummary[]>> {
    const body = await this.load(url)
    if (!body.ok) return body

    const result = this.adapter.extractListing(body.value, url, this.context, this.clampLimit(limit))
    this.metrics.recordSkippedItems({ url, skipped: result.skipped, kept: result.items.length })
    return succeed(result.items)
  }

  private async load(url: string): Promise<ScrapeOutcome<string>> {
    const result = await this.fetcher.fetch(url)
    if (result.ok) {
      return succeed(result.body)
    }

    const failure = classifyFetchFailure(result, url)
    this.log.warn('ENGINE_FETCH_FAILED', {
      url,
      kind: result.kind,
      statusCode: result.statusCode,
      attempts: result.attempts,
      durationMs: result.durationMs,
      code: failure.code,
    })
    return fail(failure)
  }

  private missing<T>(field: string, url: string): ScrapeOutcome<T> {
    const failure = mandatoryFieldMissing(field, url)
    this.log.warn('ENGINE_MANDATORY_FIELD_MISSING', { url, field })
    return fail(failure)
  }

  private clampLimit(limit: number | undefined): number {
    const requested = limit ?? this.settings.defaultPageSize
    if (!Number.isFinite(requested)) return this.settings.defaultPageSize
    return Math.min(Math.max(Math.trunc(requested), 1), this.settings.maxPageSize)
  }

  private async guard<T>(operation: string, run: () => Promise<ScrapeOutcome<T>>): Promise<ScrapeOutcome<T>> {
    try {
      return await run()
    } catch (error) {
      this.log.error('ENGINE_OPERATION_FAILED', { operation }, error)
      return fail(classifyUnexpectedError(error))
    }
  }
}

function normalizePage(page: number): number {
  return Number.isFinite(page) ? Math.max(1, Math.trunc(page)) : 1
}

/** Former name of the engine, kept for existing callers. */
export type Mangaku = ScraperEngine
export const Mangaku = ScraperEngine
