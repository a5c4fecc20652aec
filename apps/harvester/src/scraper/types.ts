/**
 * Scraper Core Types
 *
 * Records produced by the extraction rules, the fetch contract and the
 * configuration consumed by the engine.
 */

import type { ILogger } from '@mangaku/logger'

// ═══════════════════════════════════════════════════════════════════════════════
// Records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One catalog entry from a listing or search page.
 */
export interface MangaSummary {
  /** Site-relative slug, e.g. `manga/one-piece` with the origin and slashes removed */
  id: string
  title: string
  image: string
  /** First run of digits in the chapter badge, 0 when none */
  totalChapters: number
  /** 0.0 when the score is absent, dashed or not numeric */
  rating: number
}

/**
 * Full description of one catalog entry.
 *
 * String fields never fail: absent source fields become 'Unknown'
 * ('Manga' for `type`).
 */
export interface MangaDetail {
  id: string
  title: string
  image: string
  /** Synopsis cut to 100 characters plus '...' when longer */
  description: string
  synopsis: string
  type: string
  status: string
  year: number
  genres: string[]
  chapterCount: number
  /** Reader-relative chapter paths, the leading "latest chapter" shortcut excluded */
  chapterList: string[]
  author: string
  /** Raw score text as printed on the page */
  rating: string
  views: number
}

/** Source labels are 'Server 1' .. 'Server 3'. */
export type SourceLabel = `Server ${number}`

export type PerSourceImages = Record<SourceLabel, string[]>

export interface ChapterReadResult {
  title: string
  chapter: PerSourceImages
}

/**
 * Labels recovered from the free-text info block on a detail page.
 * Partial: labels absent from the text are absent from the object.
 */
export interface KeyValueBlock {
  status?: string
  type?: string
  author?: string
  postedBy?: string
  postedOn?: string
  updatedOn?: string
  views?: string
}

export type KeyValueLabel = keyof KeyValueBlock

export interface CacheInfo {
  hits: number
  misses: number
  size: number
  maxSize: number
}

export interface PerformanceStats {
  requestCount: number
  cacheHitCount: number
  cacheInfo: CacheInfo
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher
// ═══════════════════════════════════════════════════════════════════════════════

export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
  close?(): Promise<void>
}

export interface FetchOptions {
  /** Retries after the first attempt for retryable status codes */
  maxRetries?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>
}

/**
 * Immutable description of one logical fetch.
 */
export interface FetchRequest {
  readonly url: string
  readonly timeoutMs: number
  readonly maxRetries: number
}

export type FetchFailureKind =
  | 'connect_timeout'
  | 'read_timeout'
  | 'transport_error'
  | 'http_status' // Non-2xx that was not retryable, or the retry budget ran out

export interface FetchSuccess {
  ok: true
  statusCode: number
  body: string
  durationMs: number
  /** Physical attempts made, escalated attempt included */
  attempts: number
}

export interface FetchFailure {
  ok: false
  kind: FetchFailureKind
  statusCode?: number
  error: string
  cause?: unknown
  durationMs: number
  attempts: number
}

export type FetchResult = FetchSuccess | FetchFailure

/**
 * Default headers for upstream requests. The target serves its regular
 * markup to desktop browsers only.
 */
export const DEFAULT_FETCH_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9,id;q=0.8',
} as const

// ═══════════════════════════════════════════════════════════════════════════════
// Retry and timeout policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number

  initialDelayMs: number

  maxDelayMs: number

  backoffMultiplier: number

  retryableStatusCodes: number[]
}

export const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504, 520, 521, 522, 523, 524]

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 500,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  retryableStatusCodes: RETRYABLE_STATUS_CODES,
}

export interface TimeoutStage {
  connectTimeoutMs: number
  readTimeoutMs: number
}

/** Escalated stage, used once per fetch after a read-timeout */
export const ESCALATED_TIMEOUTS: TimeoutStage = {
  connectTimeoutMs: 60000,
  readTimeoutMs: 180000,
}

export const PRIMARY_CONNECT_TIMEOUT_MS = 30000

// ═══════════════════════════════════════════════════════════════════════════════
// Engine configuration
// ═══════════════════════════════════════════════════════════════════════════════

export interface ScraperSettings {
  baseUrl: string
  timeoutMs: number
  maxRetries: number
  poolSize: number
  poolMaxSize: number
  /** Disables TLS certificate validation for upstream requests */
  insecureTls: boolean
  /** Year reported when no posted/updated date carries one */
  defaultYear: number
  /** Capacity of the key/value block memo */
  cacheSize: number
  defaultPageSize: number
  maxPageSize: number
}

export const DEFAULT_SCRAPER_SETTINGS: ScraperSettings = {
  baseUrl: 'https://mangaaku.com',
  timeoutMs: 120000,
  maxRetries: 3,
  poolSize: 20,
  poolMaxSize: 50,
  insecureTls: true,
  defaultYear: 2025,
  cacheSize: 512,
  defaultPageSize: 20,
  maxPageSize: 100,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Site adapter
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Context passed to extraction rules.
 */
export interface ExtractContext {
  baseUrl: string
  defaultYear: number
  logger: ILogger
  /** Info-block parser; the engine passes its memoized one */
  parseKeyValues: (text: string) => KeyValueBlock
}

/**
 * Result of a rule that depends on a mandatory anchor. A missing anchor is
 * reported by name; optional fields never produce a failure.
 */
export type ExtractResult<T> = { ok: true; value: T } | { ok: false; missingField: string }

export interface ListingExtraction {
  items: MangaSummary[]
  /** Entries dropped for lacking a title or link */
  skipped: number
}

export interface ReaderExtraction {
  title: string
  /** Raw mirror descriptors in page order, not yet validated */
  sources: unknown[]
}

/**
 * One upstream site: its URL shapes and its extraction rules.
 */
export interface CatalogAdapter {
  readonly id: string
  readonly version: string

  listingUrl(baseUrl: string, page: number): string
  searchUrl(baseUrl: string, query: string, page: number): string
  detailUrl(baseUrl: string, slug: string): string
  readerUrl(baseUrl: string, readerPath: string): string

  extractListing(html: string, url: string, ctx: ExtractContext, limit?: number): ListingExtraction
  extractDetail(html: string, slug: string, ctx: ExtractContext): ExtractResult<MangaDetail>
  extractReader(html: string, url: string, ctx: ExtractContext): ExtractResult<ReaderExtraction>
}
