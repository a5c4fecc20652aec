/**
 * Scraper
 *
 * Resilient catalog extraction for mangaaku.com: pooled fetching with retries
 * and timeout escalation, markup rules, field normalizers and a multi-source
 * chapter aggregator behind one engine.
 */

// Core types
export * from './types.js'

// Engine
export { ScraperEngine, Mangaku } from './engine.js'
export type { ScraperEngineOptions } from './engine.js'

// Failures
export {
  FAILURE_CODES,
  classifyFetchFailure,
  classifyUnexpectedError,
  mandatoryFieldMissing,
} from './errors.js'
export type { FailureCategory, FailureCode, ScrapeFailure, ScrapeOutcome } from './errors.js'

// Fetch layer
export { HttpFetcher, classifyTransportError } from './fetch/http-fetcher.js'
export type { FetchImpl, HttpFetcherOptions } from './fetch/http-fetcher.js'

// Extraction
export { mangaakuAdapter, parseReaderPayload } from './adapters/mangaaku/index.js'
export { loadHtml } from './document.js'

// Normalizers
export { parseViews, parseRating, parseChapterCount, extractYear, truncateDescription } from './normalize/fields.js'
export { KeyValueBlockParser, parseKeyValueBlock } from './normalize/key-value-block.js'
export { LruCache } from './normalize/lru-cache.js'

// Aggregation
export { SourceAggregator, expectedLabels, sourceLabel } from './aggregate/source-aggregator.js'
export type { AggregationReport, SourceFailure, SourceTask } from './aggregate/source-aggregator.js'
export { extractSourceImages } from './aggregate/reader-source.js'

// Metrics
export { ScraperMetrics } from './metrics.js'
