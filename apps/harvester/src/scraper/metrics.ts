/**
 * Scraper Metrics
 *
 * In-memory counters owned by one engine instance, plus structured log
 * events for outcomes worth alerting on. Prometheus is not wired in.
 *
 * Counters:
 * - requestCount: physical HTTP attempts, retries and escalations included
 * - cacheHitCount: key/value block parses answered from the memo
 */

import type { ILogger } from '@mangaku/logger'
import type { CacheInfo, PerformanceStats } from './types.js'

export interface RequestCounter {
  recordRequest(): void
}

export interface CacheHitCounter {
  recordCacheHit(): void
}

export class ScraperMetrics implements RequestCounter, CacheHitCounter {
  private requestCount = 0
  private cacheHitCount = 0

  constructor(private readonly log?: ILogger) {}

  recordRequest(): void {
    this.requestCount += 1
  }

  recordCacheHit(): void {
    this.cacheHitCount += 1
  }

  /**
   * Emit one event per aggregated chapter read.
   * Warns when every source of the chapter failed.
   */
  recordAggregation(payload: { readerPath: string; sources: number; failed: number; durationMs: number }): void {
    this.log?.info('SCRAPER_CHAPTER_AGGREGATED', {
      event_name: 'SCRAPER_CHAPTER_AGGREGATED',
      ...payload,
    })

    if (payload.sources > 0 && payload.failed === payload.sources) {
      this.log?.warn('SCRAPER_ALERT_ALL_SOURCES_FAILED', {
        event_name: 'SCRAPER_ALERT_ALL_SOURCES_FAILED',
        readerPath: payload.readerPath,
        sources: payload.sources,
      })
    }
  }

  recordSkippedItems(payload: { url: string; skipped: number; kept: number }): void {
    if (payload.skipped === 0) return
    this.log?.warn('SCRAPER_LISTING_ITEMS_SKIPPED', {
      event_name: 'SCRAPER_LISTING_ITEMS_SKIPPED',
      ...payload,
    })
  }

  snapshot(cacheInfo: CacheInfo): PerformanceStats {
    return {
      requestCount: this.requestCount,
      cacheHitCount: this.cacheHitCount,
      cacheInfo,
    }
  }
}
