/**
 * Key/Value Block Parser
 *
 * Recovers labelled values from the whitespace-collapsed text of a detail
 * page's info box, e.g.
 *
 *   "Status Ongoing Type Manhwa Author Chugong Posted By admin
 *    Posted On March 4, 2021 Updated On June 10, 2024 Views 3.5K"
 *
 * Pages generated from the same template repeat identical blocks, so parses
 * are memoized by exact input text in a bounded LRU.
 */

import type { CacheHitCounter } from '../metrics.js'
import type { CacheInfo, KeyValueBlock, KeyValueLabel } from '../types.js'
import { LruCache } from './lru-cache.js'

const DATE = '[A-Za-z]+\\s+\\d{1,2},\\s+\\d{4}'

/** One pattern per label; capture group 1 is the value. */
export const KEY_VALUE_PATTERNS: Record<KeyValueLabel, RegExp> = {
  status: /\bStatus\s+(\w+)/,
  type: /\bType\s+(\w+)/,
  author: /\bAuthor\s+(.+?)(?=\s+(?:Posted By|Posted On|Updated On|Views)\b|$)/,
  postedBy: /\bPosted By\s+(\w+)/,
  postedOn: new RegExp(`\\bPosted On\\s+(${DATE})`),
  updatedOn: new RegExp(`\\bUpdated On\\s+(${DATE})`),
  views: /\bViews\s+(\S+)/,
}

const LABELS: readonly KeyValueLabel[] = ['status', 'type', 'author', 'postedBy', 'postedOn', 'updatedOn', 'views']

/**
 * Apply every label pattern once. Unmatched labels are left out.
 */
export function parseKeyValueBlock(text: string): KeyValueBlock {
  const result: KeyValueBlock = {}
  for (const label of LABELS) {
    const match = text.match(KEY_VALUE_PATTERNS[label])
    const value = match?.[1]?.trim()
    if (value) {
      result[label] = value
    }
  }
  return result
}

export class KeyValueBlockParser {
  private readonly cache: LruCache<string, Readonly<KeyValueBlock>>

  constructor(
    capacity: number,
    private readonly counter?: CacheHitCounter
  ) {
    this.cache = new LruCache(capacity)
  }

  parse(text: string): KeyValueBlock {
    const cached = this.cache.get(text)
    if (cached) {
      this.counter?.recordCacheHit()
      return { ...cached }
    }

    const parsed = Object.freeze(parseKeyValueBlock(text))
    this.cache.set(text, parsed)
    return { ...parsed }
  }

  clear(): void {
    this.cache.clear()
  }

  info(): CacheInfo {
    return this.cache.stats()
  }
}
