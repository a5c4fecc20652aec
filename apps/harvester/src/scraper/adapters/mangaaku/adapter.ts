/**
 * Mangaaku Adapter
 *
 * Listing, search, detail and reader rules for mangaaku.com.
 *
 * Every rule is a pure function of the page text. Optional fields fall back to
 * defaults; only the title anchor on detail and reader pages is mandatory.
 */

import type {
  CatalogAdapter,
  ExtractContext,
  ExtractResult,
  KeyValueBlock,
  ListingExtraction,
  MangaDetail,
  MangaSummary,
  ReaderExtraction,
} from '../../types.js'
import { collapseWhitespace, firstAttr, firstText, loadHtml, textWithout, type Region } from '../../document.js'
import { extractYear, parseChapterCount, parseRating, parseViews, truncateDescription } from '../../normalize/fields.js'
import { joinUrl, normalizeBaseUrl, stripOrigin, toSlug, trimSlashes } from '../../utils/url.js'
import { parseReaderPayload } from './payload.js'
import { SELECTORS } from './selectors.js'

const ADAPTER_ID = 'mangaaku'
const ADAPTER_VERSION = '1.0.0'

const UNKNOWN = 'Unknown'
const DEFAULT_TYPE = 'Manga'

// ═══════════════════════════════════════════════════════════════════════════════
// URLs
// ═══════════════════════════════════════════════════════════════════════════════

function listingUrl(baseUrl: string, page: number): string {
  return `${normalizeBaseUrl(baseUrl)}/manga/?page=${page}&order=update`
}

function searchUrl(baseUrl: string, query: string, page: number): string {
  return `${normalizeBaseUrl(baseUrl)}/page/${page}/?s=${encodeURIComponent(query.trim())}`
}

/**
 * Accepts a bare slug (`solo-leveling`) or a listing id (`manga/solo-leveling`).
 */
function detailUrl(baseUrl: string, slug: string): string {
  const path = trimSlashes(slug)
  return joinUrl(baseUrl, path.startsWith('manga/') ? path : `manga/${path}`)
}

function readerUrl(baseUrl: string, readerPath: string): string {
  return joinUrl(baseUrl, readerPath)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Listing
// ═══════════════════════════════════════════════════════════════════════════════

type EntryResult = { ok: true; item: MangaSummary } | { ok: false; reason: 'missing_href' | 'missing_title' }

function extractEntry(entry: Region, baseUrl: string): EntryResult {
  const link = entry.find(SELECTORS.listing.link).first()
  const href = link.attr('href')?.trim()
  if (!href) {
    return { ok: false, reason: 'missing_href' }
  }

  const title = link.attr('title')?.trim() || collapseWhitespace(link.text())
  if (!title) {
    return { ok: false, reason: 'missing_title' }
  }

  return {
    ok: true,
    item: {
      id: toSlug(href, baseUrl),
      title,
      image: firstAttr(entry, SELECTORS.listing.image, 'src') ?? '',
      totalChapters: parseChapterCount(firstText(entry, SELECTORS.listing.chapterBadge)),
      rating: parseRating(firstText(entry, SELECTORS.listing.rating)),
    },
  }
}

function extractListing(html: string, url: string, ctx: ExtractContext, limit?: number): ListingExtraction {
  const $ = loadHtml(html)
  const items: MangaSummary[] = []
  let skipped = 0

  $(SELECTORS.listing.entry)
    .toArray()
    .forEach((element, index) => {
      const result = extractEntry($(element), ctx.baseUrl)
      if (result.ok) {
        items.push(result.item)
        return
      }
      skipped++
      ctx.logger.warn('LISTING_ENTRY_SKIPPED', { url, index, reason: result.reason })
    })

  return {
    items: limit === undefined ? items : items.slice(0, Math.max(0, limit)),
    skipped,
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Detail
// ═══════════════════════════════════════════════════════════════════════════════

function extractDetail(html: string, slug: string, ctx: ExtractContext): ExtractResult<MangaDetail> {
  const $ = loadHtml(html)

  const title = firstText($, SELECTORS.detail.title)
  if (!title) {
    return { ok: false, missingField: 'title' }
  }

  const genres = $(SELECTORS.detail.genreLinks)
    .toArray()
    .map(element => $(element).text().trim())
    .filter(genre => genre.length > 0)

  const synopsis = textWithout($, SELECTORS.detail.synopsis, SELECTORS.detail.synopsisNoise) ?? ''

  const chapterList = $(SELECTORS.detail.chapterRows)
    .toArray()
    .map(row => firstAttr($(row), SELECTORS.detail.chapterLink, 'href'))
    .filter((href): href is string => href !== undefined)
    .map(href => stripOrigin(href, ctx.baseUrl))
  if (chapterList.length > 1) {
    chapterList.shift()
  }

  const infoText = collapseWhitespace($(SELECTORS.detail.infoBlock).first().text())
  const info: KeyValueBlock = infoText ? ctx.parseKeyValues(infoText) : {}

  return {
    ok: true,
    value: {
      id: trimSlashes(slug),
      title,
      image: firstAttr($, SELECTORS.detail.cover, 'src') ?? UNKNOWN,
      description: truncateDescription(synopsis),
      synopsis,
      type: info.type ?? DEFAULT_TYPE,
      status: info.status ?? UNKNOWN,
      year: extractYear([info.postedOn, info.updatedOn], ctx.defaultYear),
      genres,
      chapterCount: chapterList.length,
      chapterList,
      author: info.author ?? UNKNOWN,
      rating: firstText($, SELECTORS.detail.rating) || UNKNOWN,
      views: parseViews(info.views),
    },
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Reader
// ═══════════════════════════════════════════════════════════════════════════════

function extractReader(html: string, url: string, ctx: ExtractContext): ExtractResult<ReaderExtraction> {
  const $ = loadHtml(html)

  const title = firstText($, SELECTORS.reader.title)
  if (!title) {
    return { ok: false, missingField: 'title' }
  }

  const payload = parseReaderPayload(html)
  if (!payload.ok) {
    ctx.logger.warn('READER_PAYLOAD_UNAVAILABLE', { url, reason: payload.reason, error: payload.error })
    return { ok: true, value: { title, sources: [] } }
  }

  return { ok: true, value: { title, sources: payload.sources } }
}

export const mangaakuAdapter: CatalogAdapter = {
  id: ADAPTER_ID,
  version: ADAPTER_VERSION,
  listingUrl,
  searchUrl,
  detailUrl,
  readerUrl,
  extractListing,
  extractDetail,
  extractReader,
}
