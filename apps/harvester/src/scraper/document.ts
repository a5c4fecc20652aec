import * as cheerio from 'cheerio'
import type { AnyNode } from 'domhandler'

/** A parsed page, queried with CSS selectors. */
export type Document = cheerio.CheerioAPI

/** A region of a parsed page (one listing entry, one info block). */
export type Region = cheerio.Cheerio<AnyNode>

export function loadHtml(payload: string): Document {
  return cheerio.load(payload)
}

export function firstText(scope: Document | Region, selector: string): string {
  return select(scope, selector).first().text().trim()
}

export function firstAttr(scope: Document | Region, selector: string, attr: string): string | undefined {
  const value = select(scope, selector).first().attr(attr)?.trim()
  return value || undefined
}

/**
 * Text of the first match with the given inner elements removed first.
 * Works on a copy, so the document is left untouched.
 */
export function textWithout(scope: Document | Region, selector: string, strip: string): string | undefined {
  const node = select(scope, selector).first()
  if (node.length === 0) return undefined
  const copy = node.clone()
  copy.find(strip).remove()
  return copy.text().trim()
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

function select(scope: Document | Region, selector: string): Region {
  return isDocument(scope) ? scope(selector) : scope.find(selector)
}

function isDocument(scope: Document | Region): scope is Document {
  return typeof scope === 'function'
}
