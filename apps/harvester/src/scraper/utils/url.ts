/**
 * URL helpers for site-relative paths.
 *
 * The site prints absolute links (`https://mangaaku.com/manga/solo/`) while
 * records carry paths relative to the origin, so links are reduced by
 * removing the origin text rather than by resolving them.
 */

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, '')
}

/**
 * Remove every occurrence of the origin from an href.
 * Links to other hosts are returned unchanged.
 */
export function stripOrigin(href: string, baseUrl: string): string {
  const origin = normalizeBaseUrl(baseUrl)
  if (!origin) return href
  return href.split(origin).join('')
}

export function trimSlashes(path: string): string {
  return path.replace(/^\/+|\/+$/g, '')
}

/** `https://mangaaku.com/manga/solo/` → `manga/solo` */
export function toSlug(href: string, baseUrl: string): string {
  return trimSlashes(stripOrigin(href, baseUrl))
}

/**
 * Join a site-relative path onto the origin. The path may or may not start
 * with a slash; query strings are kept as given.
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${normalizeBaseUrl(baseUrl)}/${path.replace(/^\/+/, '')}`
}
