/**
 * Field Normalizers
 *
 * Pure text → value conversions used by the extraction rules.
 * None of them throw; unparseable input yields the documented default.
 */

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  K: 1_000,
  M: 1_000_000,
}

const DESCRIPTION_MAX_LENGTH = 100
const ELLIPSIS = '...'

/**
 * Parse a view counter such as "12,345", "3.5K" or "2M".
 *
 * Thousands separators are stripped. A K or M suffix scales the leading
 * decimal; otherwise the first run of digits is taken. Anything else is 0.
 */
export function parseViews(raw: string | undefined): number {
  if (!raw) return 0

  const text = raw.replace(/,/g, '').trim().toUpperCase()
  const suffix = text.match(/[KM]/)?.[0]

  if (suffix) {
    const leading = text.match(/\d+(?:\.\d+)?/)
    if (!leading) return 0
    const value = Number.parseFloat(leading[0])
    if (!Number.isFinite(value)) return 0
    // Nudge past binary float error (e.g. 1.1 * 1000) before truncating
    return Math.trunc(value * (SUFFIX_MULTIPLIERS[suffix] ?? 1) + 1e-6)
  }

  const digits = text.match(/\d+/)
  return digits ? Number.parseInt(digits[0], 10) : 0
}

/**
 * Listing score. Absent, dashed, empty or non-numeric text is 0.0.
 */
export function parseRating(raw: string | undefined): number {
  const text = raw?.trim()
  if (!text || text === '-') return 0

  const value = Number.parseFloat(text)
  return Number.isFinite(value) && value > 0 ? value : 0
}

/**
 * First run of digits in a chapter badge ("Chapter 112" → 112), else 0.
 */
export function parseChapterCount(raw: string | undefined): number {
  const digits = raw?.match(/\d+/)
  return digits ? Number.parseInt(digits[0], 10) : 0
}

/**
 * First 4-digit number found in the candidates, searched in order.
 */
export function extractYear(candidates: Array<string | undefined>, fallback: number): number {
  for (const candidate of candidates) {
    const match = candidate?.match(/\d{4}/)
    if (match) {
      return Number.parseInt(match[0], 10)
    }
  }
  return fallback
}

/**
 * Length is counted in code points, so a cut never splits a surrogate pair.
 */
export function truncateDescription(synopsis: string): string {
  const chars = Array.from(synopsis)
  if (chars.length <= DESCRIPTION_MAX_LENGTH) return synopsis
  return chars.slice(0, DESCRIPTION_MAX_LENGTH).join('') + ELLIPSIS
}
