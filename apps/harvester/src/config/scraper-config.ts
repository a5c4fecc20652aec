/**
 * Scraper Configuration
 *
 * Settings come from three layers, later ones winning:
 * 1. DEFAULT_SCRAPER_SETTINGS
 * 2. the profile picked by NODE_ENV (development unless production or test)
 * 3. SCRAPER_* environment variables
 *
 * Invalid variables fail fast with a ConfigError listing every issue.
 */

import { z } from 'zod'
import { DEFAULT_SCRAPER_SETTINGS, type ScraperSettings } from '../scraper/types.js'

export type ConfigProfile = 'development' | 'production' | 'testing'

type ProfileSettings = Pick<ScraperSettings, 'timeoutMs' | 'maxRetries' | 'poolSize' | 'poolMaxSize'>

export const PROFILES: Record<ConfigProfile, ProfileSettings> = {
  development: { timeoutMs: 180_000, maxRetries: 5, poolSize: 20, poolMaxSize: 50 },
  production: { timeoutMs: 150_000, maxRetries: 3, poolSize: 20, poolMaxSize: 50 },
  testing: { timeoutMs: 60_000, maxRetries: 5, poolSize: 20, poolMaxSize: 50 },
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid scraper configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

// Unset and empty variables both mean "use the profile value"
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value)

const integer = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).optional())

const flag = z.preprocess(
  blankToUndefined,
  z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1')
    .optional()
)

const scraperEnvSchema = z.object({
  SCRAPER_BASE_URL: z.preprocess(blankToUndefined, z.string().trim().url().optional()),
  SCRAPER_TIMEOUT_MS: integer(1),
  SCRAPER_MAX_RETRIES: integer(0, 10),
  SCRAPER_POOL_SIZE: integer(1),
  SCRAPER_POOL_MAX_SIZE: integer(1),
  SCRAPER_INSECURE_TLS: flag,
  SCRAPER_DEFAULT_YEAR: integer(1900, 9999),
  SCRAPER_CACHE_SIZE: integer(1),
  SCRAPER_DEFAULT_PAGE_SIZE: integer(1),
  SCRAPER_MAX_PAGE_SIZE: integer(1),
})

export function resolveProfile(nodeEnv: string | undefined): ConfigProfile {
  if (nodeEnv === 'production') return 'production'
  if (nodeEnv === 'test' || nodeEnv === 'testing') return 'testing'
  return 'development'
}

export function loadScraperSettings(env: NodeJS.ProcessEnv = process.env): ScraperSettings {
  const parsed = scraperEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`))
  }

  const vars = parsed.data
  const profile = PROFILES[resolveProfile(env.NODE_ENV)]

  const settings: ScraperSettings = {
    baseUrl: vars.SCRAPER_BASE_URL ?? DEFAULT_SCRAPER_SETTINGS.baseUrl,
    timeoutMs: vars.SCRAPER_TIMEOUT_MS ?? profile.timeoutMs,
    maxRetries: vars.SCRAPER_MAX_RETRIES ?? profile.maxRetries,
    poolSize: vars.SCRAPER_POOL_SIZE ?? profile.poolSize,
    poolMaxSize: vars.SCRAPER_POOL_MAX_SIZE ?? profile.poolMaxSize,
    insecureTls: vars.SCRAPER_INSECURE_TLS ?? DEFAULT_SCRAPER_SETTINGS.insecureTls,
    defaultYear: vars.SCRAPER_DEFAULT_YEAR ?? DEFAULT_SCRAPER_SETTINGS.defaultYear,
    cacheSize: vars.SCRAPER_CACHE_SIZE ?? DEFAULT_SCRAPER_SETTINGS.cacheSize,
    defaultPageSize: vars.SCRAPER_DEFAULT_PAGE_SIZE ?? DEFAULT_SCRAPER_SETTINGS.defaultPageSize,
    maxPageSize: vars.SCRAPER_MAX_PAGE_SIZE ?? DEFAULT_SCRAPER_SETTINGS.maxPageSize,
  }

  const issues: string[] = []
  if (settings.poolSize > settings.poolMaxSize) {
    issues.push(`SCRAPER_POOL_SIZE (${settings.poolSize}) exceeds SCRAPER_POOL_MAX_SIZE (${settings.poolMaxSize})`)
  }
  if (settings.defaultPageSize > settings.maxPageSize) {
    issues.push(
      `SCRAPER_DEFAULT_PAGE_SIZE (${settings.defaultPageSize}) exceeds SCRAPER_MAX_PAGE_SIZE (${settings.maxPageSize})`
    )
  }
  if (issues.length > 0) {
    throw new ConfigError(issues)
  }

  return settings
}
