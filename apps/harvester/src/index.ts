export * from './scraper/index.js'
export { loadScraperSettings, ConfigError, PROFILES, resolveProfile } from './config/scraper-config.js'
export type { ConfigProfile } from './config/scraper-config.js'
