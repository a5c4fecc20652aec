/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/harvester/.env.local outside production.
 * Production injects env vars directly - dotenv is not needed.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}
