/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for scraper components. Entries go to stderr;
 * stdout carries command output.
 */

import { createLogger, resolveLogFormat, stderrSink, type ILogger } from '@mangaku/logger'

// Root logger for the harvester service
export const logger = createLogger('harvester', {
  sink: stderrSink(resolveLogFormat(process.env.LOG_FORMAT, process.env.NODE_ENV)),
})

export type ComponentLoggers = Record<'fetch' | 'extract' | 'aggregate' | 'engine' | 'cli', ILogger>

export function componentLoggers(root: ILogger): ComponentLoggers {
  return {
    fetch: root.child('fetch'),
    extract: root.child('extract'),
    aggregate: root.child('aggregate'),
    engine: root.child('engine'),
    cli: root.child('cli'),
  }
}

export const loggers = componentLoggers(logger)
