import { describe, it, expect } from 'vitest'
import { createMemoryLogger } from '@mangaku/logger'
import { componentLoggers } from '../logger.js'

describe('componentLoggers', () => {
  it('derives one child per scraper component from the root', () => {
    const { logger, entries } = createMemoryLogger('harvester')
    const children = componentLoggers(logger)

    children.fetch.info('FETCH_OK')
    children.aggregate.warn('AGGREGATE_SOURCE_FAILED')
    children.cli.error('CLI_FATAL')

    expect(entries.map(entry => [entry.component, entry.message])).toEqual([
      ['fetch', 'FETCH_OK'],
      ['aggregate', 'AGGREGATE_SOURCE_FAILED'],
      ['cli', 'CLI_FATAL'],
    ])
  })

  it('nests under a root that already has a component', () => {
    const { logger, entries } = createMemoryLogger('harvester')
    const children = componentLoggers(logger.child('worker'))

    children.engine.debug('ENGINE_CACHE_CLEARED')

    expect(entries[0]?.component).toBe('worker:engine')
  })
})
