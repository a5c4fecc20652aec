#!/usr/bin/env node
import '../env.js'
import { loggers } from '../config/logger.js'
import { loadScraperSettings } from '../config/scraper-config.js'
import { ScraperEngine } from '../scraper/engine.js'
import { runDetailCommand } from './commands/detail.js'
import { runListCommand } from './commands/list.js'
import { runReadCommand } from './commands/read.js'
import { runSearchCommand } from './commands/search.js'
import { runStatsCommand } from './commands/stats.js'
import { EXIT_CODES } from './output.js'
import { asString, parseFlags } from './parse-flags.js'

const log = loggers.cli

function printHelp(): void {
  console.log('Mangaaku scraper CLI')
  console.log('')
  console.log('Commands:')
  console.log('  list [--page N] [--limit N]')
  console.log('  search --query "<term>" [--page N] [--limit N]')
  console.log('  detail --slug <slug>')
  console.log('  read --path <reader-path>')
  console.log('  stats')
  console.log('')
  console.log('Exit codes: 0 ok, 1 upstream failure or not found, 2 usage error, 3 page missing its title')
}

async function runCommand(engine: ScraperEngine, command: string, flags: ReturnType<typeof parseFlags>): Promise<number> {
  switch (command) {
    case 'list':
      return runListCommand(engine, {
        page: asString(flags.page),
        limit: asString(flags.limit),
      })
    case 'search':
      return runSearchCommand(engine, {
        query: asString(flags.query),
        page: asString(flags.page),
        limit: asString(flags.limit),
      })
    case 'detail':
      return runDetailCommand(engine, { slug: asString(flags.slug) })
    case 'read':
      return runReadCommand(engine, { path: asString(flags.path) })
    case 'stats':
      return runStatsCommand(engine)
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return EXIT_CODES.USAGE
  }
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(EXIT_CODES.OK)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(EXIT_CODES.OK)
  }

  const engine = new ScraperEngine({ settings: loadScraperSettings() })
  let exitCode: number = EXIT_CODES.FAILURE
  try {
    exitCode = await runCommand(engine, command, flags)
    log.debug('CLI_COMMAND_FINISHED', { command, exitCode, ...engine.getPerformanceStats() })
  } finally {
    await engine.close()
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  log.fatal('CLI_FAILED', {}, error)
  process.exit(EXIT_CODES.FAILURE)
})
