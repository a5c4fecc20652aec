import type { ScraperEngine } from '../../scraper/engine.js'
import { consoleIo, EXIT_CODES, type CommandIo } from '../output.js'

export async function runStatsCommand(
  engine: Pick<ScraperEngine, 'getPerformanceStats'>,
  io: CommandIo = consoleIo
): Promise<number> {
  io.out(JSON.stringify(engine.getPerformanceStats(), null, 2))
  return EXIT_CODES.OK
}
