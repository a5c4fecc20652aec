import { z } from 'zod'
import type { ScraperEngine } from '../../scraper/engine.js'
import { consoleIo, positiveIntFlag, report, validateArgs, type CommandIo } from '../output.js'

const searchArgsSchema = z.object({
  query: z.string().trim().min(1, 'a search term is required').max(200),
  page: positiveIntFlag,
  limit: positiveIntFlag,
})

interface SearchCommandArgs {
  query: string
  page: string
  limit: string
}

export async function runSearchCommand(
  engine: Pick<ScraperEngine, 'searchManga'>,
  input: SearchCommandArgs,
  io: CommandIo = consoleIo
): Promise<number> {
  const validated = validateArgs(searchArgsSchema, input, io)
  if (!validated.ok) return validated.exitCode

  const { query, page, limit } = validated.args
  return report(await engine.searchManga(query, page, limit), io)
}
