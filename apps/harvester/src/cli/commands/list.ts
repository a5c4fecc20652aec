import { z } from 'zod'
import type { ScraperEngine } from '../../scraper/engine.js'
import { consoleIo, positiveIntFlag, report, validateArgs, type CommandIo } from '../output.js'

const listArgsSchema = z.object({
  page: positiveIntFlag,
  limit: positiveIntFlag,
})

interface ListCommandArgs {
  page: string
  limit: string
}

export async function runListCommand(
  engine: Pick<ScraperEngine, 'getMangaList'>,
  input: ListCommandArgs,
  io: CommandIo = consoleIo
): Promise<number> {
  const validated = validateArgs(listArgsSchema, input, io)
  if (!validated.ok) return validated.exitCode

  const { page, limit } = validated.args
  return report(await engine.getMangaList(page, limit), io)
}
