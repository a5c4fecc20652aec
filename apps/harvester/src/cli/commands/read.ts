import { z } from 'zod'
import type { ScraperEngine } from '../../scraper/engine.js'
import { consoleIo, report, validateArgs, type CommandIo } from '../output.js'

const readArgsSchema = z.object({
  path: z
    .string()
    .trim()
    .min(1, 'a reader path is required')
    .refine(path => !/^[a-z]+:\/\//i.test(path), 'give the path relative to the site, not a full URL'),
})

export async function runReadCommand(
  engine: Pick<ScraperEngine, 'readManga'>,
  input: { path: string },
  io: CommandIo = consoleIo
): Promise<number> {
  const validated = validateArgs(readArgsSchema, input, io)
  if (!validated.ok) return validated.exitCode

  return report(await engine.readManga(validated.args.path), io)
}
