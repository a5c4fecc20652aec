import { z } from 'zod'
import type { ScraperEngine } from '../../scraper/engine.js'
import { consoleIo, report, validateArgs, type CommandIo } from '../output.js'

// Slugs are path segments, optionally prefixed by the listing's `manga/`
const SLUG_PATTERN = /^[a-z0-9][a-z0-9._\-/]*$/i

const detailArgsSchema = z.object({
  slug: z.string().trim().min(1, 'a slug is required').regex(SLUG_PATTERN, 'not a valid slug'),
})

export async function runDetailCommand(
  engine: Pick<ScraperEngine, 'getMangaDetail'>,
  input: { slug: string },
  io: CommandIo = consoleIo
): Promise<number> {
  const validated = validateArgs(detailArgsSchema, input, io)
  if (!validated.ok) return validated.exitCode

  return report(await engine.getMangaDetail(validated.args.slug), io)
}
