export type Flags = Record<string, string | boolean>

/**
 * Command-line flags for the scrape commands.
 *
 * `--key value` and `--key=value` both set a value. Values may span several
 * tokens (`--query solo leveling`); a flag with no value is `true`. Tokens
 * before the first flag are positional and dropped.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}
  let current: { key: string; words: string[] } | undefined

  const commit = () => {
    if (!current) return
    flags[current.key] = current.words.length > 0 ? current.words.join(' ') : true
    current = undefined
  }

  for (const token of argv) {
    if (!token.startsWith('--')) {
      current?.words.push(token)
      continue
    }

    commit()
    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq > 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
    } else {
      current = { key: body, words: [] }
    }
  }
  commit()

  return flags
}

/** String value of a flag; '' when absent or given without a value */
export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}
