import { describe, expect, it } from 'vitest'
import { asString, parseFlags } from '../parse-flags.js'

describe('parseFlags', () => {
  it('parses standard single-token values', () => {
    const flags = parseFlags(['--page', '2', '--limit', '5'])
    expect(flags.page).toBe('2')
    expect(flags.limit).toBe('5')
  })

  it('preserves multi-token flag values', () => {
    const flags = parseFlags(['--query', 'solo', 'leveling', '--verbose'])

    expect(flags.query).toBe('solo leveling')
    expect(flags.verbose).toBe(true)
  })

  it('ignores non-flag positional tokens', () => {
    const flags = parseFlags(['detail', '--slug', 'solo-leveling'])
    expect(flags).toEqual({ slug: 'solo-leveling' })
  })

  it('reads flags without a value as empty strings', () => {
    const flags = parseFlags(['--page', '--limit', '3'])

    expect(asString(flags.page)).toBe('')
    expect(asString(flags.limit)).toBe('3')
    expect(asString(flags.missing)).toBe('')
  })

  it('accepts inline values and keeps text after the first equals sign', () => {
    const flags = parseFlags(['--slug=solo-leveling', '--query=a=b', 'c', '--verbose'])

    expect(flags).toEqual({ slug: 'solo-leveling', query: 'a=b', verbose: true })
  })
})
