/**
 * Shared command plumbing: argument validation, JSON output and exit codes.
 */

import { z } from 'zod'
import type { ScrapeFailure, ScrapeOutcome } from '../scraper/errors.js'

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
  MISSING_FIELD: 3,
} as const

export interface CommandIo {
  out(text: string): void
  err(text: string): void
}

export const consoleIo: CommandIo = {
  out: text => console.log(text),
  err: text => console.error(text),
}

/** Optional positive integer flag. Absent or empty means undefined. */
export const positiveIntFlag = z.preprocess(
  value => (value === '' ? undefined : value),
  z.coerce.number().int().min(1).optional()
)

export type ArgsResult<T> = { ok: true; args: T } | { ok: false; exitCode: number }

export function validateArgs<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  io: CommandIo
): ArgsResult<z.output<S>> {
  const parsed = schema.safeParse(input)
  if (parsed.success) {
    return { ok: true, args: parsed.data }
  }
  for (const issue of parsed.error.issues) {
    io.err(`Invalid --${issue.path.join('.')}: ${issue.message}`)
  }
  return { ok: false, exitCode: EXIT_CODES.USAGE }
}

export function exitCodeFor(failure: ScrapeFailure): number {
  if (failure.category === 'not_found' && failure.code === 'MANDATORY_FIELD_MISSING') {
    return EXIT_CODES.MISSING_FIELD
  }
  return EXIT_CODES.FAILURE
}

/**
 * Print the value (stdout) or the failure (stderr) as JSON and pick the
 * exit code.
 */
export function report<T>(outcome: ScrapeOutcome<T>, io: CommandIo): number {
  if (outcome.ok) {
    io.out(JSON.stringify(outcome.value, null, 2))
    return EXIT_CODES.OK
  }
  io.err(JSON.stringify(outcome.failure, null, 2))
  return exitCodeFor(outcome.failure)
}
