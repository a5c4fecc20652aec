/**
 * Reader payload discovery.
 *
 * Reader pages boot their image viewer with an inline script:
 *
 *   ts_reader.run({"post_id":1,"sources":[{"source":"Server 1","images":["https:\/\/..."]}]});
 *
 * The object literal is valid JSON once the escaped slashes are restored.
 * Only the outer shape is checked here; each source entry stays raw, in page
 * order, and is validated by the aggregation task for its own label.
 */

import { z } from 'zod'
import { READER_PAYLOAD_PATTERN } from './selectors.js'

const readerPayloadSchema = z.object({
  sources: z.array(z.unknown()),
})

export type ReaderPayloadFailure = 'missing_anchor' | 'invalid_json' | 'invalid_shape'

export type ReaderPayloadResult =
  | { ok: true; sources: unknown[] }
  | { ok: false; reason: ReaderPayloadFailure; error?: string }

export function parseReaderPayload(html: string): ReaderPayloadResult {
  const match = READER_PAYLOAD_PATTERN.exec(html)
  const literal = match?.[1]
  if (!literal) {
    return { ok: false, reason: 'missing_anchor' }
  }

  let value: unknown
  try {
    value = JSON.parse(literal.replace(/\\\//g, '/'))
  } catch (error) {
    return { ok: false, reason: 'invalid_json', error: error instanceof Error ? error.message : 'Invalid JSON' }
  }

  const payload = readerPayloadSchema.safeParse(value)
  if (!payload.success) {
    return { ok: false, reason: 'invalid_shape', error: payload.error.issues[0]?.message }
  }

  return { ok: true, sources: payload.data.sources }
}
