import { z } from 'zod'

/**
 * One mirror entry of a reader payload: `{ "images": ["https://...", ...] }`.
 * Extra keys are ignored.
 */
export const readerSourceSchema = z.object({
  images: z.array(z.string()),
})

export type ReaderSource = z.infer<typeof readerSourceSchema>

/**
 * Default aggregation task: validate one raw source descriptor and return
 * its trimmed, non-empty image URLs. Throws when the descriptor is not a
 * source or carries no image, which the aggregator turns into an empty list.
 */
export function extractSourceImages(descriptor: unknown): string[] {
  const source = readerSourceSchema.parse(descriptor)
  const images = source.images.map(image => image.trim()).filter(image => image.length > 0)
  if (images.length === 0) {
    throw new Error('source has no images')
  }
  return images
}
