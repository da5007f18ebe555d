/**
 * Image references carried by multimodal messages
 *
 * Adapters store them under `metadata.images`; the pointer is provider
 * specific (e.g. `file-service://file-abc`) and is never resolved here.
 */

import { z } from 'zod';
import { MetadataSchema } from './schemas.js';

export const IMAGES_METADATA_KEY = 'images';

export const ImageRefSchema = z.object({
  assetPointer: z.string().min(1, 'Image asset pointer must be non-empty'),
  sizeBytes: z.number().int().nonnegative().nullable().default(null),
  width: z.number().int().positive().nullable().default(null),
  height: z.number().int().positive().nullable().default(null),
  metadata: MetadataSchema.default({}),
});
export type ImageRef = z.infer<typeof ImageRefSchema>;
export type ImageRefInput = z.input<typeof ImageRefSchema>;

const ImageListSchema = z.array(ImageRefSchema);

/**
 * Images attached to a message; empty for text-only messages
 */
export function messageImages(message: { readonly metadata: Readonly<Record<string, unknown>> }): ImageRef[] {
  const parsed = ImageListSchema.safeParse(message.metadata[IMAGES_METADATA_KEY]);
  return parsed.success ? parsed.data : [];
}
