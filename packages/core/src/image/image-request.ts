// packages/core/src/image/image-request.ts

import { z } from 'zod';
import type { ImageRequest } from '../types/image.js';
import { IMAGE_DESCRIPTION_MAX_LENGTH } from '../utils/constants.js';
import { ValidationError } from '../utils/errors.js';

export const imageRequestSchema = z.object({
  description: z
    .string()
    .trim()
    .min(1, 'Image description cannot be empty')
    .max(IMAGE_DESCRIPTION_MAX_LENGTH, `Image description must be at most ${IMAGE_DESCRIPTION_MAX_LENGTH} characters`),
  style: z
    .enum([
      'food_photography',
      'romantic_dinner',
      'rustic_kitchen',
      'elegant_plating',
      'cooking_process',
      'ingredient_focus',
      'restaurant_style',
    ])
    .default('food_photography'),
  includeMotif: z.boolean().default(true),
  romanticElements: z.boolean().default(true),
  aspectRatio: z.enum(['1:1', '3:4', '4:3', '9:16', '16:9']).default('1:1'),
});

export type ImageRequestInput = z.input<typeof imageRequestSchema>;

/** Validate and normalize an image request. Throws ValidationError. */
export function createImageRequest(input: ImageRequestInput): ImageRequest {
  const result = imageRequestSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid image request', issue?.path.join('.'));
  }
  return result.data;
}
