// packages/core/src/types/image.ts

export type ImageStyle =
  | 'food_photography'
  | 'romantic_dinner'
  | 'rustic_kitchen'
  | 'elegant_plating'
  | 'cooking_process'
  | 'ingredient_focus'
  | 'restaurant_style';

export type AspectRatio = '1:1' | '3:4' | '4:3' | '9:16' | '16:9';

/** What the classifier pulled out of an image request. */
export interface ImageDetails {
  description: string;
  style: ImageStyle | null;
  includeMotif: boolean;
}

export interface ImageRequest {
  description: string;
  style: ImageStyle;
  includeMotif: boolean;
  romanticElements: boolean;
  aspectRatio: AspectRatio;
}

export interface ImagePayload {
  base64: string;
  mimeType: string;
}

export interface ImageResult {
  request: ImageRequest;
  success: boolean;
  /** True when the payload is the local placeholder rather than a generated image. */
  demoFallback: boolean;
  payload: ImagePayload | null;
  prompt: string;
  commentary: string;
  latencyMs: number;
  model: string;
}
