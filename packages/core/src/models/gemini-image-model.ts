// packages/core/src/models/gemini-image-model.ts

import type { ImageModelConfig } from '../types/config.js';
import type { ImagePayload } from '../types/image.js';
import type { ImageGenerationParams, ImageModel } from '../types/models.js';
import { ApiError } from '../utils/errors.js';
import { GEMINI_PROVIDER, type GeminiModels } from './gemini-client.js';
import { toUpstreamError } from './upstream-errors.js';

const OUTPUT_MIME_TYPE = 'image/png';

export class GeminiImageModel implements ImageModel {
  readonly name: string;

  constructor(
    private readonly models: GeminiModels,
    private readonly config: ImageModelConfig,
  ) {
    this.name = `${GEMINI_PROVIDER}:${config.model}`;
  }

  async generate(prompt: string, params: ImageGenerationParams): Promise<ImagePayload> {
    let response: Awaited<ReturnType<GeminiModels['generateImages']>>;
    try {
      response = await this.models.generateImages({
        model: this.config.model,
        prompt,
        config: {
          numberOfImages: params.numberOfImages,
          aspectRatio: params.aspectRatio,
          outputMimeType: OUTPUT_MIME_TYPE,
        },
      });
    } catch (err) {
      throw toUpstreamError(err, GEMINI_PROVIDER);
    }
    const image = response.generatedImages?.[0]?.image;
    if (!image?.imageBytes) {
      throw new ApiError('Image model returned no image data', GEMINI_PROVIDER);
    }
    return { base64: image.imageBytes, mimeType: image.mimeType ?? OUTPUT_MIME_TYPE };
  }
}
