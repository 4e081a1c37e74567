// packages/core/src/image/image-generator.ts

import { renderPlaceholderImage } from '../models/placeholder-image.js';
import type { PersonaEngine } from '../persona/persona-engine.js';
import { fillTemplate, loadPersonaTemplates, type PersonaTemplates } from '../persona/templates.js';
import type { ImagePayload, ImageRequest, ImageResult } from '../types/image.js';
import type { ImageModel } from '../types/models.js';
import type { Logger } from '../utils/logger.js';
import { pick, type Rng } from '../utils/random.js';
import { withTimeout } from '../utils/timeout.js';

const PROMPT_TEMPLATE =
  'Create a beautiful, appetizing image of {description}. Style: {style}. {motif} {romance} Professional food photography quality, well-lit, appetizing composition.';

/** Upstream refusals that mean "no image access on this account" rather than a real fault. */
const BILLING_PATTERN = /billing|billed users|quota/i;

export function isBillingError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return BILLING_PATTERN.test(message);
}

export interface ImageGeneratorOptions {
  timeoutMs: number;
  renderPlaceholder?: (request: ImageRequest) => ImagePayload;
}

export class ImageGenerator {
  private readonly renderPlaceholder: (request: ImageRequest) => ImagePayload;

  constructor(
    private readonly model: ImageModel,
    private readonly persona: PersonaEngine,
    private readonly logger: Logger,
    private readonly options: ImageGeneratorOptions,
    private readonly templates: PersonaTemplates = loadPersonaTemplates(),
  ) {
    this.renderPlaceholder = options.renderPlaceholder ?? renderPlaceholderImage;
  }

  buildPrompt(request: ImageRequest, rng: Rng): string {
    return fillTemplate(PROMPT_TEMPLATE, {
      description: request.description,
      style: this.templates.imageStyles[request.style],
      motif: request.includeMotif ? pick(rng, this.templates.imageMotifPhrases) : '',
      romance: request.romanticElements ? pick(rng, this.templates.imageRomanticPhrases) : '',
    })
      .replace(/\s{2,}/g, ' ')
      .trim();
  }

  /**
   * Generate the image. A billing or quota refusal yields a local placeholder
   * flagged `demoFallback`; every other failure propagates.
   */
  async generate(request: ImageRequest, rng: Rng): Promise<ImageResult> {
    const prompt = this.buildPrompt(request, rng);
    const start = Date.now();
    let payload: ImagePayload;
    let demoFallback = false;

    try {
      payload = await withTimeout(
        this.model.generate(prompt, { aspectRatio: request.aspectRatio, numberOfImages: 1 }),
        this.options.timeoutMs,
        `image generation (${this.model.name})`,
      );
    } catch (err) {
      if (!isBillingError(err)) {
        throw err;
      }
      this.logger.warn(
        `Image API unavailable for this account, serving demo placeholder: ${err instanceof Error ? err.message : String(err)}`,
      );
      payload = this.renderPlaceholder(request);
      demoFallback = true;
    }

    return {
      request,
      success: true,
      demoFallback,
      payload,
      prompt,
      commentary: this.persona.imageCommentary(request, demoFallback, rng),
      latencyMs: Date.now() - start,
      model: demoFallback ? 'local-placeholder' : this.model.name,
    };
  }
}
