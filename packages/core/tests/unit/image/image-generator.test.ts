import { describe, expect, it, vi } from 'vitest';
import { ImageGenerator, isBillingError } from '../../../src/image/image-generator.js';
import { createImageRequest } from '../../../src/image/image-request.js';
import { PersonaEngine } from '../../../src/persona/persona-engine.js';
import { HeuristicQualityScorer } from '../../../src/scoring/quality-scorer.js';
import type { ImagePayload } from '../../../src/types/image.js';
import type { ImageModel } from '../../../src/types/models.js';
import { ApiError, TimeoutError, ValidationError } from '../../../src/utils/errors.js';
import { silentLogger } from '../../../src/utils/logger.js';
import type { Rng } from '../../../src/utils/random.js';

const firstChoice: Rng = { next: () => 0 };
const persona = new PersonaEngine(new HeuristicQualityScorer());
const PLACEHOLDER: ImagePayload = { base64: 'cGxhY2Vob2xkZXI=', mimeType: 'image/png' };

function generatorWith(generate: ImageModel['generate'], timeoutMs = 1000) {
  const renderPlaceholder = vi.fn(() => PLACEHOLDER);
  const generator = new ImageGenerator({ name: 'fake-image', generate }, persona, silentLogger, {
    timeoutMs,
    renderPlaceholder,
  });
  return { generator, renderPlaceholder };
}

describe('createImageRequest', () => {
  it('applies defaults and trims the description', () => {
    expect(createImageRequest({ description: '  a lemon tart  ' })).toEqual({
      description: 'a lemon tart',
      style: 'food_photography',
      includeMotif: true,
      romanticElements: true,
      aspectRatio: '1:1',
    });
  });

  it('rejects an empty description', () => {
    expect(() => createImageRequest({ description: '   ' })).toThrow(ValidationError);
  });

  it('rejects a description over 500 characters', () => {
    expect(() => createImageRequest({ description: 'a'.repeat(501) })).toThrow(ValidationError);
  });
});

describe('isBillingError', () => {
  it.each([
    'Imagen API is only accessible to billed users at this time.',
    'Billing account not enabled',
    'Quota exceeded for project',
  ])('recognizes "%s"', (message) => {
    expect(isBillingError(new Error(message))).toBe(true);
  });

  it('ignores other failures', () => {
    expect(isBillingError(new Error('Internal error'))).toBe(false);
  });
});

describe('ImageGenerator', () => {
  const request = createImageRequest({ description: 'romantic pasta', style: 'romantic_dinner' });

  it('builds the prompt from style, motif and romance phrases', () => {
    const { generator } = generatorWith(vi.fn());
    expect(generator.buildPrompt(request, firstChoice)).toBe(
      'Create a beautiful, appetizing image of romantic pasta. ' +
        'Style: candlelit romantic dinner table, warm golden glow, soft bokeh. ' +
        'Include ripe, glossy red tomatoes as a natural part of the composition. ' +
        'Add a single rose petal or a soft heart-shaped detail. ' +
        'Professional food photography quality, well-lit, appetizing composition.',
    );
  });

  it('leaves out motif and romance when turned off', () => {
    const { generator } = generatorWith(vi.fn());
    const plain = createImageRequest({ description: 'bread', includeMotif: false, romanticElements: false });
    expect(generator.buildPrompt(plain, firstChoice)).toBe(
      'Create a beautiful, appetizing image of bread. ' +
        'Style: professional food photography, natural window light, shallow depth of field. ' +
        'Professional food photography quality, well-lit, appetizing composition.',
    );
  });

  it('returns the model image with commentary', async () => {
    const payload: ImagePayload = { base64: 'aW1hZ2U=', mimeType: 'image/png' };
    const { generator, renderPlaceholder } = generatorWith(vi.fn().mockResolvedValue(payload));
    const result = await generator.generate(request, firstChoice);
    expect(result).toMatchObject({ success: true, demoFallback: false, payload, model: 'fake-image' });
    expect(result.commentary).toBe(
      'Look what I made for you, darling! romantic pasta, captured with all my heart.',
    );
    expect(renderPlaceholder).not.toHaveBeenCalled();
  });

  it('serves a flagged placeholder on a billing refusal', async () => {
    const { generator, renderPlaceholder } = generatorWith(
      vi.fn().mockRejectedValue(new ApiError('Only accessible to billed users', 'gemini', 400)),
    );
    const result = await generator.generate(request, firstChoice);
    expect(renderPlaceholder).toHaveBeenCalledWith(request);
    expect(result).toMatchObject({
      success: true,
      demoFallback: true,
      payload: PLACEHOLDER,
      model: 'local-placeholder',
    });
    expect(result.commentary).toBe(
      'Look what I made for you, darling! romantic pasta, captured with all my heart. ' +
        'The studio camera is resting today, so this is a little sketch from my notebook instead.',
    );
  });

  it('rethrows other failures', async () => {
    const { generator } = generatorWith(vi.fn().mockRejectedValue(new ApiError('Internal error', 'gemini', 500)));
    await expect(generator.generate(request, firstChoice)).rejects.toThrow('Internal error');
  });

  it('times out a slow model', async () => {
    const { generator } = generatorWith(() => new Promise<ImagePayload>(() => undefined), 10);
    await expect(generator.generate(request, firstChoice)).rejects.toBeInstanceOf(TimeoutError);
  });
});
