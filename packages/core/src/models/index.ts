// packages/core/src/models -- model adapters over @google/genai

export { createGeminiClient, GEMINI_PROVIDER } from './gemini-client.js';
export type { GeminiModels } from './gemini-client.js';
export { GeminiLanguageModel } from './gemini-language-model.js';
export { GeminiImageModel } from './gemini-image-model.js';
export { placeholderSvg, renderPlaceholderImage } from './placeholder-image.js';
export { getStatusCode, isRateLimit, toUpstreamError } from './upstream-errors.js';
