// packages/core/src/image/index.ts

export { ImageGenerator, isBillingError } from './image-generator.js';
export type { ImageGeneratorOptions } from './image-generator.js';
export { createImageRequest, imageRequestSchema } from './image-request.js';
export type { ImageRequestInput } from './image-request.js';
