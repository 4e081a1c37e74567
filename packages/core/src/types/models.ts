// packages/core/src/types/models.ts

import type { AspectRatio, ImagePayload } from './image.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxOutputTokens?: number;
}

/** Text generation collaborator. */
export interface LanguageModel {
  readonly name: string;
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export interface ImageGenerationParams {
  aspectRatio: AspectRatio;
  numberOfImages: number;
}

/** Image generation collaborator. Throws the upstream error untouched on failure. */
export interface ImageModel {
  readonly name: string;
  generate(prompt: string, params: ImageGenerationParams): Promise<ImagePayload>;
}
