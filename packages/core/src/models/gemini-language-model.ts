// packages/core/src/models/gemini-language-model.ts

import type { Content } from '@google/genai';
import type { TextModelConfig } from '../types/config.js';
import type { ChatMessage, CompletionOptions, LanguageModel } from '../types/models.js';
import { GEMINI_PROVIDER, type GeminiModels } from './gemini-client.js';
import { toUpstreamError } from './upstream-errors.js';

export class GeminiLanguageModel implements LanguageModel {
  readonly name: string;

  constructor(
    private readonly models: GeminiModels,
    private readonly config: TextModelConfig,
  ) {
    this.name = `${GEMINI_PROVIDER}:${config.model}`;
  }

  async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
    const systemInstruction = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const contents: Content[] = messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      }));

    try {
      const response = await this.models.generateContent({
        model: this.config.model,
        contents,
        config: {
          systemInstruction: systemInstruction || undefined,
          temperature: options?.temperature ?? this.config.temperature,
          maxOutputTokens: options?.maxOutputTokens ?? this.config.maxOutputTokens,
        },
      });
      return response.text ?? '';
    } catch (err) {
      throw toUpstreamError(err, GEMINI_PROVIDER);
    }
  }
}
