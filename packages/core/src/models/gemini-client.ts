// packages/core/src/models/gemini-client.ts

import { GoogleGenAI } from '@google/genai';
import { ConfigError } from '../utils/errors.js';

export const GEMINI_PROVIDER = 'gemini';

/** The slice of the SDK the adapters call. */
export type GeminiModels = Pick<GoogleGenAI['models'], 'generateContent' | 'generateImages'>;

/**
 * Build a client from GEMINI_API_KEY (or GOOGLE_API_KEY).
 * Throws ConfigError when neither is set.
 */
export function createGeminiClient(apiKey?: string, env: NodeJS.ProcessEnv = process.env): GoogleGenAI {
  const key = apiKey ?? env.GEMINI_API_KEY ?? env.GOOGLE_API_KEY;
  if (!key) {
    throw new ConfigError(
      'GEMINI_API_KEY is not set. Export it (or GOOGLE_API_KEY) before creating the pipeline.',
      'GEMINI_API_KEY',
    );
  }
  return new GoogleGenAI({ apiKey: key });
}
