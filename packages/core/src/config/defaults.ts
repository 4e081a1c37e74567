// packages/core/src/config/defaults.ts

import type { PipelineConfig } from '../types/config.js';
import {
  DEFAULT_IMAGE_TIMEOUT_MS,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_TEXT_TIMEOUT_MS,
  MAX_INPUT_LENGTH,
  MOOD_HISTORY_LIMIT,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: PipelineConfig = {
  persona: {
    name: 'Chef Rosso',
    dimensions: {
      motifObsession: 9,
      romanticIntensity: 8,
      energyLevel: 7,
      creativityMultiplier: 1.5,
      professionalAdaptation: 0.5,
    },
    initialMood: 'enthusiastic',
    moodStability: 0.7,
    moodHistoryLimit: MOOD_HISTORY_LIMIT,
  },
  quality: {
    threshold: 0.85,
    maxRegenerationAttempts: 3,
    weights: { persona: 0.4, motif: 0.3, romance: 0.3 },
    motifThreshold: 6,
  },
  features: {
    romanticWriting: true,
    motifIntegration: true,
    qualityGates: true,
    imageGeneration: true,
    memorySystem: true,
    knowledgeLookup: true,
  },
  models: {
    text: {
      model: 'gemini-2.5-flash',
      temperature: 0.9,
      maxOutputTokens: DEFAULT_MAX_OUTPUT_TOKENS,
      timeoutMs: DEFAULT_TEXT_TIMEOUT_MS,
    },
    image: {
      model: 'imagen-3.0-generate-002',
      aspectRatio: '1:1',
      timeoutMs: DEFAULT_IMAGE_TIMEOUT_MS,
    },
  },
  output: {
    includeSignature: true,
    signature: '*With culinary love,*\n*Chef Rosso* 🍅❤️',
  },
  session: {
    databasePath: ':memory:',
    historyLimit: 10,
  },
  limits: {
    maxInputLength: MAX_INPUT_LENGTH,
    maxSteps: 32,
  },
  advanced: {
    logLevel: 'info',
    debug: false,
  },
};
