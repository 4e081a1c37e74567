// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';
import type { AspectRatio } from './image.js';
import type { Mood, PersonaDimensions } from './persona.js';
import type { FeatureFlags, QualityWeights } from './workflow.js';

export interface PersonaConfig {
  name: string;
  dimensions: PersonaDimensions;
  initialMood: Mood;
  /** Probability threshold compared against the RNG on each mood update. */
  moodStability: number;
  moodHistoryLimit: number;
}

export interface QualityConfig {
  threshold: number;
  maxRegenerationAttempts: number;
  weights: QualityWeights;
  /** Obsession level at which the generator adds a motif sentence. */
  motifThreshold: number;
}

export interface TextModelConfig {
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export interface ImageModelConfig {
  model: string;
  aspectRatio: AspectRatio;
  timeoutMs: number;
}

export interface ModelsConfig {
  text: TextModelConfig;
  image: ImageModelConfig;
}

export interface OutputConfig {
  includeSignature: boolean;
  signature: string;
}

export interface SessionConfig {
  databasePath: string;
  historyLimit: number;
}

export interface LimitsConfig {
  maxInputLength: number;
  maxSteps: number;
}

export interface AdvancedConfig {
  logLevel: LogLevel;
  debug: boolean;
  seed?: number;
}

export interface PipelineConfig {
  persona: PersonaConfig;
  quality: QualityConfig;
  features: FeatureFlags;
  models: ModelsConfig;
  output: OutputConfig;
  session: SessionConfig;
  limits: LimitsConfig;
  advanced: AdvancedConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type PipelineConfigOverrides = DeepPartial<PipelineConfig>;
