// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { PipelineConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';

const D = DEFAULT_CONFIG;

export const moodSchema = z.enum([
  'ecstatic',
  'enthusiastic',
  'romantic',
  'contemplative',
  'playful',
  'passionate',
  'serene',
  'mischievous',
  'nostalgic',
  'inspired',
]);

const level = z.number().int().min(1).max(10);

export const personaDimensionsSchema = z.object({
  motifObsession: level.default(D.persona.dimensions.motifObsession),
  romanticIntensity: level.default(D.persona.dimensions.romanticIntensity),
  energyLevel: level.default(D.persona.dimensions.energyLevel),
  creativityMultiplier: z
    .number()
    .min(0.1)
    .max(3.0)
    .default(D.persona.dimensions.creativityMultiplier),
  professionalAdaptation: z
    .number()
    .min(0)
    .max(1)
    .default(D.persona.dimensions.professionalAdaptation),
});

const personaConfigSchema = z.object({
  name: z.string().min(1).default(D.persona.name),
  dimensions: personaDimensionsSchema.default({}),
  initialMood: moodSchema.default(D.persona.initialMood),
  moodStability: z.number().min(0).max(1).default(D.persona.moodStability),
  moodHistoryLimit: z.number().int().positive().default(D.persona.moodHistoryLimit),
});

const weight = z.number().min(0).max(1);

const qualityConfigSchema = z.object({
  threshold: z.number().min(0).max(1).default(D.quality.threshold),
  maxRegenerationAttempts: z
    .number()
    .int()
    .min(0)
    .max(10)
    .default(D.quality.maxRegenerationAttempts),
  weights: z
    .object({
      persona: weight.default(D.quality.weights.persona),
      motif: weight.default(D.quality.weights.motif),
      romance: weight.default(D.quality.weights.romance),
    })
    .default({}),
  motifThreshold: level.default(D.quality.motifThreshold),
});

const featureFlagsSchema = z.object({
  romanticWriting: z.boolean().default(D.features.romanticWriting),
  motifIntegration: z.boolean().default(D.features.motifIntegration),
  qualityGates: z.boolean().default(D.features.qualityGates),
  imageGeneration: z.boolean().default(D.features.imageGeneration),
  memorySystem: z.boolean().default(D.features.memorySystem),
  knowledgeLookup: z.boolean().default(D.features.knowledgeLookup),
});

const modelsConfigSchema = z.object({
  text: z
    .object({
      model: z.string().min(1).default(D.models.text.model),
      temperature: z.number().min(0).max(2).default(D.models.text.temperature),
      maxOutputTokens: z.number().int().positive().default(D.models.text.maxOutputTokens),
      timeoutMs: z.number().int().positive().default(D.models.text.timeoutMs),
    })
    .default({}),
  image: z
    .object({
      model: z.string().min(1).default(D.models.image.model),
      aspectRatio: z.enum(['1:1', '3:4', '4:3', '9:16', '16:9']).default(D.models.image.aspectRatio),
      timeoutMs: z.number().int().positive().default(D.models.image.timeoutMs),
    })
    .default({}),
});

const outputConfigSchema = z.object({
  includeSignature: z.boolean().default(D.output.includeSignature),
  signature: z.string().default(D.output.signature),
});

const sessionConfigSchema = z.object({
  databasePath: z.string().min(1).default(D.session.databasePath),
  historyLimit: z.number().int().min(0).default(D.session.historyLimit),
});

const limitsConfigSchema = z.object({
  maxInputLength: z.number().int().positive().default(D.limits.maxInputLength),
  maxSteps: z.number().int().positive().default(D.limits.maxSteps),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default(D.advanced.logLevel),
  debug: z.boolean().default(D.advanced.debug),
  seed: z.number().int().optional(),
});

export const pipelineConfigSchema = z
  .object({
    persona: personaConfigSchema.default({}),
    quality: qualityConfigSchema.default({}),
    features: featureFlagsSchema.default({}),
    models: modelsConfigSchema.default({}),
    output: outputConfigSchema.default({}),
    session: sessionConfigSchema.default({}),
    limits: limitsConfigSchema.default({}),
    advanced: advancedConfigSchema.default({}),
  })
  .superRefine((data, ctx) => {
    const { persona, motif, romance } = data.quality.weights;
    if (persona + motif + romance === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['quality', 'weights'],
        message: 'At least one quality weight must be greater than zero',
      });
    }
    // A run walks 4 linear stages, then (generate + validate) per attempt, then formats.
    const needed = 4 + 2 * (data.quality.maxRegenerationAttempts + 1) + 1;
    if (data.limits.maxSteps < needed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['limits', 'maxSteps'],
        message: `maxSteps ${data.limits.maxSteps} cannot fit ${data.quality.maxRegenerationAttempts} regenerations (needs ${needed})`,
      });
    }
  });

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
