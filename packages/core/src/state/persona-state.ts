// packages/core/src/state/persona-state.ts

import { z } from 'zod';
import { categorySchema } from '../classification/vocabulary.js';
import { moodSchema, personaDimensionsSchema } from '../config/schema.js';
import type { PersonaConfig } from '../types/config.js';
import type { Mood, MoodTransition, PersonaDimensions, PersonaState } from '../types/persona.js';
import type { Platform } from '../types/workflow.js';
import { ValidationError } from '../utils/errors.js';

/** Validate persona dimensions. Throws ValidationError naming the first bad field. */
export function validateDimensions(dimensions: PersonaDimensions): PersonaDimensions {
  const result = personaDimensionsSchema.safeParse(dimensions);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') ?? 'dimensions';
    throw new ValidationError(`Invalid persona dimension ${field}: ${issue?.message ?? 'invalid'}`, field);
  }
  return result.data;
}

export function createPersonaState(config: PersonaConfig, platform: Platform = 'chat'): PersonaState {
  return {
    name: config.name,
    dimensions: validateDimensions(config.dimensions),
    mood: config.initialMood,
    moodStability: config.moodStability,
    moodHistoryLimit: config.moodHistoryLimit,
    moodHistory: [],
    context: { platform, conversationTurns: 0, lastTopic: null },
  };
}

export function clonePersonaState(persona: PersonaState): PersonaState {
  return structuredClone(persona);
}

/** Shape of a persona saved with a session. */
export const storedPersonaSchema = z.object({
  name: z.string().min(1),
  dimensions: personaDimensionsSchema,
  mood: moodSchema,
  moodStability: z.number().min(0).max(1),
  moodHistoryLimit: z.number().int().positive(),
  moodHistory: z.array(
    z.object({ from: moodSchema, to: moodSchema, reason: z.string(), at: z.string() }),
  ),
  context: z.object({
    platform: z.enum(['chat', 'twitter', 'linkedin']),
    conversationTurns: z.number().int().nonnegative(),
    lastTopic: categorySchema.nullable(),
  }),
});

/**
 * Carry a saved persona into a new run. Mood, mood history and context are
 * kept; name, dimensions and stability come from the current config.
 */
export function restorePersonaState(stored: PersonaState, config: PersonaConfig): PersonaState {
  const persona = clonePersonaState(stored);
  persona.name = config.name;
  persona.dimensions = validateDimensions(config.dimensions);
  persona.moodStability = config.moodStability;
  persona.moodHistoryLimit = config.moodHistoryLimit;
  const overflow = persona.moodHistory.length - persona.moodHistoryLimit;
  if (overflow > 0) {
    persona.moodHistory.splice(0, overflow);
  }
  return persona;
}

/**
 * Move the persona to a new mood and log the transition.
 * No-op when the mood does not change. History keeps the newest entries.
 */
export function recordMoodTransition(persona: PersonaState, to: Mood, reason: string): void {
  if (persona.mood === to) {
    return;
  }
  const transition: MoodTransition = {
    from: persona.mood,
    to,
    reason,
    at: new Date().toISOString(),
  };
  persona.mood = to;
  persona.moodHistory.push(transition);
  const overflow = persona.moodHistory.length - persona.moodHistoryLimit;
  if (overflow > 0) {
    persona.moodHistory.splice(0, overflow);
  }
}
