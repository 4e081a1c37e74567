// packages/core/src/memory/preferences.ts

import { z } from 'zod';
import type { PreferencesUpdate, SessionPreferences } from '../types/session.js';
import { ValidationError } from '../utils/errors.js';

export const DEFAULT_PREFERENCES: SessionPreferences = {
  dietaryRestrictions: [],
  skillLevel: 'intermediate',
  ingredientAffinities: {},
  favoriteCuisines: [],
};

const skillLevelSchema = z.enum(['beginner', 'intermediate', 'advanced', 'professional']);
const affinitySchema = z.number().min(-1).max(1);
const nameList = z.array(z.string().trim().toLowerCase().min(1));

export const preferencesUpdateSchema = z
  .object({
    dietaryRestrictions: nameList.optional(),
    skillLevel: skillLevelSchema.optional(),
    ingredientAffinities: z.record(z.string(), affinitySchema).optional(),
    favoriteCuisines: nameList.optional(),
  })
  .strict();

export const storedPreferencesSchema = z.object({
  dietaryRestrictions: z.array(z.string()).default([]),
  skillLevel: skillLevelSchema.default(DEFAULT_PREFERENCES.skillLevel),
  ingredientAffinities: z.record(z.string(), affinitySchema).default({}),
  favoriteCuisines: z.array(z.string()).default([]),
});

export function parsePreferencesUpdate(update: unknown): PreferencesUpdate {
  const result = preferencesUpdateSchema.safeParse(update);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      `Invalid preferences update: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`,
      issue?.path.join('.'),
    );
  }
  return result.data;
}

function union(current: string[], added: string[] | undefined): string[] {
  return added ? [...new Set([...current, ...added])] : [...current];
}

/**
 * Additive merge: lists gain new entries, affinities merge per ingredient,
 * skill level is replaced when given.
 */
export function mergePreferences(
  current: SessionPreferences,
  update: PreferencesUpdate,
): SessionPreferences {
  return {
    dietaryRestrictions: union(current.dietaryRestrictions, update.dietaryRestrictions),
    skillLevel: update.skillLevel ?? current.skillLevel,
    ingredientAffinities: { ...current.ingredientAffinities, ...update.ingredientAffinities },
    favoriteCuisines: union(current.favoriteCuisines, update.favoriteCuisines),
  };
}
