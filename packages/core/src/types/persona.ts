// packages/core/src/types/persona.ts

import type { ContentCategory, Platform } from './workflow.js';

export type Mood =
  | 'ecstatic'
  | 'enthusiastic'
  | 'romantic'
  | 'contemplative'
  | 'playful'
  | 'passionate'
  | 'serene'
  | 'mischievous'
  | 'nostalgic'
  | 'inspired';

/**
 * Tunable persona dimensions. Integer levels run 1..10;
 * `creativityMultiplier` runs 0.1..3.0 and `professionalAdaptation` 0..1.
 */
export interface PersonaDimensions {
  /** How strongly the signature ingredient (tomatoes) shows up. */
  motifObsession: number;
  romanticIntensity: number;
  energyLevel: number;
  creativityMultiplier: number;
  professionalAdaptation: number;
}

export interface MoodTransition {
  from: Mood;
  to: Mood;
  reason: string;
  at: string;
}

export interface PersonaContext {
  platform: Platform;
  conversationTurns: number;
  lastTopic: ContentCategory | null;
}

export interface PersonaState {
  name: string;
  dimensions: PersonaDimensions;
  mood: Mood;
  moodStability: number;
  moodHistoryLimit: number;
  moodHistory: MoodTransition[];
  context: PersonaContext;
}

/** Intermediate artifact of the persona stage. Not shown to the user. */
export interface PersonaResponse {
  content: string;
  consistencyScore: number;
  romanticElements: string[];
  moodInfluences: string[];
}
