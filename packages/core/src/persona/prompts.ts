// packages/core/src/persona/prompts.ts

import type { KnowledgeRecord } from '../types/knowledge.js';
import type { ChatMessage } from '../types/models.js';
import type { PersonaState } from '../types/persona.js';
import type { ConversationTurn, SessionPreferences } from '../types/session.js';
import type {
  ContentCategory,
  ExtractedEntities,
  ProcessingFlags,
  QualityCheckResult,
} from '../types/workflow.js';

/**
 * Variables passed into the generation prompt.
 */
export interface GenerationPromptVariables {
  input: string;
  category: ContentCategory;
  persona: PersonaState;
  entities: ExtractedEntities;
  flags: ProcessingFlags;
  knowledge: KnowledgeRecord[];
  preferences: SessionPreferences;
  history: ConversationTurn[];
  /** Previous failed check, present on regeneration passes. */
  feedback: QualityCheckResult | null;
}

const CATEGORY_GUIDANCE: Record<ContentCategory, string> = {
  recipe_request: 'Share a complete recipe.',
  cooking_question: 'Answer the cooking question accurately, with temperatures and times where relevant.',
  ingredient_inquiry: 'Explain the ingredient, how to choose it and what can replace it.',
  technique_question: 'Teach the technique step by step with one common mistake to avoid.',
  food_pairing: 'Suggest pairings and explain why the flavors work together.',
  nutrition_question: 'Give balanced, sensible nutrition guidance without medical claims.',
  image_request: 'Describe the dish vividly, as if presenting a photograph of it.',
  meal_planning: 'Propose a varied, practical meal plan.',
  recipe_review: 'Review the recipe kindly and offer concrete improvements.',
  cooking_tips: 'Share a handful of practical kitchen tips.',
  general_chat: 'Chat warmly and steer gently towards food.',
};

function describeLevel(level: number): string {
  if (level >= 9) return 'overwhelming';
  if (level >= 7) return 'strong';
  if (level >= 4) return 'moderate';
  return 'subtle';
}

export function buildSystemPrompt(vars: GenerationPromptVariables): string {
  const { persona, feedback } = vars;
  const d = persona.dimensions;
  const lines = [
    `You are ${persona.name}, a passionate, romantic chef who adores tomatoes.`,
    `Current mood: ${persona.mood}.`,
    `Tomato devotion: ${describeLevel(d.motifObsession)}. Romantic flair: ${describeLevel(d.romanticIntensity)}. Energy: ${describeLevel(d.energyLevel)}.`,
    d.professionalAdaptation >= 0.7
      ? 'Keep the tone polished and professional while staying warm.'
      : 'Be expressive, dramatic and full of heart.',
    CATEGORY_GUIDANCE[vars.category],
  ];
  if (vars.flags.recipeSynthesis) {
    lines.push(
      'Format the recipe with a title, an "Ingredients" list with quantities, numbered "Steps", and a serving suggestion.',
    );
  }
  if (feedback && feedback.suggestions.length > 0) {
    lines.push('', 'Your previous draft missed the mark. Improve on these points:');
    for (const suggestion of feedback.suggestions) {
      lines.push(`- ${suggestion}`);
    }
  }
  return lines.join('\n');
}

export function buildUserPrompt(vars: GenerationPromptVariables): string {
  const { entities, preferences } = vars;
  const sections = [vars.input];

  const mentioned = [
    ...entities.ingredients,
    ...entities.techniques,
    ...entities.cuisines,
    ...entities.dietary,
  ];
  if (mentioned.length > 0) {
    sections.push(`Mentioned: ${mentioned.join(', ')}`);
  }
  if (vars.knowledge.length > 0) {
    sections.push(
      ['Kitchen notes:', ...vars.knowledge.map((k) => `- ${k.name} (${k.kind}): ${k.notes}`)].join('\n'),
    );
  }
  const dietary = [...new Set([...preferences.dietaryRestrictions, ...entities.dietary])];
  if (dietary.length > 0) {
    sections.push(`Dietary needs: ${dietary.join(', ')}`);
  }
  if (preferences.favoriteCuisines.length > 0) {
    sections.push(`Favorite cuisines: ${preferences.favoriteCuisines.join(', ')}`);
  }
  const affinities = Object.entries(preferences.ingredientAffinities);
  const loved = affinities.filter(([, score]) => score > 0).map(([name]) => name);
  const avoided = affinities.filter(([, score]) => score < 0).map(([name]) => name);
  if (loved.length > 0) {
    sections.push(`Loves: ${loved.join(', ')}`);
  }
  if (avoided.length > 0) {
    sections.push(`Would rather avoid: ${avoided.join(', ')}`);
  }
  sections.push(`Cook's skill level: ${preferences.skillLevel}`);
  return sections.join('\n\n');
}

/**
 * System prompt, then prior turns, then the current request.
 */
export function renderGenerationPrompt(vars: GenerationPromptVariables): ChatMessage[] {
  return [
    { role: 'system', content: buildSystemPrompt(vars) },
    ...vars.history.map((turn): ChatMessage => ({ role: turn.role, content: turn.content })),
    { role: 'user', content: buildUserPrompt(vars) },
  ];
}
