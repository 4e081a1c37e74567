// packages/core/src/persona/romantic-writer.ts

import type { Mood, PersonaState } from '../types/persona.js';
import { pick, type Rng } from '../utils/random.js';
import {
  fillTemplate,
  loadPersonaTemplates,
  type PersonaTemplates,
  type RomanticStyle,
} from './templates.js';

const VERB_SWAP_LEVEL = 4;
const CLOSING_LEVEL = 6;
const OPENING_LEVEL = 8;

/**
 * Rewrites a draft in a romantic register. The current mood picks the style
 * of the opening and closing lines; how much changes scales with the
 * persona's romantic intensity.
 */
export class RomanticWriter {
  private readonly verbPatterns: Array<{ pattern: RegExp; replacement: string }>;

  constructor(private readonly templates: PersonaTemplates = loadPersonaTemplates()) {
    this.verbPatterns = Object.entries(templates.romanticVerbs).map(([verb, replacement]) => ({
      pattern: new RegExp(`\\b${verb}\\b`, 'i'),
      replacement,
    }));
  }

  styleFor(mood: Mood): RomanticStyle {
    return this.templates.moodStyles[mood];
  }

  rewrite(text: string, persona: PersonaState, ingredients: string[], rng: Rng): string {
    const intensity = persona.dimensions.romanticIntensity;
    const { openings, closings } = this.templates.romanticStyles[this.styleFor(persona.mood)];
    let result = text;

    if (intensity >= VERB_SWAP_LEVEL) {
      result = this.swapVerbs(result);
    }
    if (intensity >= OPENING_LEVEL && persona.context.platform !== 'linkedin') {
      result = `${pick(rng, openings)}\n\n${result}`;
    }
    if (intensity >= CLOSING_LEVEL) {
      const ingredient = ingredients[0] ?? 'tomatoes';
      result = `${result}\n\n${fillTemplate(pick(rng, closings), { ingredient })}`;
    }
    return result;
  }

  /** Replace the first occurrence of each plain cooking verb, keeping its capitalization. */
  swapVerbs(text: string): string {
    let result = text;
    for (const { pattern, replacement } of this.verbPatterns) {
      result = result.replace(pattern, (match) => {
        const first = match.charAt(0);
        return first === first.toUpperCase()
          ? replacement.charAt(0).toUpperCase() + replacement.slice(1)
          : replacement;
      });
    }
    return result;
  }
}
