// packages/core/src/persona/motif-integrator.ts

import type { PersonaState } from '../types/persona.js';
import { pick, type Rng } from '../utils/random.js';
import { loadPersonaTemplates, type PersonaTemplates } from './templates.js';

/** Adds the persona's signature ingredient to drafts that forgot it. */
export class MotifIntegrator {
  constructor(
    private readonly templates: PersonaTemplates = loadPersonaTemplates(),
    private readonly motifWord = 'tomato',
  ) {}

  mentionsMotif(text: string): boolean {
    return text.toLowerCase().includes(this.motifWord);
  }

  integrate(text: string, persona: PersonaState, threshold: number, rng: Rng): string {
    const level = persona.dimensions.motifObsession;
    if (level < threshold || this.mentionsMotif(text)) {
      return text;
    }
    return `${text}\n\n${pick(rng, this.phrasesFor(level))}`;
  }

  phrasesFor(level: number): string[] {
    const tier = [...this.templates.motifTiers]
      .sort((a, b) => b.minLevel - a.minLevel)
      .find((t) => level >= t.minLevel);
    return tier?.phrases ?? this.templates.motifTiers[0]?.phrases ?? [];
  }
}
