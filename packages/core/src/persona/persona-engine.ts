// packages/core/src/persona/persona-engine.ts

import { recordMoodTransition } from '../state/persona-state.js';
import type { ImageRequest } from '../types/image.js';
import type { Mood, PersonaResponse, PersonaState } from '../types/persona.js';
import type { HeuristicQualityScorer } from '../scoring/quality-scorer.js';
import { pick, type Rng } from '../utils/random.js';
import { fillTemplate, loadPersonaTemplates, type PersonaTemplates } from './templates.js';

export interface MoodCandidate {
  mood: Mood;
  hits: string[];
}

/** Twitter keeps replies short. */
const TWITTER_MAX_LENGTH = 280;

export class PersonaEngine {
  constructor(
    private readonly scorer: HeuristicQualityScorer,
    private readonly templates: PersonaTemplates = loadPersonaTemplates(),
  ) {}

  /**
   * Mood with the most trigger hits in the text, ties resolved by table order.
   * Null when nothing triggers.
   */
  detectMood(text: string): MoodCandidate | null {
    const lowered = text.toLowerCase();
    let best: MoodCandidate | null = null;
    for (const entry of this.templates.moods) {
      const hits = entry.triggers.filter((t) => lowered.includes(t));
      if (hits.length > 0 && (best === null || hits.length > best.hits.length)) {
        best = { mood: entry.mood, hits };
      }
    }
    return best;
  }

  /**
   * Possibly shift the persona's mood. The candidate takes over only when
   * the draw exceeds `moodStability`, so a higher stability value makes
   * changes rarer.
   */
  updateMood(persona: PersonaState, text: string, rng: Rng): MoodCandidate | null {
    const candidate = this.detectMood(text);
    if (candidate === null || candidate.mood === persona.mood) {
      return null;
    }
    if (rng.next() > persona.moodStability) {
      recordMoodTransition(persona, candidate.mood, `triggered by: ${candidate.hits.join(', ')}`);
      return candidate;
    }
    return null;
  }

  respond(text: string, persona: PersonaState): PersonaResponse {
    const framing =
      this.templates.moods.find((m) => m.mood === persona.mood)?.framing ?? '{content}';
    const content = this.adaptToPlatform(fillTemplate(framing, { content: text }), persona);
    const candidate = this.detectMood(text);
    return {
      content,
      consistencyScore: this.scorer.personaConsistency(content, persona.dimensions),
      romanticElements: this.scorer.romanticElements(content),
      moodInfluences: [`mood:${persona.mood}`, ...(candidate?.hits ?? [])],
    };
  }

  imageCommentary(request: ImageRequest, demoFallback: boolean, rng: Rng): string {
    const line = fillTemplate(pick(rng, this.templates.imageCommentary), {
      description: request.description,
    });
    return demoFallback ? `${line} ${this.templates.demoFallbackNote}` : line;
  }

  /** Trim or tone down text for the persona's current platform. */
  adaptToPlatform(text: string, persona: PersonaState): string {
    switch (persona.context.platform) {
      case 'twitter':
        return text.length > TWITTER_MAX_LENGTH
          ? `${text.slice(0, TWITTER_MAX_LENGTH - 1).trimEnd()}…`
          : text;
      case 'linkedin':
        return text.replace(/!{2,}/g, '!').replace(/\b[A-Z]{4,}\b/g, (w) => w.toLowerCase());
      case 'chat':
        return text;
    }
  }
}
