import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { PersonaEngine } from '../../../src/persona/persona-engine.js';
import { HeuristicQualityScorer } from '../../../src/scoring/quality-scorer.js';
import { createPersonaState } from '../../../src/state/persona-state.js';
import type { PersonaState } from '../../../src/types/persona.js';
import type { Rng } from '../../../src/utils/random.js';

const engine = new PersonaEngine(new HeuristicQualityScorer());

function fixedRng(value: number): Rng {
  return { next: () => value };
}

function persona(): PersonaState {
  return createPersonaState(DEFAULT_CONFIG.persona);
}

describe('PersonaEngine.detectMood', () => {
  it('picks the mood with the most trigger hits', () => {
    expect(engine.detectMood('I love this beautiful dish')).toEqual({
      mood: 'romantic',
      hits: ['love', 'beautiful'],
    });
  });

  it('resolves ties by table order', () => {
    expect(engine.detectMood('tomato cooking')?.mood).toBe('ecstatic');
  });

  it('returns null when nothing triggers', () => {
    expect(engine.detectMood('hello there')).toBeNull();
  });
});

describe('PersonaEngine.updateMood', () => {
  it('changes mood when the draw exceeds stability', () => {
    const p = persona();
    const change = engine.updateMood(p, 'I love this beautiful dish', fixedRng(0.9));
    expect(change?.mood).toBe('romantic');
    expect(p.mood).toBe('romantic');
    expect(p.moodHistory).toHaveLength(1);
    expect(p.moodHistory[0]?.reason).toBe('triggered by: love, beautiful');
  });

  it('keeps the mood when the draw is within stability', () => {
    const p = persona();
    expect(engine.updateMood(p, 'I love this beautiful dish', fixedRng(0.1))).toBeNull();
    expect(p.mood).toBe('enthusiastic');
    expect(p.moodHistory).toEqual([]);
  });

  it('does nothing when the candidate is the current mood', () => {
    const p = persona();
    expect(engine.updateMood(p, 'cooking in the kitchen', fixedRng(0.99))).toBeNull();
    expect(p.moodHistory).toEqual([]);
  });
});

describe('PersonaEngine.respond', () => {
  it('frames the text with the current mood', () => {
    const response = engine.respond('Hello', persona());
    expect(response.content).toBe('Oh, how wonderful! Hello I can hardly wait to get cooking!');
    expect(response.moodInfluences).toEqual(['mood:enthusiastic']);
  });
});

describe('PersonaEngine.adaptToPlatform', () => {
  it('truncates long replies on twitter', () => {
    const p = persona();
    p.context.platform = 'twitter';
    const adapted = engine.adaptToPlatform('a'.repeat(300), p);
    expect(adapted).toHaveLength(280);
    expect(adapted.endsWith('…')).toBe(true);
  });

  it('tones down shouting on linkedin', () => {
    const p = persona();
    p.context.platform = 'linkedin';
    expect(engine.adaptToPlatform('AMAZING!! So GOOD', p)).toBe('amazing! So good');
  });

  it('leaves chat replies alone', () => {
    expect(engine.adaptToPlatform('WOW!!', persona())).toBe('WOW!!');
  });
});
