import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { getSchemaVersion, openDatabase } from '../../../src/memory/database.js';
import { DEFAULT_PREFERENCES, mergePreferences } from '../../../src/memory/preferences.js';
import { SessionStore } from '../../../src/memory/session-store.js';
import { createPersonaState } from '../../../src/state/persona-state.js';
import type { RunRecord } from '../../../src/types/session.js';

let db: Database.Database;
let store: SessionStore;

beforeEach(() => {
  db = openDatabase(':memory:');
  store = new SessionStore(db);
});

afterEach(() => {
  db.close();
});

function run(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    runId: `run_${Math.random().toString(36).slice(2)}`,
    sessionId: 'ses_a',
    category: 'recipe_request',
    success: true,
    degraded: false,
    qualityScore: 0.9,
    regenerationCount: 0,
    demoFallback: false,
    durationMs: 100,
    ...overrides,
  };
}

describe('openDatabase', () => {
  it('records the schema version', () => {
    expect(getSchemaVersion(db)).toBe('1');
  });
});

describe('SessionStore history', () => {
  it('returns turns in order', () => {
    store.appendTurn('ses_a', 'user', 'hello');
    store.appendTurn('ses_a', 'assistant', 'ciao, darling');
    expect(store.getHistory('ses_a').map((t) => [t.role, t.content])).toEqual([
      ['user', 'hello'],
      ['assistant', 'ciao, darling'],
    ]);
  });

  it('keeps the most recent turns under a limit', () => {
    for (const content of ['one', 'two', 'three', 'four']) {
      store.appendTurn('ses_a', 'user', content);
    }
    expect(store.getHistory('ses_a', 2).map((t) => t.content)).toEqual(['three', 'four']);
  });

  it('returns nothing for an unknown session', () => {
    expect(store.getHistory('ses_missing')).toEqual([]);
  });
});

describe('SessionStore preferences', () => {
  it('starts from defaults', () => {
    expect(store.getPreferences('ses_a')).toEqual(DEFAULT_PREFERENCES);
  });

  it('merges and persists updates', () => {
    store.mergePreferences('ses_a', { favoriteCuisines: ['italian'] });
    store.mergePreferences('ses_a', { favoriteCuisines: ['french'], ingredientAffinities: { garlic: 1 } });
    expect(store.getPreferences('ses_a')).toEqual({
      dietaryRestrictions: [],
      skillLevel: 'intermediate',
      ingredientAffinities: { garlic: 1 },
      favoriteCuisines: ['italian', 'french'],
    });
  });
});

describe('mergePreferences', () => {
  it('unions lists, replaces skill level and merges affinities per key', () => {
    const merged = mergePreferences(
      {
        dietaryRestrictions: ['vegan'],
        skillLevel: 'beginner',
        ingredientAffinities: { basil: 0.5, garlic: -0.2 },
        favoriteCuisines: [],
      },
      { dietaryRestrictions: ['vegan', 'keto'], skillLevel: 'advanced', ingredientAffinities: { basil: 1 } },
    );
    expect(merged).toEqual({
      dietaryRestrictions: ['vegan', 'keto'],
      skillLevel: 'advanced',
      ingredientAffinities: { basil: 1, garlic: -0.2 },
      favoriteCuisines: [],
    });
  });

  it('does not mutate its input', () => {
    const current = structuredClone(DEFAULT_PREFERENCES);
    mergePreferences(current, { dietaryRestrictions: ['vegan'] });
    expect(current.dietaryRestrictions).toEqual([]);
  });
});

describe('SessionStore persona', () => {
  it('round-trips the persona', () => {
    const persona = createPersonaState(DEFAULT_CONFIG.persona);
    persona.mood = 'serene';
    store.savePersona('ses_a', persona);
    expect(store.getPersona('ses_a')).toEqual(persona);
  });

  it('returns null when nothing was saved', () => {
    expect(store.getPersona('ses_a')).toBeNull();
  });

  it('rejects a saved persona with out-of-range dimensions', () => {
    const persona = createPersonaState(DEFAULT_CONFIG.persona);
    persona.dimensions.motifObsession = 42;
    store.savePersona('ses_a', persona);
    expect(() => store.getPersona('ses_a')).toThrow('Stored persona for ses_a is invalid');
  });
});

describe('SessionStore stats', () => {
  it('returns zeros with no runs', () => {
    expect(store.getStats()).toEqual({
      totalRuns: 0,
      successRate: 0,
      errorRate: 0,
      degradedRate: 0,
      averageDurationMs: 0,
      averageQualityScore: null,
      regenerationRate: 0,
      demoFallbacks: 0,
    });
  });

  it('aggregates recorded runs', () => {
    store.recordRun(run({ durationMs: 100, qualityScore: 0.9 }));
    store.recordRun(run({ durationMs: 300, qualityScore: 0.5, degraded: true, regenerationCount: 3 }));
    store.recordRun(run({ success: false, durationMs: 200, qualityScore: null, demoFallback: true }));
    store.recordRun(run({ durationMs: 400, qualityScore: 0.7, regenerationCount: 1 }));

    const stats = store.getStats();
    expect(stats.totalRuns).toBe(4);
    expect(stats.successRate).toBe(0.75);
    expect(stats.errorRate).toBe(0.25);
    expect(stats.degradedRate).toBe(0.25);
    expect(stats.averageDurationMs).toBe(250);
    expect(stats.averageQualityScore).toBeCloseTo(0.7, 5);
    expect(stats.regenerationRate).toBe(0.5);
    expect(stats.demoFallbacks).toBe(1);
  });
});
