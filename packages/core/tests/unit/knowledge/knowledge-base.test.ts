import { describe, expect, it } from 'vitest';
import { KnowledgeBase } from '../../../src/knowledge/knowledge-base.js';

const kb = KnowledgeBase.load();

describe('KnowledgeBase', () => {
  it('looks up names case-insensitively', () => {
    expect(kb.lookup('Tomato')?.name).toBe('tomato');
    expect(kb.lookup('  GARLIC ')?.kind).toBe('ingredient');
  });

  it('resolves aliases', () => {
    expect(kb.lookup('tomatoes')?.name).toBe('tomato');
    expect(kb.lookup('spaghetti')?.name).toBe('pasta');
  });

  it('returns null for unknown names', () => {
    expect(kb.lookup('dragonfruit')).toBeNull();
  });

  it('finds pairings', () => {
    expect(kb.findPairings('tomatoes')).toEqual(['basil', 'garlic', 'olive oil', 'mozzarella', 'onion']);
    expect(kb.findPairings('dragonfruit')).toEqual([]);
  });

  it('de-duplicates lookups that hit the same record', () => {
    expect(kb.lookupAll(['tomato', 'tomatoes', 'pasta', 'unknown']).map((r) => r.name)).toEqual([
      'tomato',
      'pasta',
    ]);
  });

  it('builds from inline data', () => {
    const small = KnowledgeBase.fromData({
      techniques: [{ name: 'Confit', aliases: ['confited'], notes: 'Cook slowly in fat.' }],
    });
    expect(small.size).toBe(1);
    expect(small.lookup('confited')).toEqual({
      kind: 'technique',
      name: 'Confit',
      aliases: ['confited'],
      flavorProfile: [],
      pairings: [],
      substitutions: [],
      notes: 'Cook slowly in fat.',
    });
  });
});
