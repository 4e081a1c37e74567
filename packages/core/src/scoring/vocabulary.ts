// packages/core/src/scoring/vocabulary.ts

import { z } from 'zod';
import { loadDataFile } from '../utils/data.js';

const wordList = z.array(z.string().min(1)).min(1);

export const scoringVocabularySchema = z.object({
  characteristics: z.object({
    passion: wordList,
    cooking: wordList,
    romantic: wordList,
    storytelling: wordList,
    drama: wordList,
  }),
  motif: z.object({
    word: z.string().min(1),
    varieties: wordList,
    related: wordList,
    obsession: wordList,
  }),
  romanticTerms: wordList,
});

export type ScoringVocabulary = z.output<typeof scoringVocabularySchema>;

let cached: ScoringVocabulary | undefined;

export function loadScoringVocabulary(): ScoringVocabulary {
  cached ??= loadDataFile('scoring.json', scoringVocabularySchema);
  return cached;
}
