// packages/core/src/scoring/index.ts

export { HeuristicQualityScorer } from './quality-scorer.js';
export type { QualityScorer, ScoringSettings } from './quality-scorer.js';
export { loadScoringVocabulary, scoringVocabularySchema } from './vocabulary.js';
export type { ScoringVocabulary } from './vocabulary.js';
